import { describe, it, expect, vi } from 'vitest';
import { describeError, withMinimumLevel } from '../../src/core/logging/mapper-logger.js';

describe('withMinimumLevel', () => {
  it('drops entries below the minimum level', () => {
    const sink = vi.fn();
    const logger = withMinimumLevel(sink, 'warn');

    logger({ level: 'debug', message: 'parsed' });
    logger({ level: 'warn', message: 'fallback' });
    logger({ level: 'error', message: 'failed' });

    expect(sink.mock.calls.map(([entry]) => entry.message)).toEqual(['fallback', 'failed']);
  });
});

describe('describeError', () => {
  it('prefers the error message', () => {
    expect(describeError(new Error('bad input'))).toBe('bad input');
    expect(describeError('plain')).toBe('plain');
  });
});
