/**
 * Named parameter (`:name`) scanning.
 *
 * A plain `/:(\w+)/g` also matches inside string literals (`SELECT ':id'`),
 * quoted identifiers and comments. The scanner below walks the text once,
 * tracking the lexical mode, and only treats `:` as a parameter introducer
 * in normal mode.
 */

/**
 * One occurrence of a named parameter. `end` is exclusive.
 */
export interface ParameterPosition {
  name: string;
  start: number;
  end: number;
}

type LexicalMode = 'normal' | 'single-quote' | 'double-quote' | 'line-comment' | 'block-comment';

const isLetter = (ch: string): boolean => /\p{L}/u.test(ch);

const isIdentifierPart = (ch: string): boolean => /[\p{L}\p{N}_]/u.test(ch);

/**
 * Reads the identifier starting at `start`; returns '' when there is none
 */
const readIdentifier = (sql: string, start: number): string => {
  let i = start;
  while (i < sql.length && isIdentifierPart(sql[i])) {
    i++;
  }
  return sql.slice(start, i);
};

/**
 * Returns every parameter occurrence, in source order, duplicates included
 */
export function extractParameterPositions(sql: string): ParameterPosition[] {
  const positions: ParameterPosition[] = [];
  if (!sql) {
    return positions;
  }

  let mode: LexicalMode = 'normal';
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = i + 1 < sql.length ? sql[i + 1] : '';

    switch (mode) {
      case 'single-quote':
      case 'double-quote': {
        const quote = mode === 'single-quote' ? "'" : '"';
        if (ch === quote) {
          if (next === quote) {
            i += 2; // doubled quote escape
            continue;
          }
          mode = 'normal';
        }
        i++;
        continue;
      }
      case 'line-comment':
        if (ch === '\n') {
          mode = 'normal';
        }
        i++;
        continue;
      case 'block-comment':
        if (ch === '*' && next === '/') {
          mode = 'normal';
          i += 2;
          continue;
        }
        i++;
        continue;
      case 'normal':
        break;
    }

    if (ch === "'") {
      mode = 'single-quote';
      i++;
    } else if (ch === '"') {
      mode = 'double-quote';
      i++;
    } else if (ch === '-' && next === '-') {
      mode = 'line-comment';
      i += 2;
    } else if (ch === '/' && next === '*') {
      mode = 'block-comment';
      i += 2;
    } else if (ch === ':' && next !== '' && isLetter(next)) {
      const name = readIdentifier(sql, i + 1);
      const end = i + 1 + name.length;
      positions.push({ name, start: i, end });
      i = end;
    } else if (ch === ':' && next === ':') {
      i += 2; // `::type` cast
    } else {
      i++;
    }
  }

  return positions;
}

/**
 * Returns parameter names in order of first appearance, without duplicates
 */
export function extractParameters(sql: string): string[] {
  return [...new Set(extractParameterPositions(sql).map(p => p.name))];
}

/**
 * Maps each detected parameter to its inferred type, for display.
 * Every parameter is reported as `string`; the caller supplies real types at binding time.
 */
export function detectParameters(sql: string): Record<string, string> {
  const detected: Record<string, string> = {};
  for (const name of extractParameters(sql)) {
    detected[name] = 'string';
  }
  return detected;
}
