/**
 * Severity of a mapper log entry
 */
export type MapperLogLevel = 'debug' | 'warn' | 'error';

/**
 * Represents a single diagnostic emitted by the generator or the reverse engineer
 */
export interface MapperLogEntry {
  level: MapperLogLevel;
  /** Human-readable summary */
  message: string;
  /** SQL text involved, when there is one */
  sql?: string;
  /** Values bound to the SQL's `?` placeholders, in order */
  params?: unknown[];
  /** Underlying fault, when there is one */
  error?: unknown;
}

/**
 * Function type for mapper logging callbacks
 * @param entry - The log entry to process
 */
export type MapperLogger = (entry: MapperLogEntry) => void;

/**
 * Logger used when the caller supplies none
 */
export const silentLogger: MapperLogger = () => undefined;

/**
 * Returns a logger that drops entries below the given level
 */
export const withMinimumLevel = (logger: MapperLogger, minimum: MapperLogLevel): MapperLogger => {
  const rank: Record<MapperLogLevel, number> = { debug: 0, warn: 1, error: 2 };
  return entry => {
    if (rank[entry.level] >= rank[minimum]) {
      logger(entry);
    }
  };
};

/**
 * Extracts a message from anything thrown
 */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
