export type CollectorErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'SYMBOL_NOT_FOUND'
  | 'CACHE_CONFLICT'
  | 'SINK_WRITE_FAILURE'
  | 'CONFIGURATION_ERROR';

export class CollectorError extends Error {
  public readonly code: CollectorErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(code: CollectorErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

/** Transient transport failure; safe to retry on a later tick. */
export class SourceUnavailable extends CollectorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('SOURCE_UNAVAILABLE', message, context);
  }
}

/** The exchange does not list the symbol. Permanent for the round. */
export class SymbolNotFound extends CollectorError {
  constructor(symbol: string, context?: Record<string, unknown>) {
    super('SYMBOL_NOT_FOUND', `Symbol ${symbol} not found`, { symbol, ...context });
  }
}

export class CacheConflict extends CollectorError {
  constructor(eventKey: string) {
    super('CACHE_CONFLICT', `Ranking already exists for round ${eventKey}`, { eventKey });
  }
}

export class SinkWriteFailure extends CollectorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('SINK_WRITE_FAILURE', message, context);
  }
}

export class ConfigurationError extends CollectorError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
  }
}

export const toError = (value: unknown): Error => {
  return value instanceof Error ? value : new Error(String(value));
};

export const isRetryable = (error: unknown): boolean => {
  return !(error instanceof SymbolNotFound);
};
