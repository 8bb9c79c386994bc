export class BacktestError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'BacktestError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/** Invalid run or batch parameters. Fatal to the run. */
export class ConfigurationError extends BacktestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/** Malformed bar sequence. Fatal to a single backtest run. */
export class DataError extends BacktestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DATA_ERROR', details);
    this.name = 'DataError';
  }
}

/** A BUY could not be filled. The engine treats it as HOLD. */
export class InsufficientCapitalError extends BacktestError {
  constructor(capital: number, commission: number) {
    super(
      `Cannot open position: capital ${capital} leaves nothing after commission ${commission}`,
      'INSUFFICIENT_CAPITAL',
      { capital, commission },
    );
    this.name = 'InsufficientCapitalError';
  }
}

/** A strategy asked a bar view for the current or a future bar through previous(). */
export class LookaheadError extends BacktestError {
  constructor(index: number, offset: number) {
    super(
      `Bar ${index} cannot look ${offset} bars back: only past bars are reachable`,
      'LOOKAHEAD',
      { index, offset },
    );
    this.name = 'LookaheadError';
  }
}

export interface SerializedError {
  name: string;
  code: string;
  message: string;
}

export function serializeError(err: unknown): SerializedError {
  if (err instanceof BacktestError) {
    return { name: err.name, code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { name: err.name, code: 'STRATEGY_ERROR', message: err.message };
  }
  return { name: 'Error', code: 'STRATEGY_ERROR', message: String(err) };
}
