export enum QuoterErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  NO_ACTIVE_INSTRUMENT = 'NO_ACTIVE_INSTRUMENT',
  NO_STRIKE_FOUND = 'NO_STRIKE_FOUND',
  PRICE_STREAM_UNAVAILABLE = 'PRICE_STREAM_UNAVAILABLE',
  EXCHANGE_REQUEST_FAILED = 'EXCHANGE_REQUEST_FAILED',
  ENGINE_STATE = 'ENGINE_STATE',
}

export class QuoterError extends Error {
  readonly code: QuoterErrorCode;
  readonly retryable: boolean;

  constructor(code: QuoterErrorCode, message: string, retryable: boolean = false) {
    super(message);
    this.name = 'QuoterError';
    this.code = code;
    this.retryable = retryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class ConfigValidationError extends QuoterError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(QuoterErrorCode.CONFIG_INVALID, `Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.problems = problems;
  }
}

export class NoActiveInstrumentError extends QuoterError {
  constructor(symbol: string, duration: string) {
    super(
      QuoterErrorCode.NO_ACTIVE_INSTRUMENT,
      `No active ${duration} ${symbol} instrument found`
    );
    this.name = 'NoActiveInstrumentError';
  }
}

export class NoStrikeFoundError extends QuoterError {
  readonly description: string;

  constructor(description: string) {
    super(QuoterErrorCode.NO_STRIKE_FOUND, `Could not extract strike price from "${description}"`);
    this.name = 'NoStrikeFoundError';
    this.description = description;
  }
}

export class PriceStreamUnavailableError extends QuoterError {
  constructor(symbol: string, waitedMs: number) {
    super(
      QuoterErrorCode.PRICE_STREAM_UNAVAILABLE,
      `No fresh ${symbol} price within ${waitedMs}ms of starting the stream`,
      true
    );
    this.name = 'PriceStreamUnavailableError';
  }
}

export class ExchangeRequestError extends QuoterError {
  readonly status?: number;
  readonly endpoint: string;

  constructor(endpoint: string, message: string, status?: number) {
    super(QuoterErrorCode.EXCHANGE_REQUEST_FAILED, message, true);
    this.name = 'ExchangeRequestError';
    this.endpoint = endpoint;
    this.status = status;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
