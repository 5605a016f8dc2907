export type MonitorErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'OUT_OF_SCOPE_PARAMETER'
  | 'CALIBRATION_STATE'
  | 'STATE_CHANNEL_UNAVAILABLE';

/** Base error for every failure the gating core reports to its callers. */
export class MonitorError extends Error {
  constructor(
    message: string,
    public readonly code: MonitorErrorCode
  ) {
    super(message);
    this.name = 'MonitorError';
  }
}

/** Malformed score set or out-of-range parameter value. */
export class ValidationError extends MonitorError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/** Inconsistent configuration, e.g. CONFIRM_N above CONFIRM_M, or an unknown parameter. */
export class ConfigurationError extends MonitorError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class OutOfScopeParameterError extends MonitorError {
  constructor(
    public readonly parameter: string,
    public readonly phase: string,
    public readonly allowed: readonly string[]
  ) {
    super(`parameter ${parameter} not allowed for ${phase}. allowed: ${allowed.join(', ')}`, 'OUT_OF_SCOPE_PARAMETER');
    this.name = 'OutOfScopeParameterError';
  }
}

/** Operation not legal in the current calibration state (e.g. set while idle). */
export class CalibrationStateError extends MonitorError {
  constructor(message: string) {
    super(message, 'CALIBRATION_STATE');
    this.name = 'CalibrationStateError';
  }
}

export class StateChannelUnavailableError extends MonitorError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly originalError?: unknown
  ) {
    super(message, 'STATE_CHANNEL_UNAVAILABLE');
    this.name = 'StateChannelUnavailableError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
