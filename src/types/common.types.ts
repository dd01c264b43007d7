/**
 * Common types used across the actuator agent
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'RANGE_NOT_SATISFIABLE'
  | 'INVALID_ARGUMENT'
  | 'UNAVAILABLE'
  | 'REMOTE_REGISTRATION_FAILURE'
  | 'CONFIGURATION_ERROR';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export class ActuatorError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, JsonValue>;
  readonly timestamp: Date = new Date();

  constructor(code: ErrorCode, message: string, details?: Record<string, JsonValue>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class NotFoundError extends ActuatorError {
  constructor(message: string, details?: Record<string, JsonValue>) {
    super('NOT_FOUND', message, details);
  }
}

export class MetricNotFoundError extends NotFoundError {
  constructor(readonly metricName: string) {
    super(`Metric not found: ${metricName}`, { metric: metricName });
  }
}

export class LoggerNotFoundError extends NotFoundError {
  constructor(readonly loggerName: string) {
    super(`Logger not found: ${loggerName}`, { logger: loggerName });
  }
}

/**
 * A byte range that cannot be served from the captured log. Belongs to the
 * not-found family but keeps its own code so adapters can answer with 416.
 */
export class RangeNotSatisfiableError extends ActuatorError {
  constructor(readonly range: string, readonly totalLength: number) {
    super('RANGE_NOT_SATISFIABLE', `Range not satisfiable: ${range}`, { range, length: totalLength });
  }
}

export class InvalidArgumentError extends ActuatorError {
  constructor(message: string, details?: Record<string, JsonValue>) {
    super('INVALID_ARGUMENT', message, details);
  }
}

export class UnavailableError extends ActuatorError {
  constructor(message: string, details?: Record<string, JsonValue>) {
    super('UNAVAILABLE', message, details);
  }
}

export class RemoteRegistrationError extends ActuatorError {
  constructor(message: string, details?: Record<string, JsonValue>) {
    super('REMOTE_REGISTRATION_FAILURE', message, details);
  }
}

export class ConfigurationError extends ActuatorError {
  constructor(readonly problems: string[]) {
    super('CONFIGURATION_ERROR', `Invalid configuration: ${problems.join('; ')}`, { problems });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
