/**
 * Error taxonomy for the console.
 * Transport is the single place that turns raw HTTP outcomes into these;
 * everything above it lets them through unchanged.
 */

/** Base class so callers can tell console failures from programming errors. */
export class PanelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PanelError';
  }
}

/** Connection failure, timeout, or a request cut short by `close()`. */
export class TransportError extends PanelError {
  constructor(
    message: string,
    public readonly method: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/** A success status whose body was not JSON. */
export class DecodeError extends PanelError {
  constructor(
    public readonly statusCode: number,
    public readonly excerpt: string,
  ) {
    super(`Could not decode panel response (HTTP ${statusCode}): ${excerpt}`);
    this.name = 'DecodeError';
  }
}

/** The panel answered with status >= 400. */
export class ApiError extends PanelError {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly code?: string,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/** Operator input rejected locally; never reaches the network. */
export class ValidationError extends PanelError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** A prerequisite lookup succeeded but returned nothing to choose from. */
export class EmptyResultError extends PanelError {
  constructor(
    public readonly resource: string,
    message: string,
  ) {
    super(message);
    this.name = 'EmptyResultError';
  }
}

/** An answer arrived for a wizard that is finished, expired, or busy. */
export class WorkflowStateError extends PanelError {
  constructor(message: string) {
    super(message);
    this.name = 'WorkflowStateError';
  }
}

export class ConfigError extends PanelError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** One-line, human-readable description of any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof ApiError) return `[HTTP ${error.statusCode}] ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
