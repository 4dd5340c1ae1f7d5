/**
 * Error types raised while running Python models in Glue sessions.
 */

export type GlueRunnerErrorCode =
  | 'INVALID_CONFIG'
  | 'TRANSPORT_ERROR'
  | 'SESSION_ERROR'
  | 'STATEMENT_FAILED'
  | 'STATEMENT_TIMEOUT'
  | 'MODEL_FAILED';

export class GlueRunnerError extends Error {
  constructor(
    message: string,
    public readonly code: GlueRunnerErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GlueRunnerError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends GlueRunnerError {
  constructor(message: string, parameterName?: string) {
    super(parameterName ? `Invalid parameter '${parameterName}': ${message}` : message, 'INVALID_CONFIG');
    this.name = 'ValidationError';
  }
}

export class SessionClientError extends GlueRunnerError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TRANSPORT_ERROR', { cause });
    this.name = 'SessionClientError';
  }
}

export class SessionError extends GlueRunnerError {
  constructor(message: string, public readonly sessionId: string) {
    super(message, 'SESSION_ERROR');
    this.name = 'SessionError';
  }
}

export interface StatementErrorDetails {
  state: string;
  errorName?: string;
  errorValue?: string;
  traceback?: string;
}

/**
 * A statement reached `ERROR`/`CANCELLED`, or finished `AVAILABLE` with an error payload.
 */
export class StatementExecutionError extends GlueRunnerError {
  public readonly state: string;
  public readonly errorName: string | undefined;
  public readonly errorValue: string | undefined;
  public readonly traceback: string | undefined;

  constructor(message: string, public readonly statementId: number, details: StatementErrorDetails) {
    super(message, 'STATEMENT_FAILED');
    this.name = 'StatementExecutionError';
    this.state = details.state;
    this.errorName = details.errorName;
    this.errorValue = details.errorValue;
    this.traceback = details.traceback;
  }
}

export class StatementTimeoutError extends GlueRunnerError {
  constructor(public readonly statementId: number, public readonly timeoutSeconds: number) {
    super('Timed out waiting for statement to complete', 'STATEMENT_TIMEOUT');
    this.name = 'StatementTimeoutError';
  }
}

export type ModelPhase = 'session' | 'install' | 'model';

/**
 * The single error type surfaced by a model run. `cause` holds the underlying failure.
 */
export class PythonModelError extends GlueRunnerError {
  constructor(message: string, public readonly phase: ModelPhase, cause: unknown) {
    super(`Python model execution failed: ${message}`, 'MODEL_FAILED', { cause });
    this.name = 'PythonModelError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
