/**
 * Error taxonomy for the DR agent.
 *
 * Per-relationship failures are collected into action results; only
 * configuration-shape errors abort a request before any remote call.
 */

export class DrError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'DrError';
    Object.setPrototypeOf(this, DrError.prototype);
  }
}

/**
 * Transport or authentication failure reaching a cluster. Retryable.
 */
export class ConnectionError extends DrError {
  constructor(
    message: string,
    public readonly cluster: string,
    public readonly cause?: Error,
  ) {
    super(message, 'CONNECTION_ERROR');
    this.name = 'ConnectionError';
    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

/**
 * An action was requested from a state it is not legal in. No remote
 * command is issued.
 */
export class PreconditionError extends DrError {
  constructor(
    message: string,
    public readonly expected: string[],
    public readonly actual: string,
  ) {
    super(message, 'PRECONDITION_FAILED');
    this.name = 'PreconditionError';
    Object.setPrototypeOf(this, PreconditionError.prototype);
  }
}

export type PartialBatchSummary = {
  succeeded: string[];
  failed: Array<{ volume: string; message: string }>;
  cancelled: string[];
};

export class PartialBatchFailure extends DrError {
  constructor(
    message: string,
    public readonly summary: PartialBatchSummary,
  ) {
    super(message, 'PARTIAL_BATCH_FAILURE');
    this.name = 'PartialBatchFailure';
    Object.setPrototypeOf(this, PartialBatchFailure.prototype);
  }
}

export class InconsistentDirectionError extends DrError {
  constructor(
    message: string,
    public readonly application: string,
  ) {
    super(message, 'INCONSISTENT_DIRECTION');
    this.name = 'InconsistentDirectionError';
    Object.setPrototypeOf(this, InconsistentDirectionError.prototype);
  }
}

/**
 * Appending to the audit log failed. Surfaced as a warning; the remote
 * action has already happened.
 */
export class AuditWriteError extends DrError {
  constructor(message: string, public readonly cause?: Error) {
    super(message, 'AUDIT_WRITE_FAILED');
    this.name = 'AuditWriteError';
    Object.setPrototypeOf(this, AuditWriteError.prototype);
  }
}

export class ConfigurationError extends DrError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class UnknownActionError extends DrError {
  constructor(public readonly action: string) {
    super(`unknown action: ${action}`, 'UNKNOWN_ACTION');
    this.name = 'UnknownActionError';
    Object.setPrototypeOf(this, UnknownActionError.prototype);
  }
}

export class CommandPolicyError extends DrError {
  constructor(message: string) {
    super(message, 'COMMAND_POLICY_VIOLATION');
    this.name = 'CommandPolicyError';
    Object.setPrototypeOf(this, CommandPolicyError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
