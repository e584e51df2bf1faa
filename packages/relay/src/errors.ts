// Relay Errors - Failure taxonomy shared across the pipeline

export type RelayErrorKind =
  | 'transient-io'
  | 'mapping'
  | 'validation'
  | 'overload'
  | 'fatal-config';

export abstract class RelayError extends Error {
  abstract readonly kind: RelayErrorKind;
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/** Desktop surface or socket temporarily unreachable. Retried, never fatal. */
export class TransientIOError extends RelayError {
  readonly kind = 'transient-io' as const;
}

/** A single message or action could not be translated; only that item is dropped. */
export class MappingError extends RelayError {
  readonly kind = 'mapping' as const;
}

/** An inbound action names an unknown contact or carries nothing deliverable. */
export class ValidationError extends RelayError {
  readonly kind = 'validation' as const;
}

/** A bounded buffer was full and its oldest entry was evicted. */
export class OverloadError extends RelayError {
  readonly kind = 'overload' as const;
}

/** Required configuration is missing; blocks start() of the affected subsystem. */
export class FatalConfigError extends RelayError {
  readonly kind = 'fatal-config' as const;
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wraps anything thrown by an I/O boundary so callers see one error kind. */
export function toTransient(error: unknown, context: string): TransientIOError {
  if (error instanceof TransientIOError) return error;
  return new TransientIOError(`${context}: ${describeError(error)}`, error);
}
