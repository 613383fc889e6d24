/**
 * Dispatcher Errors
 *
 * Typed errors raised inside the dispatcher's components. Each one knows the
 * Failure envelope it becomes, so the dispatcher can hand callers a value
 * instead of an exception.
 */

import type { Failure, FailureKind } from './types.js';

export type ValidationReason = 'missingRequired' | 'wrongType' | 'unknownParameter' | 'unsupportedMode';

export type TransportReason =
  | 'timeout'
  | 'connectionReset'
  | 'connectionRefused'
  | 'dnsFailure'
  | 'tlsError'
  | 'credentialsUnavailable'
  | 'unknown';

/**
 * Base class for every error the dispatcher turns into a Failure
 */
export abstract class DispatchError extends Error {
  abstract readonly kind: FailureKind;
  readonly reason?: string;
  readonly retryable: boolean;

  constructor(message: string, reason?: string, retryable: boolean = false) {
    super(message);
    this.reason = reason;
    this.retryable = retryable;
  }

  protected failureDetails(): Record<string, unknown> | undefined {
    return undefined;
  }

  toFailure(): Failure {
    const failure: Failure = {
      ok: false,
      kind: this.kind,
      message: this.message,
      retryable: this.retryable,
    };
    if (this.reason) {
      failure.reason = this.reason;
    }
    const details = this.failureDetails();
    if (details) {
      failure.details = details;
    }
    return failure;
  }
}

/**
 * Error thrown when a tool id is not in the registry
 */
export class OperationNotFoundError extends DispatchError {
  readonly kind = 'NotFound' as const;

  constructor(readonly toolId: string) {
    super(`Unknown tool: ${toolId}`);
    this.name = 'OperationNotFoundError';
    Error.captureStackTrace(this, OperationNotFoundError);
  }

  protected failureDetails(): Record<string, unknown> {
    return { toolId: this.toolId };
  }
}

/**
 * Error thrown when arguments do not bind to a descriptor.
 * Never reaches the network.
 */
export class ValidationError extends DispatchError {
  readonly kind = 'ValidationError' as const;

  constructor(
    readonly validationReason: ValidationReason,
    readonly parameter: string | undefined,
    message: string,
  ) {
    super(message, validationReason);
    this.name = 'ValidationError';
    Error.captureStackTrace(this, ValidationError);
  }

  protected failureDetails(): Record<string, unknown> | undefined {
    return this.parameter === undefined ? undefined : { parameter: this.parameter };
  }
}

export class TransportError extends DispatchError {
  readonly kind = 'TransportError' as const;

  constructor(readonly transportReason: TransportReason, message: string, readonly attempts: number = 1) {
    super(message, transportReason, isTransientTransportReason(transportReason));
    this.name = 'TransportError';
    Error.captureStackTrace(this, TransportError);
  }

  protected failureDetails(): Record<string, unknown> {
    return { attempts: this.attempts };
  }
}

/**
 * Error thrown when a caller's abort signal fires
 */
export class CancelledError extends DispatchError {
  readonly kind = 'Cancelled' as const;

  constructor(message: string = 'Operation cancelled by caller') {
    super(message);
    this.name = 'CancelledError';
    Error.captureStackTrace(this, CancelledError);
  }
}

/**
 * Error thrown when the operation catalogue is malformed.
 * Aborts startup; it is never converted into a Failure.
 */
export class CatalogueError extends Error {
  constructor(readonly problems: readonly string[]) {
    super(`Invalid operation catalogue:\n  - ${problems.join('\n  - ')}`);
    this.name = 'CatalogueError';
    Error.captureStackTrace(this, CatalogueError);
  }
}

export function isTransientTransportReason(reason: TransportReason): boolean {
  return reason === 'timeout' || reason === 'connectionReset' || reason === 'connectionRefused';
}

export function cancelledFailure(message?: string): Failure {
  return new CancelledError(message).toFailure();
}
