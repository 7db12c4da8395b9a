import type { BridgeErrorKind, CallFailure } from '@hostbridge/types';
import { isBridgeErrorKind } from './type_guards';

/**
 * An error that crosses the trust boundary as a typed failure.
 */
export class BridgeError extends Error {
  public readonly kind: BridgeErrorKind;

  constructor(kind: BridgeErrorKind, message: string) {
    super(message);
    this.name = kind;
    this.kind = kind;
  }

  toFailure(): CallFailure {
    return { kind: this.kind, message: this.message };
  }
}

/**
 * Raised to the host (never to content) when two contracts share a name.
 */
export class DuplicateCapabilityError extends Error {
  constructor(public readonly capability: string) {
    super(`Capability "${capability}" is already registered`);
    this.name = 'DuplicateCapability';
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Maps anything a handler threw into a failure content can receive. Only BridgeErrors keep
 * their kind; everything else is an OperationFailed.
 */
export function toFailure(error: unknown): CallFailure {
  if (error instanceof BridgeError) {
    return error.toFailure();
  }
  // Errors revived from another realm (or a plain object shaped like one)
  if (
    typeof error === 'object' &&
    error !== null &&
    'kind' in error &&
    isBridgeErrorKind(error.kind) &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: 'OperationFailed', message: describeError(error) };
}
