/**
 * ClientError: structured error class for the plugin SDK.
 *
 * Every failure the SDK raises itself is a ClientError carrying an
 * {@link ErrorCode}. Failures thrown by user handlers are reported
 * through `error` events wrapping the original value.
 */

import type { ErrorCodeValue, ErrorPayload } from '../types/errors.js';
import { ErrorCode } from '../types/errors.js';
import type { Violation } from '../types/descriptor.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

/**
 * Symbol used to brand ClientError instances, so that instances created
 * by another copy of this module are still recognised.
 */
const CLIENT_ERROR_BRAND = Symbol.for('surface-plugin-sdk.ClientError');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ClientErrorOptions {
  code: ErrorCodeValue;
  message: string;
  /** Which argument or attribute caused the error. */
  field?: string;
  /** Underlying failure (socket error, handler throw, parse error). */
  cause?: unknown;
}

// ---------------------------------------------------------------------------
// ClientError class
// ---------------------------------------------------------------------------

export class ClientError extends Error {
  readonly code: ErrorCodeValue;
  readonly field?: string;

  /** @internal Brand for safe instanceof checks across module boundaries. */
  readonly [CLIENT_ERROR_BRAND] = true as const;

  constructor(options: ClientErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ClientError';
    this.code = options.code;

    if (options.field !== undefined) {
      this.field = options.field;
    }
  }

  /** Plain payload without stack or cause. */
  toErrorPayload(): ErrorPayload {
    const payload: ErrorPayload = {
      code: this.code,
      message: this.message,
    };

    if (this.field !== undefined) {
      payload.field = this.field;
    }

    return payload;
  }
}

// ---------------------------------------------------------------------------
// DescriptorValidationError
// ---------------------------------------------------------------------------

/** Raised when a descriptor fails validation. Carries every violation found. */
export class DescriptorValidationError extends ClientError {
  readonly violations: readonly Violation[];

  constructor(violations: readonly Violation[]) {
    const count = violations.length;
    super({
      code: ErrorCode.VALIDATION_FAILED,
      message: `Descriptor is invalid: ${count} violation${count === 1 ? '' : 's'}`,
    });
    this.name = 'DescriptorValidationError';
    this.violations = violations;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Shorthand for a synchronous usage error. */
export function usageError(message: string, field?: string): ClientError {
  return new ClientError({ code: ErrorCode.USAGE_ERROR, message, field });
}

/** Coerce an arbitrary thrown value into an Error. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : `Non-error thrown: ${String(value)}`);
}

// ---------------------------------------------------------------------------
// Type guard
// ---------------------------------------------------------------------------

/**
 * Type guard for ClientError instances, including ones created by another
 * copy of this module.
 */
export function isClientError(value: unknown): value is ClientError {
  if (value instanceof ClientError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    CLIENT_ERROR_BRAND in value &&
    Reflect.get(value, CLIENT_ERROR_BRAND) === true
  );
}
