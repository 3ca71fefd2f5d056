/**
 * Error codes and payload shape for the plugin SDK.
 *
 * Every failure the runtime reports, whether thrown synchronously to the
 * caller or delivered to an `error` handler, carries one of these codes.
 */

// ---------------------------------------------------------------------------
// ErrorCode
// ---------------------------------------------------------------------------

export const ErrorCode = {
  /** Socket refused, reset, closed by the peer, or failed mid-write. */
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  /** An inbound line could not be decoded or failed the identity check. */
  PROTOCOL_ERROR: 'PROTOCOL_ERROR',
  /** A user handler threw or rejected. */
  HANDLER_ERROR: 'HANDLER_ERROR',
  /** A descriptor document failed validation. */
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  /** The caller passed bad arguments or called an operation out of order. */
  USAGE_ERROR: 'USAGE_ERROR',
  /** A write was attempted while no connection is open. */
  NOT_CONNECTED: 'NOT_CONNECTED',
  /** Queued outbound bytes would exceed the configured limit. */
  SEND_BUFFER_FULL: 'SEND_BUFFER_FULL',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ---------------------------------------------------------------------------
// ErrorPayload
// ---------------------------------------------------------------------------

/** Plain, serialisable form of an error. No stack traces. */
export interface ErrorPayload {
  code: ErrorCodeValue;
  message: string;
  /** Attribute or argument that caused the error. */
  field?: string;
}
