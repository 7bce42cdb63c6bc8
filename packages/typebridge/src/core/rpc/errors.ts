/**
 * @module typebridge/core/rpc/errors
 *
 * Wire-level errors shared by the server dispatcher and the client runtime,
 * plus the `{ result }` / `{ error }` envelope both sides speak.
 */

import * as Data from "effect/Data"
import * as Option from "effect/Option"
import * as Predicate from "effect/Predicate"
import * as Schema from "effect/Schema"

// ─────────────────────────────────────────────────────────────────────────────
// Error Codes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Machine-readable error codes carried in the error envelope.
 *
 * @since 0.1.0
 * @category models
 */
export const ErrorCode = Schema.Literal(
  "invalid_argument",
  "unauthenticated",
  "permission_denied",
  "not_found",
  "unavailable",
  "internal",
  "canceled",
)
export type ErrorCode = typeof ErrorCode.Type

const statusByCode: Record<ErrorCode, number> = {
  invalid_argument: 400,
  unauthenticated: 401,
  permission_denied: 403,
  not_found: 404,
  unavailable: 503,
  internal: 500,
  canceled: 499,
}

/**
 * HTTP status a transport should answer with for an error code. Unknown codes
 * map to 500.
 *
 * @since 0.1.0
 */
export const httpStatusFor = (code: string): number =>
  Schema.is(ErrorCode)(code) ? statusByCode[code] : 500

// ─────────────────────────────────────────────────────────────────────────────
// Type IDs
// ─────────────────────────────────────────────────────────────────────────────

export const RpcErrorTypeId: unique symbol = Symbol.for("typebridge/RpcError")
export type RpcErrorTypeId = typeof RpcErrorTypeId

export const TransportErrorTypeId: unique symbol = Symbol.for("typebridge/TransportError")
export type TransportErrorTypeId = typeof TransportErrorTypeId

export const ServiceErrorTypeId: unique symbol = Symbol.for("typebridge/ServiceError")
export type ServiceErrorTypeId = typeof ServiceErrorTypeId

export const WireErrorTypeId: unique symbol = Symbol.for("typebridge/WireError")
export type WireErrorTypeId = typeof WireErrorTypeId

// ─────────────────────────────────────────────────────────────────────────────
// Type Guards
// ─────────────────────────────────────────────────────────────────────────────

export const isRpcError = (u: unknown): u is RpcError =>
  Predicate.hasProperty(u, RpcErrorTypeId)

export const isTransportError = (u: unknown): u is TransportError =>
  Predicate.hasProperty(u, TransportErrorTypeId)

export const isServiceError = (u: unknown): u is ServiceError =>
  Predicate.hasProperty(u, ServiceErrorTypeId)

export const isWireError = (u: unknown): u is WireError =>
  Predicate.hasProperty(u, WireErrorTypeId)

export const isClientError = (u: unknown): u is ClientError =>
  isRpcError(u) || isTransportError(u)

// ─────────────────────────────────────────────────────────────────────────────
// Error Classes
// ─────────────────────────────────────────────────────────────────────────────

export type ErrorDetails = Readonly<Record<string, unknown>>

/**
 * An error the server answered with. `code`, `message` and `details` are the
 * envelope's fields, untouched.
 *
 * @since 0.1.0
 * @category errors
 */
export class RpcError extends Data.TaggedError("RpcError")<{
  readonly code: string
  readonly message: string
  readonly details?: ErrorDetails
  readonly httpStatus?: number
}> {
  readonly [RpcErrorTypeId]: RpcErrorTypeId = RpcErrorTypeId
}

/**
 * The request never produced an envelope: the network failed, or the body
 * could not be understood.
 *
 * @since 0.1.0
 * @category errors
 */
export class TransportError extends Data.TaggedError("TransportError")<{
  readonly reason: "Network" | "MalformedResponse" | "UnknownMethod"
  readonly message: string
  readonly httpStatus?: number
  readonly rawBody?: string
  readonly cause?: unknown
}> {
  readonly [TransportErrorTypeId]: TransportErrorTypeId = TransportErrorTypeId
}

/**
 * Raised by service handlers to answer with a specific error code.
 *
 * @example
 * ```ts
 * Effect.fail(new ServiceError({ code: "not_found", message: "no such user" }))
 * ```
 *
 * @since 0.1.0
 * @category errors
 */
export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly code: ErrorCode
  readonly message: string
  readonly details?: ErrorDetails
}> {
  readonly [ServiceErrorTypeId]: ServiceErrorTypeId = ServiceErrorTypeId
}

/**
 * A value did not match its type descriptor while crossing the wire.
 *
 * @since 0.1.0
 * @category errors
 */
export class WireError extends Data.TaggedError("WireError")<{
  readonly path: string
  readonly reason: string
}> {
  readonly [WireErrorTypeId]: WireErrorTypeId = WireErrorTypeId

  override get message(): string {
    return this.path === "" ? this.reason : `${this.path}: ${this.reason}`
  }
}

/**
 * Errors a generated client member can fail with.
 *
 * @since 0.1.0
 * @category errors
 */
export type ClientError = RpcError | TransportError

// ─────────────────────────────────────────────────────────────────────────────
// Envelope
// ─────────────────────────────────────────────────────────────────────────────

const ErrorBody = Schema.Struct({
  code: Schema.String,
  message: Schema.String,
  details: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.Unknown })),
})

/**
 * The error half of the envelope as it appears on the wire.
 *
 * @since 0.1.0
 * @category models
 */
export type ErrorBody = typeof ErrorBody.Type

/**
 * @since 0.1.0
 * @category models
 */
export type Envelope =
  | { readonly result: unknown }
  | { readonly error: ErrorBody }

export const successEnvelope = (result: unknown): Envelope => ({ result })

export const errorEnvelope = (error: ServiceError | RpcError): Envelope => ({
  error: error.details === undefined
    ? { code: error.code, message: error.message }
    : { code: error.code, message: error.message, details: error.details },
})

const decodeErrorBody = Schema.decodeUnknownOption(ErrorBody)

/**
 * Interpret a parsed JSON body. `None` when the value is neither envelope
 * shape.
 *
 * @since 0.1.0
 */
export const readEnvelope = (
  u: unknown,
  httpStatus?: number,
): Option.Option<{ readonly _tag: "Success"; readonly result: unknown } | { readonly _tag: "Failure"; readonly error: RpcError }> => {
  if (Predicate.hasProperty(u, "error") && u.error !== null && u.error !== undefined) {
    return Option.map(decodeErrorBody(u.error), (body) => ({
      _tag: "Failure" as const,
      error: new RpcError({
        code: body.code,
        message: body.message,
        ...(body.details !== undefined ? { details: body.details } : {}),
        ...(httpStatus !== undefined ? { httpStatus } : {}),
      }),
    }))
  }
  if (Predicate.hasProperty(u, "result")) {
    return Option.some({ _tag: "Success" as const, result: u.result })
  }
  return Option.none()
}
