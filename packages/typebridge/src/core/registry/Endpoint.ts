/**
 * @module typebridge/core/registry/Endpoint
 *
 * An endpoint pairs request/response descriptors with a handler. Handlers
 * work on host values; the dispatcher decodes requests and encodes responses
 * with the descriptors.
 *
 * | Constructor | Kind        | HTTP verb |
 * |-------------|-------------|-----------|
 * | `query`     | unary       | GET       |
 * | `exec`      | unary       | POST      |
 * | `stream`    | streaming   | POST      |
 * | `live`      | streaming   | POST      |
 *
 * @since 0.1.0
 */

import * as Effect from "effect/Effect"
import * as Stream from "effect/Stream"
import type { Atom } from "../atom/Atom.js"
import * as T from "../descriptor/constructors.js"
import type { TypeRef } from "../descriptor/types.js"
import type { ServiceError } from "../rpc/errors.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type Primitive = "query" | "exec" | "stream" | "atom"

export type MethodKind = "unary" | "streaming"

export type HttpVerb = "GET" | "POST"

export interface UnaryEndpoint {
  readonly _tag: "Unary"
  readonly primitive: "query" | "exec"
  readonly request: TypeRef
  readonly response: TypeRef
  readonly handler: (request: unknown) => Effect.Effect<unknown, ServiceError>
}

export interface StreamingEndpoint {
  readonly _tag: "Streaming"
  readonly primitive: "stream" | "atom"
  readonly request: TypeRef
  readonly response: TypeRef
  readonly handler: (request: unknown) => Stream.Stream<unknown, ServiceError>
}

/**
 * @since 0.1.0
 * @category models
 */
export type Endpoint = UnaryEndpoint | StreamingEndpoint

export const kindOf = (endpoint: Endpoint): MethodKind =>
  endpoint._tag === "Unary" ? "unary" : "streaming"

export const verbOf = (primitive: Primitive): HttpVerb => (primitive === "query" ? "GET" : "POST")

interface Options<Handler> {
  readonly request: TypeRef
  readonly response: TypeRef
  readonly handler: Handler
}

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

// Requests reach handlers only after decoding against `request`, so the
// handler's declared input type is trusted from here on.
const unary = <Req, Res>(
  primitive: "query" | "exec",
  options: Options<(request: Req) => Effect.Effect<Res, ServiceError>>,
): UnaryEndpoint => ({
  _tag: "Unary",
  primitive,
  request: options.request,
  response: options.response,
  handler: (request) => options.handler(request as Req),
})

/**
 * A read-only call, sent as GET with the request in the query string.
 *
 * @since 0.1.0
 * @category constructors
 */
export const query = <Req, Res>(options: Options<(request: Req) => Effect.Effect<Res, ServiceError>>): UnaryEndpoint =>
  unary("query", options)

/**
 * A call with side effects, sent as POST.
 *
 * @since 0.1.0
 * @category constructors
 */
export const exec = <Req, Res>(options: Options<(request: Req) => Effect.Effect<Res, ServiceError>>): UnaryEndpoint =>
  unary("exec", options)

/**
 * A server stream of response values.
 *
 * @since 0.1.0
 * @category constructors
 */
export const stream = <Req, Res>(
  options: Options<(request: Req) => Stream.Stream<Res, ServiceError>>,
): StreamingEndpoint => ({
  _tag: "Streaming",
  primitive: "stream",
  request: options.request,
  response: options.response,
  handler: (request) => options.handler(request as Req),
})

/**
 * Serve an atom: each subscriber receives the current value, then every
 * update. The request carries no fields.
 *
 * @since 0.1.0
 * @category constructors
 */
export const live = <A>(atom: Atom<A>, options: { readonly response: TypeRef }): StreamingEndpoint => ({
  _tag: "Streaming",
  primitive: "atom",
  request: T.empty,
  response: options.response,
  handler: () => atom.changes,
})
