/**
 * @module typebridge/core/server/Server
 *
 * Dispatch against a registry. A call takes a wire request, decodes it with
 * the method's request descriptor, runs the handler and encodes the response.
 * Failures become `ServiceError`s and, at the edge, error envelopes.
 *
 * @since 0.1.0
 */

import * as Cause from "effect/Cause"
import * as Clock from "effect/Clock"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Ref from "effect/Ref"
import * as Stream from "effect/Stream"
import { Transport, type TransportService } from "../client/Transport.js"
import * as Wire from "../descriptor/wire.js"
import type { StreamingEndpoint, UnaryEndpoint } from "../registry/Endpoint.js"
import type { Registry } from "../registry/Registry.js"
import {
  type Envelope,
  errorEnvelope,
  httpStatusFor,
  type RpcError,
  readEnvelope,
  ServiceError,
  successEnvelope,
  TransportError,
} from "../rpc/errors.js"
import { generateRequestId, logCall, logEvent } from "../../shared/logging.js"

// ─────────────────────────────────────────────────────────────────────────────
// Internal
// ─────────────────────────────────────────────────────────────────────────────

const lookupUnary = (registry: Registry, key: string): Effect.Effect<UnaryEndpoint, ServiceError> =>
  Effect.flatMap(registry.lookup(key), (entry) => {
    if (Option.isNone(entry)) {
      return Effect.fail(new ServiceError({ code: "not_found", message: `Unknown method: ${key}` }))
    }
    const endpoint = entry.value.endpoint
    return endpoint._tag === "Unary"
      ? Effect.succeed(endpoint)
      : Effect.fail(new ServiceError({ code: "invalid_argument", message: `${key} is a streaming method` }))
  })

const lookupStreaming = (registry: Registry, key: string): Effect.Effect<StreamingEndpoint, ServiceError> =>
  Effect.flatMap(registry.lookup(key), (entry) => {
    if (Option.isNone(entry)) {
      return Effect.fail(new ServiceError({ code: "not_found", message: `Unknown method: ${key}` }))
    }
    const endpoint = entry.value.endpoint
    return endpoint._tag === "Streaming"
      ? Effect.succeed(endpoint)
      : Effect.fail(new ServiceError({ code: "invalid_argument", message: `${key} is a unary method` }))
  })

const decodeRequest = (
  registry: Registry,
  endpoint: UnaryEndpoint | StreamingEndpoint,
  body: unknown,
): Effect.Effect<unknown, ServiceError> =>
  Either.match(Wire.decode(endpoint.request, body ?? {}, registry.wire), {
    onLeft: (error) =>
      Effect.fail(
        new ServiceError({ code: "invalid_argument", message: error.message, details: { path: error.path } }),
      ),
    onRight: (request) => Effect.succeed(request),
  })

const encodeResponse = (
  registry: Registry,
  endpoint: UnaryEndpoint | StreamingEndpoint,
  key: string,
  value: unknown,
): Effect.Effect<unknown, ServiceError> =>
  Either.match(Wire.encode(endpoint.response, value, registry.wire), {
    onLeft: (error) =>
      Effect.zipRight(
        Effect.logError(`${key} produced a response that does not match its descriptor: ${error.message}`),
        Effect.fail(new ServiceError({ code: "internal", message: "internal error" })),
      ),
    onRight: (encoded) => Effect.succeed(encoded),
  })

const internalOnDefect = (key: string) => (defect: unknown): Effect.Effect<never, ServiceError> =>
  Effect.zipRight(
    Effect.logError(`${key} handler died`, defect),
    Effect.fail(new ServiceError({ code: "internal", message: "internal error" })),
  )

const recoverDefects = (key: string) => <A>(stream: Stream.Stream<A, ServiceError>): Stream.Stream<A, ServiceError> =>
  Stream.catchAllCause(stream, (cause) =>
    Option.match(Cause.failureOption(cause), {
      onSome: (error) => Stream.fail(error),
      onNone: () =>
        Cause.isInterruptedOnly(cause)
          ? Stream.failCause(cause)
          : Stream.fromEffect(internalOnDefect(key)(Cause.squash(cause))),
    }))

// ─────────────────────────────────────────────────────────────────────────────
// Unary
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run a unary method on a wire request, producing the wire response.
 *
 * @since 0.1.0
 */
export const call = (registry: Registry, key: string, body: unknown): Effect.Effect<unknown, ServiceError> =>
  logCall(
    key,
    body,
    Effect.gen(function* () {
      const endpoint = yield* lookupUnary(registry, key)
      const request = yield* decodeRequest(registry, endpoint, body)
      const response = yield* endpoint.handler(request).pipe(Effect.catchAllDefect(internalOnDefect(key)))
      return yield* encodeResponse(registry, endpoint, key, response)
    }),
  )

/**
 * {@link call}, folded into an envelope.
 *
 * @since 0.1.0
 */
export const invoke = (registry: Registry, key: string, body: unknown): Effect.Effect<Envelope> =>
  Effect.match(call(registry, key, body), {
    onFailure: errorEnvelope,
    onSuccess: successEnvelope,
  })

// ─────────────────────────────────────────────────────────────────────────────
// Streaming
// ─────────────────────────────────────────────────────────────────────────────

const withLiveLogging = <A, E>(key: string, stream: Stream.Stream<A, E>): Stream.Stream<A, E> =>
  Stream.unwrap(
    Effect.gen(function* () {
      const subscriptionId = generateRequestId()
      const startTime = yield* Clock.currentTimeMillis
      const messages = yield* Ref.make(0)
      const reason = yield* Ref.make<"complete" | "interrupted" | "error">("interrupted")
      yield* logEvent({ _tag: "LiveStart", method: key, subscriptionId })

      const finish = Effect.gen(function* () {
        const endTime = yield* Clock.currentTimeMillis
        yield* logEvent({
          _tag: "LiveEnd",
          method: key,
          subscriptionId,
          messages: yield* Ref.get(messages),
          durationMs: Number(endTime - startTime),
          reason: yield* Ref.get(reason),
        })
      })

      return stream.pipe(
        Stream.tap(() => Ref.update(messages, (n) => n + 1)),
        Stream.onError(() => Ref.set(reason, "error")),
        Stream.concat(Stream.execute(Ref.set(reason, "complete"))),
        Stream.ensuring(finish),
      )
    }),
  )

/**
 * Resolve and decode a streaming call. Lookup and decode failures surface
 * here, before any value is produced.
 *
 * @since 0.1.0
 */
export const openStream = (
  registry: Registry,
  key: string,
  body: unknown,
): Effect.Effect<Stream.Stream<unknown, ServiceError>, ServiceError> =>
  Effect.gen(function* () {
    const endpoint = yield* lookupStreaming(registry, key)
    const request = yield* decodeRequest(registry, endpoint, body)
    const values = endpoint.handler(request).pipe(
      recoverDefects(key),
      Stream.mapEffect((value) => encodeResponse(registry, endpoint, key, value)),
    )
    return withLiveLogging(key, values)
  })

/**
 * Run a streaming method on a wire request.
 *
 * @since 0.1.0
 */
export const stream = (registry: Registry, key: string, body: unknown): Stream.Stream<unknown, ServiceError> =>
  Stream.unwrap(openStream(registry, key, body))

/**
 * {@link stream} as envelopes. A failure becomes one final error envelope.
 *
 * @since 0.1.0
 */
export const streamEnvelopes = (registry: Registry, key: string, body: unknown): Stream.Stream<Envelope> =>
  stream(registry, key, body).pipe(
    Stream.map(successEnvelope),
    Stream.catchAll((error) => Stream.make(errorEnvelope(error))),
  )

// ─────────────────────────────────────────────────────────────────────────────
// In-process transport
// ─────────────────────────────────────────────────────────────────────────────

// Envelopes go through JSON text so in-process calls see exactly what an HTTP
// client would.
const roundTrip = (key: string, value: unknown): Effect.Effect<unknown, TransportError> =>
  Effect.try({
    try: (): unknown => JSON.parse(JSON.stringify(value)),
    catch: (cause) =>
      new TransportError({ reason: "MalformedResponse", message: `${key}: value is not JSON-serializable`, cause }),
  })

const readResult = (key: string, envelope: Envelope): Effect.Effect<unknown, RpcError | TransportError> =>
  Effect.flatMap(roundTrip(key, envelope), (json): Effect.Effect<unknown, RpcError | TransportError> => {
    const httpStatus = "error" in envelope ? httpStatusFor(envelope.error.code) : 200
    return Option.match(readEnvelope(json, httpStatus), {
      onNone: () =>
        Effect.fail(new TransportError({ reason: "MalformedResponse", message: `${key}: response is not an envelope` })),
      onSome: (read) => (read._tag === "Success" ? Effect.succeed(read.result) : Effect.fail(read.error)),
    })
  })

/**
 * A {@link TransportService} that dispatches straight to `registry`.
 *
 * @since 0.1.0
 * @category constructors
 */
export const makeTransport = (registry: Registry): TransportService => ({
  call: (key, _meta, request) =>
    Effect.flatMap(roundTrip(key, request), (body) =>
      Effect.flatMap(invoke(registry, key, body), (envelope) => readResult(key, envelope))),

  live: (key, _meta, request) =>
    Stream.unwrap(
      Effect.map(roundTrip(key, request), (body) =>
        Stream.mapEffect(streamEnvelopes(registry, key, body), (envelope) => readResult(key, envelope))),
    ),
})

/**
 * Provide {@link Transport} in-process. Useful for tests and for servers
 * calling their own methods. Building the layer freezes the registry.
 *
 * @since 0.1.0
 * @category layers
 */
export const layer = (registry: Registry): Layer.Layer<Transport> =>
  Layer.effect(Transport, Effect.as(registry.freeze, makeTransport(registry)))
