/**
 * @module typebridge/core/client/ClientRuntime
 *
 * What generated `client.ts` files bind to. A runtime resolves method keys
 * against the generated manifest and forwards calls to the {@link Transport}.
 *
 * @since 0.1.0
 */

import * as Cause from "effect/Cause"
import * as Effect from "effect/Effect"
import * as Fiber from "effect/Fiber"
import * as Option from "effect/Option"
import * as Runtime from "effect/Runtime"
import * as Stream from "effect/Stream"
import { type ClientError, TransportError } from "../rpc/errors.js"
import { type MethodMeta, Transport, type TransportService } from "./Transport.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The `registry` value exported by a generated manifest.
 *
 * @since 0.1.0
 * @category models
 */
export interface ServiceRegistry {
  readonly metadata: Readonly<Record<string, MethodMeta>>
}

/**
 * A live subscription to a streaming method.
 *
 * @since 0.1.0
 * @category models
 */
export interface LiveHandle<A> {
  readonly stream: Stream.Stream<A, ClientError>
  /**
   * Deliver each value to `onValue` until the returned function is called.
   * Without `onError`, failures are logged.
   */
  readonly subscribe: (onValue: (value: A) => void, onError?: (error: ClientError) => void) => () => void
}

/**
 * @since 0.1.0
 * @category models
 */
export interface ClientRuntime {
  readonly registry: ServiceRegistry
  readonly call: <Req, Res>(key: string) => (request: Req) => Effect.Effect<Res, ClientError>
  readonly live: <Req, Res>(key: string) => (request: Req) => LiveHandle<Res>
}

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

const unknownMethod = (key: string): TransportError =>
  new TransportError({ reason: "UnknownMethod", message: `Unknown method: ${key}` })

/**
 * Subscribe to `stream` on `runtime`, forwarding values until unsubscribed.
 *
 * @since 0.1.0
 */
export const subscribeWith = <A>(
  runtime: Runtime.Runtime<never>,
  stream: Stream.Stream<A, ClientError>,
  onValue: (value: A) => void,
  onError?: (error: ClientError) => void,
): () => void => {
  let active = true
  const program = stream.pipe(
    Stream.runForEach((value) =>
      Effect.sync(() => {
        if (active) onValue(value)
      })
    ),
    Effect.catchAllCause((cause) => {
      if (Cause.isInterruptedOnly(cause)) {
        return Effect.void
      }
      const failure = Cause.failureOption(cause)
      if (Option.isSome(failure) && onError !== undefined) {
        return Effect.sync(() => {
          if (active) onError(failure.value)
        })
      }
      return Effect.logError("Live subscription failed", cause)
    }),
  )
  const fiber = Runtime.runFork(runtime)(program)
  return () => {
    if (!active) return
    active = false
    Runtime.runFork(runtime)(Fiber.interrupt(fiber))
  }
}

/**
 * Build a runtime from a transport and a generated registry.
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromTransport = (
  transport: TransportService,
  registry: ServiceRegistry,
  runtime: Runtime.Runtime<never> = Runtime.defaultRuntime,
): ClientRuntime => {
  const metaOf = (key: string): MethodMeta | undefined =>
    Object.prototype.hasOwnProperty.call(registry.metadata, key) ? registry.metadata[key] : undefined

  return {
    registry,

    // Responses are produced by the server from the same descriptors the
    // generated `Res` type was emitted from.
    call: <Req, Res>(key: string) => (request: Req): Effect.Effect<Res, ClientError> => {
      const meta = metaOf(key)
      if (meta === undefined) {
        return Effect.fail(unknownMethod(key))
      }
      return Effect.map(transport.call(key, meta, request), (result) => result as Res)
    },

    live: <Req, Res>(key: string) => (request: Req): LiveHandle<Res> => {
      const meta = metaOf(key)
      const stream: Stream.Stream<Res, ClientError> = meta === undefined
        ? Stream.fail(unknownMethod(key))
        : Stream.map(transport.live(key, meta, request), (value) => value as Res)
      return {
        stream,
        subscribe: (onValue, onError) => subscribeWith(runtime, stream, onValue, onError),
      }
    },
  }
}

/**
 * Resolve the {@link Transport} from context. Live subscriptions run on the
 * calling fiber's runtime.
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = (registry: ServiceRegistry): Effect.Effect<ClientRuntime, never, Transport> =>
  Effect.gen(function* () {
    const transport = yield* Transport
    const runtime = yield* Effect.runtime<never>()
    return fromTransport(transport, registry, runtime)
  })
