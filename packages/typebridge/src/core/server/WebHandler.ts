/**
 * @module typebridge/core/server/WebHandler
 *
 * Serve a registry over HTTP as an `HttpApp`, or as a web-standard
 * `(Request) => Promise<Response>` handler for any server that speaks fetch.
 *
 * | Route                   | Verb                | Response                   |
 * |-------------------------|---------------------|----------------------------|
 * | `/Service/Method` query | GET (query string)  | JSON envelope              |
 * | `/Service/Method` exec  | POST (JSON body)    | JSON envelope              |
 * | `/Service/Method` live  | POST (JSON body)    | `text/event-stream`        |
 *
 * @example
 * ```ts
 * const handler = WebHandler.toWebHandler(registry)
 * const response = await handler(new Request("http://localhost/Users/Get?id=1"))
 * ```
 *
 * @since 0.1.0
 */

import * as Headers from "@effect/platform/Headers"
import * as HttpApp from "@effect/platform/HttpApp"
import * as HttpServerRequest from "@effect/platform/HttpServerRequest"
import * as HttpServerResponse from "@effect/platform/HttpServerResponse"
import * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as Schedule from "effect/Schedule"
import * as Stream from "effect/Stream"
import type { MethodDescriptor, Registry } from "../registry/Registry.js"
import { fromQueryParams } from "../rpc/query.js"
import { errorEnvelope, httpStatusFor, ServiceError, successEnvelope, type Envelope } from "../rpc/errors.js"
import * as Sse from "../rpc/sse.js"
import * as Server from "./Server.js"

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @since 0.1.0
 * @category models
 */
export interface WebHandlerConfig {
  /** Mount point; `"/rpc"` serves `/rpc/Service/Method`. */
  readonly basePath: string
  /** Interval between `: heartbeat` comments on event streams. */
  readonly heartbeatInterval: Duration.DurationInput
}

/**
 * @since 0.1.0
 */
export const defaultConfig: WebHandlerConfig = {
  basePath: "",
  heartbeatInterval: Duration.seconds(15),
}

// ─────────────────────────────────────────────────────────────────────────────
// Responses
// ─────────────────────────────────────────────────────────────────────────────

const envelopeResponse = (envelope: Envelope, status?: number): HttpServerResponse.HttpServerResponse =>
  HttpServerResponse.unsafeJson(envelope, {
    status: status ?? ("error" in envelope ? httpStatusFor(envelope.error.code) : 200),
  })

const failure = (error: ServiceError, status?: number): HttpServerResponse.HttpServerResponse =>
  envelopeResponse(errorEnvelope(error), status)

const eventStream = (
  values: Stream.Stream<unknown, ServiceError>,
  config: WebHandlerConfig,
): HttpServerResponse.HttpServerResponse => {
  const events = values.pipe(
    Stream.map((value) => Sse.formatEvent(successEnvelope(value))),
    Stream.catchAll((error) => Stream.make(Sse.formatEvent(errorEnvelope(error)))),
  )
  const heartbeats = Stream.fromSchedule(Schedule.spaced(config.heartbeatInterval)).pipe(
    Stream.as(Sse.heartbeat),
  )
  return HttpServerResponse.stream(
    Stream.merge(events, heartbeats, { haltStrategy: "left" }).pipe(Stream.encodeText),
    {
      contentType: Sse.contentType,
      headers: Headers.fromInput({ "cache-control": "no-cache" }),
    },
  )
}

// ─────────────────────────────────────────────────────────────────────────────
// Request handling
// ─────────────────────────────────────────────────────────────────────────────

const readBody = (request: HttpServerRequest.HttpServerRequest): Effect.Effect<unknown, ServiceError> =>
  request.text.pipe(
    Effect.mapError(() => new ServiceError({ code: "invalid_argument", message: "unreadable request body" })),
    Effect.flatMap((text) =>
      text.trim() === ""
        ? Effect.succeed({})
        : Effect.try({
          try: (): unknown => JSON.parse(text),
          catch: () => new ServiceError({ code: "invalid_argument", message: "request body is not valid JSON" }),
        })
    ),
  )

const methodKey = (pathname: string, basePath: string): Option.Option<string> => {
  const base = basePath.replace(/\/+$/, "")
  if (base !== "" && !pathname.startsWith(`${base}/`)) {
    return Option.none()
  }
  const match = /^\/([A-Za-z][A-Za-z0-9_]*)\/([A-Za-z][A-Za-z0-9_]*)$/.exec(pathname.slice(base.length))
  return match === null ? Option.none() : Option.some(`${match[1]}.${match[2]}`)
}

const dispatch = (
  registry: Registry,
  descriptor: MethodDescriptor,
  body: unknown,
  config: WebHandlerConfig,
): Effect.Effect<HttpServerResponse.HttpServerResponse> =>
  descriptor.kind === "unary"
    ? Effect.map(Server.invoke(registry, descriptor.key, body), (envelope) => envelopeResponse(envelope))
    : Effect.match(Server.openStream(registry, descriptor.key, body), {
      onFailure: (error) => failure(error),
      onSuccess: (values) => eventStream(values, config),
    })

/**
 * @since 0.1.0
 * @category constructors
 */
export const httpApp = (
  registry: Registry,
  options: Partial<WebHandlerConfig> = {},
): HttpApp.Default<never, never> => {
  const config: WebHandlerConfig = { ...defaultConfig, ...options }
  return Effect.gen(function* () {
    // Serving has begun; later registrations would be missing from the manifest.
    yield* registry.freeze
    const request = yield* HttpServerRequest.HttpServerRequest
    const url = new URL(request.url, "http://localhost")
    const key = methodKey(url.pathname, config.basePath)
    const entry = Option.isSome(key) ? yield* registry.lookup(key.value) : Option.none()
    if (Option.isNone(entry)) {
      return failure(new ServiceError({ code: "not_found", message: `No method at ${url.pathname}` }))
    }
    const descriptor = entry.value.descriptor
    if (request.method !== descriptor.httpMethod) {
      return HttpServerResponse.setHeader(
        failure(
          new ServiceError({ code: "invalid_argument", message: `${descriptor.key} requires ${descriptor.httpMethod}` }),
          405,
        ),
        "allow",
        descriptor.httpMethod,
      )
    }
    if (descriptor.httpMethod === "GET") {
      return yield* dispatch(registry, descriptor, fromQueryParams(descriptor.request, url.searchParams, registry.wire), config)
    }
    return yield* Effect.matchEffect(readBody(request), {
      onFailure: (error) => Effect.succeed(failure(error)),
      onSuccess: (body) => dispatch(registry, descriptor, body, config),
    })
  })
}

/**
 * @since 0.1.0
 * @category constructors
 */
export const toWebHandler = (
  registry: Registry,
  options: Partial<WebHandlerConfig> = {},
): (request: Request) => Promise<Response> => HttpApp.toWebHandler(httpApp(registry, options))
