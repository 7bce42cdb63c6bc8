/**
 * @module typebridge/core/client/HttpTransport
 *
 * {@link Transport} over `@effect/platform`'s HttpClient.
 *
 * - `GET` methods put the request in the query string (see `rpc/query`).
 * - `POST` methods send the request as a JSON body.
 * - Streaming methods read Server-Sent Events, one envelope per event.
 *
 * @example
 * ```ts
 * import { FetchHttpClient } from "@effect/platform"
 *
 * const TransportLive = HttpTransport.layer({ baseUrl: "http://localhost:8080" }).pipe(
 *   Layer.provide(FetchHttpClient.layer),
 * )
 * ```
 *
 * @since 0.1.0
 */

import * as HttpClient from "@effect/platform/HttpClient"
import type * as HttpClientError from "@effect/platform/HttpClientError"
import * as HttpClientRequest from "@effect/platform/HttpClientRequest"
import type * as HttpClientResponse from "@effect/platform/HttpClientResponse"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Schedule from "effect/Schedule"
import * as Stream from "effect/Stream"
import { type ClientError, readEnvelope, TransportError } from "../rpc/errors.js"
import { toQueryParams } from "../rpc/query.js"
import * as Sse from "../rpc/sse.js"
import { type MethodMeta, Transport, type TransportService } from "./Transport.js"

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @since 0.1.0
 * @category models
 */
export interface HttpTransportConfig {
  /** Prepended to every method path. A trailing slash is ignored. */
  readonly baseUrl: string
  readonly headers: Readonly<Record<string, string>>
  /** Retries for `GET` calls that fail at the network level. */
  readonly retries: number
  /** Longest raw body kept on a `MalformedResponse` error. */
  readonly maxRawBody: number
}

/**
 * @since 0.1.0
 */
export const defaultConfig: Omit<HttpTransportConfig, "baseUrl"> = {
  headers: {},
  retries: 0,
  maxRawBody: 1000,
}

// ─────────────────────────────────────────────────────────────────────────────
// Requests
// ─────────────────────────────────────────────────────────────────────────────

const buildRequest = (
  config: HttpTransportConfig,
  meta: MethodMeta,
  request: unknown,
): HttpClientRequest.HttpClientRequest => {
  const url = `${config.baseUrl.replace(/\/+$/, "")}${meta.path}`
  const base = meta.httpMethod === "GET"
    ? HttpClientRequest.get(url).pipe(HttpClientRequest.setUrlParams(toQueryParams(request)))
    : HttpClientRequest.post(url).pipe(HttpClientRequest.bodyUnsafeJson(request ?? {}))
  return base.pipe(
    HttpClientRequest.setHeaders(config.headers),
    HttpClientRequest.accept(meta.kind === "streaming" ? Sse.contentType : "application/json"),
  )
}

// ─────────────────────────────────────────────────────────────────────────────
// Responses
// ─────────────────────────────────────────────────────────────────────────────

const networkError = (key: string) => (cause: HttpClientError.HttpClientError): TransportError =>
  new TransportError({ reason: "Network", message: `${key}: ${cause.message}`, cause })

const malformed = (config: HttpTransportConfig, key: string, httpStatus: number, body: string): TransportError =>
  new TransportError({
    reason: "MalformedResponse",
    message: `${key}: response is not an envelope (HTTP ${httpStatus})`,
    httpStatus,
    rawBody: body.slice(0, config.maxRawBody),
  })

/**
 * Interpret one response body. Success envelopes yield their `result`, error
 * envelopes fail with `RpcError`, anything else is a `MalformedResponse`.
 *
 * @since 0.1.0
 */
export const parseBody = (
  config: HttpTransportConfig,
  key: string,
  httpStatus: number,
  body: string,
): Effect.Effect<unknown, ClientError> =>
  Effect.try({
    try: (): unknown => JSON.parse(body),
    catch: () => malformed(config, key, httpStatus, body),
  }).pipe(
    Effect.flatMap((json): Effect.Effect<unknown, ClientError> =>
      Option.match(readEnvelope(json, httpStatus), {
        onNone: () => Effect.fail(malformed(config, key, httpStatus, body)),
        onSome: (envelope) =>
          envelope._tag === "Success" ? Effect.succeed(envelope.result) : Effect.fail(envelope.error),
      })
    ),
  )

const readStream = (
  config: HttpTransportConfig,
  key: string,
  response: HttpClientResponse.HttpClientResponse,
): Stream.Stream<unknown, ClientError> => {
  // Errors before the stream starts come back as a plain JSON envelope.
  const contentType = response.headers["content-type"] ?? ""
  if (!contentType.startsWith(Sse.contentType)) {
    return Stream.fromEffect(
      Effect.flatMap(
        Effect.mapError(response.text, networkError(key)),
        (body) => parseBody(config, key, response.status, body),
      ),
    )
  }
  return response.stream.pipe(
    Stream.mapError(networkError(key)),
    Stream.decodeText(),
    Stream.splitLines,
    Sse.events,
    Stream.mapEffect((data) => parseBody(config, key, response.status, data)),
  )
}

// ─────────────────────────────────────────────────────────────────────────────
// Layer
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @since 0.1.0
 * @category constructors
 */
export const make = (
  options: Partial<HttpTransportConfig> & { readonly baseUrl: string },
): Effect.Effect<TransportService, never, HttpClient.HttpClient> =>
  Effect.map(HttpClient.HttpClient, (client): TransportService => {
    const config: HttpTransportConfig = { ...defaultConfig, ...options }
    const retrying = config.retries > 0
      ? client.pipe(HttpClient.retryTransient({ schedule: Schedule.exponential("200 millis"), times: config.retries }))
      : client

    return {
      call: (key, meta, request) => {
        const http = meta.httpMethod === "GET" ? retrying : client
        return http.execute(buildRequest(config, meta, request)).pipe(
          Effect.flatMap((response) =>
            Effect.flatMap(response.text, (body) => parseBody(config, key, response.status, body))
          ),
          Effect.catchTags({
            RequestError: (error) => Effect.fail(networkError(key)(error)),
            ResponseError: (error) => Effect.fail(networkError(key)(error)),
          }),
        )
      },

      live: (key, meta, request) =>
        Stream.unwrap(
          client.execute(buildRequest(config, meta, request)).pipe(
            Effect.mapError(networkError(key)),
            Effect.map((response) => readStream(config, key, response)),
          ),
        ),
    }
  })

/**
 * @since 0.1.0
 * @category layers
 */
export const layer = (
  options: Partial<HttpTransportConfig> & { readonly baseUrl: string },
): Layer.Layer<Transport, never, HttpClient.HttpClient> => Layer.effect(Transport, make(options))
