/**
 * @module typebridge/tests/test-utils
 *
 * A small shop API used across the generator, server and client tests.
 */

import * as HttpClient from "@effect/platform/HttpClient"
import type * as HttpClientError from "@effect/platform/HttpClientError"
import type * as HttpClientRequest from "@effect/platform/HttpClientRequest"
import * as HttpClientResponse from "@effect/platform/HttpClientResponse"
import * as UrlParams from "@effect/platform/UrlParams"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Atom from "../../core/atom/Atom.js"
import type { MethodMeta } from "../../core/client/Transport.js"
import type { ServiceRegistry } from "../../core/client/ClientRuntime.js"
import * as T from "../../core/descriptor/constructors.js"
import type { WireFormat } from "../../core/descriptor/naming.js"
import * as Endpoint from "../../core/registry/Endpoint.js"
import * as Registry from "../../core/registry/Registry.js"
import { ServiceError } from "../../core/rpc/errors.js"

// ─────────────────────────────────────────────────────────────────────────────
// Descriptors
// ─────────────────────────────────────────────────────────────────────────────

export const Color = T.enumeration({ module: "acme/api", name: "Color", doc: "Widget paint." }, [
  T.variant("Red", "red"),
  T.variant("Blue", "blue"),
])

export const Widget: T.Struct = T.struct({ module: "acme/api", name: "Widget" }, () => [
  T.field("id", T.int),
  T.field("name", T.string, { doc: "Display name." }),
  T.field("color", T.optional(Color)),
  T.field("tags", T.list(T.string)),
])

export const GetWidgetRequest = T.struct({ module: "acme/api", name: "GetWidgetRequest" }, () => [
  T.field("id", T.int),
])

export const V1User = T.struct({ module: "acme/api/v1", name: "User" }, () => [
  T.field("id", T.int64),
  T.field("email", T.string, { optional: true }),
])

export const V2User = T.struct({ module: "acme/api/v2", name: "User" }, () => [
  T.field("id", T.string),
])

export const ListUsersResponse = T.struct({ module: "acme/api", name: "ListUsersResponse" }, () => [
  T.field("legacy", T.list(V1User)),
  T.field("current", T.list(V2User)),
])

export const VisitCount = T.struct({ module: "acme/api", name: "VisitCount" }, () => [
  T.field("count", T.int),
])

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export interface WidgetValue {
  readonly id: number
  readonly name: string
  readonly color?: "red" | "blue"
  readonly tags: ReadonlyArray<string>
}

export interface Shop {
  readonly registry: Registry.Registry
  readonly visits: Atom.Atom<{ readonly count: number }>
}

/**
 * Methods: `Stats.Visits` (live), `Users.List` (query), `Widgets.Create`
 * (exec) and `Widgets.Get` (query).
 */
export const makeShop = (wire: Partial<WireFormat> = {}): Effect.Effect<Shop> =>
  Effect.gen(function* () {
    const registry = yield* Registry.make(wire)
    const visits = yield* Atom.make({ count: 0 })
    const widgets = registry.service("Widgets")

    yield* Effect.orDie(Effect.all([
      widgets.register(
        "Get",
        Endpoint.query<{ readonly id: number }, WidgetValue>({
          request: GetWidgetRequest,
          response: Widget,
          handler: ({ id }) =>
            id === 0
              ? Effect.fail(new ServiceError({ code: "not_found", message: `widget ${id} not found` }))
              : Effect.succeed({ id, name: `widget-${id}`, tags: [] }),
        }),
      ),
      widgets.register(
        "Create",
        Endpoint.exec<WidgetValue, WidgetValue>({
          request: Widget,
          response: Widget,
          handler: (widget) =>
            widget.name === ""
              ? Effect.fail(new ServiceError({ code: "invalid_argument", message: "name is required", details: {} }))
              : Effect.succeed(widget),
        }),
      ),
      registry.register(
        "Users",
        "List",
        Endpoint.query({
          request: T.empty,
          response: ListUsersResponse,
          handler: () => Effect.succeed({ legacy: [{ id: 1 }], current: [{ id: "u-1" }] }),
        }),
      ),
      registry.register("Stats", "Visits", Endpoint.live(visits, { response: VisitCount })),
    ]))

    return { registry, visits }
  })

/**
 * The `registry` a generated manifest would export for `registry`.
 */
export const serviceRegistryOf = (registry: Registry.Registry): Effect.Effect<ServiceRegistry> =>
  Effect.map(registry.methods, (methods) => ({
    metadata: Object.fromEntries(methods.map((m): readonly [string, MethodMeta] => [
      m.key,
      { path: m.path, httpMethod: m.httpMethod, kind: m.kind, primitive: m.primitive },
    ])),
  }))

// ─────────────────────────────────────────────────────────────────────────────
// Mock HttpClient Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a mock HttpClient that answers every request with `handler`.
 */
export const createMockHttpClient = (
  handler: (
    request: HttpClientRequest.HttpClientRequest,
  ) => Effect.Effect<HttpClientResponse.HttpClientResponse, HttpClientError.HttpClientError>,
): Layer.Layer<HttpClient.HttpClient> => {
  const postprocess = (
    requestEffect: Effect.Effect<HttpClientRequest.HttpClientRequest>,
  ): Effect.Effect<HttpClientResponse.HttpClientResponse, HttpClientError.HttpClientError> =>
    Effect.flatMap(requestEffect, handler)

  return Layer.succeed(HttpClient.HttpClient, HttpClient.makeWith(postprocess, Effect.succeed))
}

export const jsonResponse = (
  request: HttpClientRequest.HttpClientRequest,
  status: number,
  body: string,
  headers: Record<string, string> = { "content-type": "application/json" },
): HttpClientResponse.HttpClientResponse => HttpClientResponse.fromWeb(request, new Response(body, { status, headers }))

/**
 * Forward client requests to a web handler, as a fetch-based client would.
 */
export const webHandlerClient = (
  handler: (request: Request) => Promise<Response>,
): Layer.Layer<HttpClient.HttpClient> =>
  createMockHttpClient((request) => {
    const query = UrlParams.toString(request.urlParams)
    const url = query === "" ? request.url : `${request.url}?${query}`
    const body = request.body._tag === "Uint8Array" ? request.body.body : undefined
    return Effect.map(
      Effect.promise(() => handler(new Request(url, { method: request.method, headers: request.headers, body }))),
      (response) => HttpClientResponse.fromWeb(request, response),
    )
  })
