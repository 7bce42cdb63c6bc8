/**
 * @module typebridge/core/server/Devtools
 *
 * A `Devtools` service for development tooling: a heartbeat, process
 * information, and the list of registered services.
 *
 * @example
 * ```ts
 * yield* Devtools.register(registry, { port: 8080 })
 * ```
 *
 * @since 0.1.0
 */

import * as Arr from "effect/Array"
import * as Effect from "effect/Effect"
import * as os from "node:os"
import * as T from "../descriptor/constructors.js"
import * as Endpoint from "../registry/Endpoint.js"
import type { MethodDescriptor, Registry } from "../registry/Registry.js"
import type { RegistrationError } from "../../errors/index.js"

const devtoolsModule = "typebridge/devtools"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface PingResponse {
  readonly ok: boolean
}

export interface MemoryStats {
  readonly rss: number
  readonly heapTotal: number
  readonly heapUsed: number
  readonly external: number
}

export interface InfoResponse {
  readonly port: number
  readonly version: string
  readonly activeResources: number
  readonly cpuCount: number
  readonly uptimeSeconds: number
  readonly memory: MemoryStats
}

export interface StatusResponse {
  readonly ok: boolean
  readonly port: number
  /** Service name to method names, both sorted. */
  readonly services: Readonly<Record<string, ReadonlyArray<string>>>
}

export interface DevtoolsOptions {
  readonly port: number
  /** Reported by `Info`. Defaults to the Node.js version. */
  readonly version?: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Descriptors
// ─────────────────────────────────────────────────────────────────────────────

export const PingRequest: T.Struct = T.struct({ module: devtoolsModule, name: "PingRequest" }, () => [])

export const PingResponse: T.Struct = T.struct({ module: devtoolsModule, name: "PingResponse" }, () => [
  T.field("ok", T.bool),
])

export const InfoRequest: T.Struct = T.struct({ module: devtoolsModule, name: "InfoRequest" }, () => [])

export const MemoryStats: T.Struct = T.struct({ module: devtoolsModule, name: "MemoryStats", doc: "Bytes, as reported by the process." }, () => [
  T.field("rss", T.uint),
  T.field("heapTotal", T.uint),
  T.field("heapUsed", T.uint),
  T.field("external", T.uint),
])

export const InfoResponse: T.Struct = T.struct({ module: devtoolsModule, name: "InfoResponse" }, () => [
  T.field("port", T.int),
  T.field("version", T.string),
  T.field("activeResources", T.int, { doc: "Handles and requests keeping the event loop alive." }),
  T.field("cpuCount", T.int),
  T.field("uptimeSeconds", T.float),
  T.field("memory", MemoryStats),
])

export const StatusRequest: T.Struct = T.struct({ module: devtoolsModule, name: "StatusRequest" }, () => [])

export const StatusResponse: T.Struct = T.struct({ module: devtoolsModule, name: "StatusResponse" }, () => [
  T.field("ok", T.bool),
  T.field("port", T.int),
  T.field("services", T.map(T.string, T.list(T.string))),
])

// ─────────────────────────────────────────────────────────────────────────────
// Handlers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Group method descriptors by service. Input sorted by key gives sorted
 * output.
 *
 * @since 0.1.0
 */
export const servicesOf = (methods: ReadonlyArray<MethodDescriptor>): Record<string, Array<string>> => {
  const services: Record<string, Array<string>> = {}
  for (const method of methods) {
    const existing = services[method.service]
    if (existing === undefined) {
      services[method.service] = [method.method]
    } else {
      existing.push(method.method)
    }
  }
  return services
}

const info = (options: DevtoolsOptions): Effect.Effect<InfoResponse> =>
  Effect.sync(() => {
    const memory = process.memoryUsage()
    return {
      port: options.port,
      version: options.version ?? process.version,
      activeResources: process.getActiveResourcesInfo().length,
      cpuCount: os.cpus().length,
      uptimeSeconds: process.uptime(),
      memory: {
        rss: memory.rss,
        heapTotal: memory.heapTotal,
        heapUsed: memory.heapUsed,
        external: memory.external,
      },
    }
  })

/**
 * Register `Devtools.Ping`, `Devtools.Info` and `Devtools.Status` on
 * `registry`.
 *
 * @since 0.1.0
 */
export const register = (
  registry: Registry,
  options: DevtoolsOptions,
): Effect.Effect<ReadonlyArray<MethodDescriptor>, RegistrationError> => {
  const service = registry.service("Devtools")
  return Effect.all([
    service.register(
      "Ping",
      Endpoint.query<Record<string, never>, PingResponse>({
        request: PingRequest,
        response: PingResponse,
        handler: () => Effect.succeed({ ok: true }),
      }),
    ),
    service.register(
      "Info",
      Endpoint.query<Record<string, never>, InfoResponse>({
        request: InfoRequest,
        response: InfoResponse,
        handler: () => info(options),
      }),
    ),
    service.register(
      "Status",
      Endpoint.query<Record<string, never>, StatusResponse>({
        request: StatusRequest,
        response: StatusResponse,
        handler: () =>
          Effect.map(registry.methods, (methods) => ({
            ok: true,
            port: options.port,
            services: servicesOf(methods),
          })),
      }),
    ),
  ]).pipe(Effect.map((descriptors) => Arr.fromIterable(descriptors)))
}
