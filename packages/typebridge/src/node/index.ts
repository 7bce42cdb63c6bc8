/**
 * @module typebridge/node
 *
 * Node.js entry points: write generated files to disk, and serve a registry
 * over `node:http`.
 *
 * @example Generate
 * ```ts
 * import { Effect } from "effect"
 * import { generateToDir } from "typebridge/node"
 *
 * await Effect.runPromise(generateToDir(registry, { outDir: "client/src/api", stripPrefix: "acme/api" }))
 * ```
 *
 * @example Serve
 * ```ts
 * import { Layer } from "effect"
 * import { NodeRuntime } from "@effect/platform-node"
 * import { serve } from "typebridge/node"
 *
 * NodeRuntime.runMain(Layer.launch(serve(registry, { port: 8080 })))
 * ```
 */

import * as HttpServer from "@effect/platform/HttpServer"
import type { PlatformError } from "@effect/platform/Error"
import type { ServeError } from "@effect/platform/HttpServerError"
import * as NodeContext from "@effect/platform-node/NodeContext"
import * as NodeHttpServer from "@effect/platform-node/NodeHttpServer"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import { createServer } from "node:http"
import type { Registry } from "../core/registry/Registry.js"
import * as WebHandler from "../core/server/WebHandler.js"
import type { GenerationError } from "../errors/index.js"
import type { GeneratorOptions } from "../generator/config.js"
import * as Generate from "../generator/generate.js"

/**
 * {@link Generate.generateToDir} on the Node.js file system.
 *
 * @since 0.1.0
 */
export const generateToDir = (
  registry: Registry,
  options: GeneratorOptions = {},
): Effect.Effect<Generate.GenerateResult, GenerationError | PlatformError> =>
  Generate.generateToDir(registry, options).pipe(Effect.provide(NodeContext.layer))

/**
 * @since 0.1.0
 * @category models
 */
export interface ServeOptions extends Partial<WebHandler.WebHandlerConfig> {
  readonly port: number
  readonly host?: string
}

/**
 * Serve `registry` over HTTP until the layer is released. The registry is
 * frozen before the server starts.
 *
 * @since 0.1.0
 * @category layers
 */
export const serve = (registry: Registry, options: ServeOptions): Layer.Layer<never, ServeError> => {
  const { port, host, ...handler } = options
  return HttpServer.serve(WebHandler.httpApp(registry, handler)).pipe(
    HttpServer.withLogAddress,
    Layer.provide(NodeHttpServer.layer(createServer, host === undefined ? { port } : { port, host })),
    Layer.provide(Layer.effectDiscard(registry.freeze)),
  )
}
