/**
 * @module typebridge/generator/emit/manifest
 *
 * Manifest / Discovery Builder. `manifest.ts` maps every method key to its
 * request and response types and to the routing metadata the client runtime
 * needs; `discovery.json` carries the same information for tools.
 *
 * @since 0.1.0
 */

import type { MethodDescriptor } from "../../core/registry/Registry.js"
import { fileHeader, sibling, typeExpr, type RenderContext } from "./render.js"

/**
 * @since 0.1.0
 * @category models
 */
export interface DiscoveryDocument {
  readonly services: ReadonlyArray<{
    readonly name: string
    readonly methods: ReadonlyArray<{
      readonly name: string
      readonly key: string
      readonly path: string
      readonly httpMethod: string
      readonly kind: string
      readonly primitive: string
      readonly request: string
      readonly response: string
    }>
  }>
}

/**
 * Methods grouped by service, both levels in name order. `methods` must
 * already be sorted by key.
 *
 * @since 0.1.0
 */
export const groupByService = (
  methods: ReadonlyArray<MethodDescriptor>,
): ReadonlyArray<readonly [string, ReadonlyArray<MethodDescriptor>]> => {
  const groups = new Map<string, Array<MethodDescriptor>>()
  for (const method of methods) {
    const group = groups.get(method.service)
    if (group === undefined) {
      groups.set(method.service, [method])
    } else {
      group.push(method)
    }
  }
  return [...groups.entries()]
}

/**
 * @since 0.1.0
 */
export const renderManifestFile = (methods: ReadonlyArray<MethodDescriptor>, ctx: RenderContext): string => {
  const entries = methods.map((method) =>
    `  ${JSON.stringify(method.key)}: {\n` +
    `    req: ${typeExpr(method.request, ctx, "types.")};\n` +
    `    res: ${typeExpr(method.response, ctx, "types.")};\n` +
    `  };\n`
  )
  const metadata = methods.map((method) =>
    `  ${JSON.stringify(method.key)}: { path: ${JSON.stringify(method.path)}, httpMethod: ${
      JSON.stringify(method.httpMethod)
    }, kind: ${JSON.stringify(method.kind)}, primitive: ${JSON.stringify(method.primitive)} },\n`
  )
  return fileHeader(ctx.config) +
    `import type { ServiceRegistry } from ${JSON.stringify(ctx.config.runtimeModule)};\n` +
    (methods.length > 0 ? `import type * as types from "${sibling(ctx.config, "types")}";\n` : "") +
    `\n` +
    `export interface Manifest {\n${entries.join("")}}\n` +
    `\n` +
    `export const metadata = {\n${metadata.join("")}} as const;\n` +
    `\n` +
    `export const registry: ServiceRegistry = { metadata };\n`
}

/**
 * @since 0.1.0
 */
export const buildDiscovery = (methods: ReadonlyArray<MethodDescriptor>, ctx: RenderContext): DiscoveryDocument => ({
  services: groupByService(methods).map(([name, group]) => ({
    name,
    methods: group.map((method) => ({
      name: method.method,
      key: method.key,
      path: method.path,
      httpMethod: method.httpMethod,
      kind: method.kind,
      primitive: method.primitive,
      request: typeExpr(method.request, ctx),
      response: typeExpr(method.response, ctx),
    })),
  })),
})

export const renderDiscoveryFile = (methods: ReadonlyArray<MethodDescriptor>, ctx: RenderContext): string =>
  `${JSON.stringify(buildDiscovery(methods, ctx), null, 2)}\n`
