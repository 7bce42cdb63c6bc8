/**
 * @module typebridge/generator/emit/client
 *
 * Client Emitter. Renders `client.ts`: an interface per service with one
 * member per method, and constructors wiring those members to the client
 * runtime through the generated manifest.
 *
 * Unary members return an `Effect` of the response. Streaming members return a
 * `LiveHandle` whose `subscribe` delivers each value to a callback until the
 * returned function is called.
 *
 * @since 0.1.0
 */

import type { MethodDescriptor } from "../../core/registry/Registry.js"
import { groupByService } from "./manifest.js"
import { fileHeader, sibling, typeExpr, type RenderContext } from "./render.js"

const memberDoc = (method: MethodDescriptor): string =>
  method.kind === "streaming"
    ? `  /** Live: ${method.httpMethod} ${method.path} */\n`
    : `  /** ${method.httpMethod} ${method.path} */\n`

const renderMember = (method: MethodDescriptor, ctx: RenderContext): string => {
  const req = typeExpr(method.request, ctx, "types.")
  const res = typeExpr(method.response, ctx, "types.")
  const signature = method.kind === "streaming"
    ? `(request: ${req}) => LiveHandle<${res}>`
    : `(request: ${req}) => Effect.Effect<${res}, ClientError>`
  return `${memberDoc(method)}  readonly ${method.method}: ${signature};\n`
}

const renderBinding = (method: MethodDescriptor, ctx: RenderContext): string => {
  const req = typeExpr(method.request, ctx, "types.")
  const res = typeExpr(method.response, ctx, "types.")
  const fn = method.kind === "streaming" ? "live" : "call"
  return `    ${method.method}: runtime.${fn}<${req}, ${res}>(${JSON.stringify(method.key)}),\n`
}

/**
 * @since 0.1.0
 */
export const renderClientFile = (methods: ReadonlyArray<MethodDescriptor>, ctx: RenderContext): string => {
  const services = groupByService(methods)
  const runtimeModule = JSON.stringify(ctx.config.runtimeModule)

  const interfaces = services.map(([service, group]) =>
    `export interface ${service}Client {\n${group.map((m) => renderMember(m, ctx)).join("")}}\n`
  )
  const root = `export interface Client {\n${
    services.map(([service]) => `  readonly ${service}: ${service}Client;\n`).join("")
  }}\n`
  const bindings = services.map(([service, group]) =>
    `  ${service}: {\n${group.map((m) => renderBinding(m, ctx)).join("")}  },\n`
  )

  return fileHeader(ctx.config) +
    `import * as Effect from "effect/Effect";\n` +
    `import { ClientRuntime, type ClientError, type LiveHandle, type Transport } from ${runtimeModule};\n` +
    (methods.length > 0 ? `import type * as types from "${sibling(ctx.config, "types")}";\n` : "") +
    `import { registry } from "${sibling(ctx.config, "manifest")}";\n` +
    `\n` +
    interfaces.map((block) => `${block}\n`).join("") +
    root +
    `\n` +
    `export const makeClient = (runtime: ClientRuntime.ClientRuntime): Client => ({\n${bindings.join("")}});\n` +
    `\n` +
    `export const make: Effect.Effect<Client, never, Transport> = Effect.map(ClientRuntime.make(registry), makeClient);\n`
}
