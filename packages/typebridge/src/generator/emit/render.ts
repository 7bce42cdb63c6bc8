/**
 * @module typebridge/generator/emit/render
 *
 * Pieces shared by every emitter: file headers, JSDoc blocks and inline type
 * expressions.
 */

import { unwrapOptional, type PrimitiveKind, type TypeRef } from "../../core/descriptor/types.js"
import type { GeneratorConfig } from "../config.js"
import type { ResolvedNames } from "../resolve.js"

/**
 * @since 0.1.0
 * @category models
 */
export interface RenderContext {
  readonly config: GeneratorConfig
  readonly names: ResolvedNames
}

export const HEADER = "// Code generated by typebridge. DO NOT EDIT."

/**
 * Header plus the configured frontmatter, followed by a blank line.
 */
export const fileHeader = (config: GeneratorConfig): string =>
  config.frontmatter.trim() === ""
    ? `${HEADER}\n\n`
    : `${HEADER}\n${config.frontmatter.trimEnd()}\n\n`

/**
 * Relative import of a sibling generated file.
 */
export const sibling = (config: GeneratorConfig, base: string): string => `./${base}${config.importExtension}`

export const jsDoc = (doc: string | undefined, indent: string): string => {
  if (doc === undefined || doc.trim() === "") {
    return ""
  }
  const lines = doc.trim().replace(/\*\//g, "*\\/").split("\n").map((line) => line.trimEnd())
  if (lines.length === 1) {
    return `${indent}/** ${lines[0]} */\n`
  }
  return `${indent}/**\n${lines.map((line) => (line === "" ? `${indent} *` : `${indent} * ${line}`)).join("\n")}\n${indent} */\n`
}

export const docFor = (ctx: RenderContext, doc: string | undefined, indent: string): string =>
  ctx.config.emitComments ? jsDoc(doc, indent) : ""

// ─────────────────────────────────────────────────────────────────────────────
// Type Expressions
// ─────────────────────────────────────────────────────────────────────────────

export const primitiveType = (kind: PrimitiveKind): string => {
  switch (kind) {
    case "string":
    case "bytes":
    case "time":
      return "string"
    case "int":
    case "int64":
    case "uint":
    case "float":
    case "duration":
      return "number"
    case "bool":
      return "boolean"
    case "any":
      return "unknown"
    case "empty":
      return "Record<string, never>"
  }
}

/**
 * Render `ref` inline. Named types are written as `qualifier + name`, so
 * files that import the declarations as a namespace pass `"types."`.
 *
 * @since 0.1.0
 */
export const typeExpr = (ref: TypeRef, ctx: RenderContext, qualifier = ""): string => {
  switch (ref._tag) {
    case "Primitive":
      return primitiveType(ref.kind)
    case "Optional":
      return `${typeExpr(unwrapOptional(ref), ctx, qualifier)} | null`
    case "List": {
      const element = typeExpr(ref.element, ctx, qualifier)
      return ref.element._tag === "Optional" ? `(${element})[]` : `${element}[]`
    }
    case "Map": {
      const key = ref.key._tag === "Primitive" ? "string" : typeExpr(ref.key, ctx, qualifier)
      return `Record<${key}, ${typeExpr(ref.value, ctx, qualifier)}>`
    }
    case "Struct":
    case "Enum":
    case "Alias":
      return `${qualifier}${ctx.names.nameOf(ref.origin)}`
    case "Unsupported":
      return "never"
  }
}
