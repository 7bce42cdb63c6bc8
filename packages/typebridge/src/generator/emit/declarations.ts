/**
 * @module typebridge/generator/emit/declarations
 *
 * Type Emitter. Renders `types.ts`: one declaration per discovered type,
 * sorted by emitted name. Struct fields keep their declaration order and are
 * keyed by their wire names.
 *
 * @since 0.1.0
 */

import * as Arr from "effect/Array"
import * as Order from "effect/Order"
import { wireName } from "../../core/descriptor/naming.js"
import {
  formatOrigin,
  hasPayloads,
  unwrapOptional,
  type AliasDecl,
  type EnumDecl,
  type Field,
  type StructDecl,
} from "../../core/descriptor/types.js"
import type { TypeNode } from "../extract.js"
import { propertyKey } from "../identifier.js"
import { docFor, fileHeader, typeExpr, type RenderContext } from "./render.js"

// ─────────────────────────────────────────────────────────────────────────────
// Warnings
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A non-fatal note about the generated output.
 *
 * @since 0.1.0
 * @category models
 */
export interface GenerationWarning {
  readonly code: "LARGE_INT_PRECISION"
  readonly type: string
  readonly message: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Declarations
// ─────────────────────────────────────────────────────────────────────────────

export const isOptionalField = (field: Field): boolean => field.optional || field.type._tag === "Optional"

const literal = (value: string | number): string => JSON.stringify(value)

const renderField = (field: Field, ctx: RenderContext): string => {
  const key = propertyKey(wireName(field, ctx.config.fieldCase))
  const type = typeExpr(unwrapOptional(field.type), ctx)
  const line = !isOptionalField(field)
    ? `  ${key}: ${type};`
    : ctx.config.optionalStyle === "null"
    ? `  ${key}: ${type} | null;`
    : `  ${key}?: ${type};`
  return `${docFor(ctx, field.doc, "  ")}${line}\n`
}

const renderStruct = (name: string, decl: StructDecl, ctx: RenderContext): string => {
  const fields = decl.fields()
  if (fields.length === 0) {
    return `export interface ${name} {}\n`
  }
  return `export interface ${name} {\n${fields.map((field) => renderField(field, ctx)).join("")}}\n`
}

const renderTaggedUnion = (name: string, decl: EnumDecl, ctx: RenderContext): string => {
  const members = decl.variants.map((variant) =>
    variant.payload === undefined
      ? `  | { type: ${literal(variant.value)} }`
      : `  | { type: ${literal(variant.value)}; payload: ${typeExpr(variant.payload, ctx)} }`
  )
  return `export type ${name} =\n${members.join("\n")};\n`
}

const renderEnum = (name: string, decl: EnumDecl, ctx: RenderContext): string => {
  if (decl.variants.length === 0) {
    return `export type ${name} = never;\n`
  }
  if (hasPayloads(decl)) {
    return renderTaggedUnion(name, decl, ctx)
  }
  switch (ctx.config.enumStyle) {
    case "union":
      return `export type ${name} = ${decl.variants.map((v) => literal(v.value)).join(" | ")};\n`
    case "enum":
    case "const_enum": {
      const keyword = ctx.config.enumStyle === "enum" ? "enum" : "const enum"
      const members = decl.variants.map((v) =>
        `${docFor(ctx, v.doc, "  ")}  ${propertyKey(v.name)} = ${literal(v.value)},\n`
      )
      return `export ${keyword} ${name} {\n${members.join("")}}\n`
    }
    case "object": {
      const members = decl.variants.map((v) =>
        `${docFor(ctx, v.doc, "  ")}  ${propertyKey(v.name)}: ${literal(v.value)},\n`
      )
      return `export const ${name} = {\n${members.join("")}} as const;\n` +
        `export type ${name} = (typeof ${name})[keyof typeof ${name}];\n`
    }
  }
}

const renderAlias = (name: string, decl: AliasDecl, ctx: RenderContext): string =>
  `export type ${name} = ${typeExpr(decl.underlying, ctx)};\n`

/**
 * @since 0.1.0
 */
export const renderDeclaration = (node: TypeNode, ctx: RenderContext): string => {
  const name = ctx.names.nameOf(node.origin)
  const decl = node.declaration
  const doc = docFor(ctx, decl.doc, "")
  switch (decl._tag) {
    case "Struct":
      return doc + renderStruct(name, decl, ctx)
    case "Enum":
      return doc + renderEnum(name, decl, ctx)
    case "Alias":
      return doc + renderAlias(name, decl, ctx)
  }
}

/**
 * Nodes sorted by the name they are emitted under.
 */
export const sortByName = (nodes: ReadonlyArray<TypeNode>, ctx: RenderContext): ReadonlyArray<TypeNode> =>
  Arr.sort(nodes, Order.mapInput(Order.string, (node: TypeNode) => ctx.names.nameOf(node.origin)))

/**
 * Render the whole `types.ts` file.
 *
 * @since 0.1.0
 */
export const renderTypesFile = (nodes: ReadonlyArray<TypeNode>, ctx: RenderContext): string => {
  const body = sortByName(nodes, ctx).map((node) => renderDeclaration(node, ctx)).join("\n")
  return body === "" ? `${fileHeader(ctx.config)}export {};\n` : `${fileHeader(ctx.config)}${body}`
}

/**
 * Fields whose values may exceed `Number.MAX_SAFE_INTEGER`.
 *
 * @since 0.1.0
 */
export const collectWarnings = (nodes: ReadonlyArray<TypeNode>): ReadonlyArray<GenerationWarning> =>
  nodes.flatMap((node) => {
    const decl = node.declaration
    if (decl._tag !== "Struct") {
      return []
    }
    return decl.fields()
      .filter((field) => {
        const inner = unwrapOptional(field.type)
        return inner._tag === "Primitive" && inner.kind === "int64"
      })
      .map((field): GenerationWarning => ({
        code: "LARGE_INT_PRECISION",
        type: formatOrigin(node.origin),
        message: `${formatOrigin(node.origin)}.${field.name} is a 64-bit integer; values above 2^53 lose precision as a JavaScript number`,
      }))
  })
