/**
 * @module typebridge/generator/emit/schemas
 *
 * Runtime validation schemas, emitted next to `types.ts` when a flavor is
 * configured: `schemas.effect.ts` (effect/Schema) or `schemas.zod.ts` (zod).
 *
 * Schemas are declared dependencies-first. A reference to a schema that is
 * not declared yet (a cycle) goes through `Schema.suspend` / `z.lazy`, and the
 * schema containing it is annotated with its type so the compiler can check
 * the recursion.
 *
 * @since 0.1.0
 */

import { wireName } from "../../core/descriptor/naming.js"
import {
  hasPayloads,
  originKey,
  unwrapOptional,
  type Declaration,
  type PrimitiveKind,
  type TypeRef,
} from "../../core/descriptor/types.js"
import type { Flavor, GeneratorConfig } from "../config.js"
import type { TypeNode } from "../extract.js"
import { propertyKey } from "../identifier.js"
import { isOptionalField, sortByName } from "./declarations.js"
import { fileHeader, sibling, type RenderContext } from "./render.js"

// ─────────────────────────────────────────────────────────────────────────────
// Dialects
// ─────────────────────────────────────────────────────────────────────────────

interface ObjectField {
  readonly key: string
  readonly value: string
}

interface Dialect {
  readonly fileName: string
  readonly importLine: string
  readonly primitive: (kind: PrimitiveKind) => string
  readonly nullable: (schema: string) => string
  readonly optionalField: (schema: string, config: GeneratorConfig) => string
  readonly array: (schema: string) => string
  readonly record: (key: string, value: string) => string
  readonly literals: (values: ReadonlyArray<string | number>) => string
  readonly nativeEnum: (type: string) => string
  readonly object: (fields: ReadonlyArray<ObjectField>, indent: string) => string
  readonly inlineObject: (fields: ReadonlyArray<ObjectField>) => string
  readonly taggedUnion: (members: ReadonlyArray<string>) => string
  readonly lazy: (schema: string, type: string) => string
  readonly annotation: (type: string) => string
}

const literal = (value: string | number): string => JSON.stringify(value)

const objectBody = (fields: ReadonlyArray<ObjectField>, indent: string): string =>
  fields.map((f) => `${indent}  ${f.key}: ${f.value},\n`).join("")

const effectDialect: Dialect = {
  fileName: "schemas.effect.ts",
  importLine: `import * as Schema from "effect/Schema";`,
  primitive: (kind) => {
    switch (kind) {
      case "string":
      case "bytes":
      case "time":
        return "Schema.String"
      case "int":
      case "int64":
        return "Schema.Int"
      case "uint":
        return "Schema.NonNegativeInt"
      case "float":
      case "duration":
        return "Schema.Number"
      case "bool":
        return "Schema.Boolean"
      case "any":
        return "Schema.Unknown"
      case "empty":
        return "Schema.Struct({})"
    }
  },
  nullable: (schema) => `Schema.NullOr(${schema})`,
  optionalField: (schema, config) =>
    config.optionalStyle === "null" ? `Schema.NullOr(${schema})` : `Schema.optional(${schema})`,
  // Generated interfaces use mutable arrays.
  array: (schema) => `Schema.mutable(Schema.Array(${schema}))`,
  record: (key, value) => `Schema.Record({ key: ${key}, value: ${value} })`,
  literals: (values) => (values.length === 0 ? "Schema.Never" : `Schema.Literal(${values.map(literal).join(", ")})`),
  nativeEnum: (type) => `Schema.Enums(${type})`,
  object: (fields, indent) =>
    fields.length === 0 ? "Schema.Struct({})" : `Schema.Struct({\n${objectBody(fields, indent)}${indent}})`,
  inlineObject: (fields) => `Schema.Struct({ ${fields.map((f) => `${f.key}: ${f.value}`).join(", ")} })`,
  taggedUnion: (members) => `Schema.Union(\n${members.map((m) => `  ${m},\n`).join("")})`,
  lazy: (schema, type) => `Schema.suspend((): Schema.Schema<${type}> => ${schema})`,
  annotation: (type) => `Schema.Schema<${type}>`,
}

const zodDialect: Dialect = {
  fileName: "schemas.zod.ts",
  importLine: `import { z } from "zod";`,
  primitive: (kind) => {
    switch (kind) {
      case "string":
      case "bytes":
        return "z.string()"
      case "time":
        return "z.string().datetime()"
      case "int":
      case "int64":
        return "z.number().int()"
      case "uint":
        return "z.number().int().nonnegative()"
      case "float":
      case "duration":
        return "z.number()"
      case "bool":
        return "z.boolean()"
      case "any":
        return "z.unknown()"
      case "empty":
        return "z.object({})"
    }
  },
  nullable: (schema) => `${schema}.nullable()`,
  optionalField: (schema, config) => (config.optionalStyle === "null" ? `${schema}.nullable()` : `${schema}.optional()`),
  array: (schema) => `z.array(${schema})`,
  record: (key, value) => `z.record(${key}, ${value})`,
  literals: (values) => {
    if (values.length === 0) {
      return "z.never()"
    }
    if (values.length === 1) {
      return `z.literal(${literal(values[0] ?? "")})`
    }
    return values.every((v) => typeof v === "string")
      ? `z.enum([${values.map(literal).join(", ")}])`
      : `z.union([${values.map((v) => `z.literal(${literal(v)})`).join(", ")}])`
  },
  nativeEnum: (type) => `z.nativeEnum(${type})`,
  object: (fields, indent) => (fields.length === 0 ? "z.object({})" : `z.object({\n${objectBody(fields, indent)}${indent}})`),
  inlineObject: (fields) => `z.object({ ${fields.map((f) => `${f.key}: ${f.value}`).join(", ")} })`,
  taggedUnion: (members) => `z.discriminatedUnion("type", [\n${members.map((m) => `  ${m},\n`).join("")}])`,
  lazy: (schema) => `z.lazy(() => ${schema})`,
  annotation: (type) => `z.ZodType<${type}>`,
}

const dialects: Record<Exclude<Flavor, "none">, Dialect> = {
  effect: effectDialect,
  zod: zodDialect,
}

// ─────────────────────────────────────────────────────────────────────────────
// Ordering
// ─────────────────────────────────────────────────────────────────────────────

const directDependencies = (ref: TypeRef, into: Array<Declaration>): void => {
  switch (ref._tag) {
    case "Optional":
    case "List":
      return directDependencies(ref.element, into)
    case "Map":
      directDependencies(ref.key, into)
      return directDependencies(ref.value, into)
    case "Struct":
    case "Enum":
    case "Alias":
      into.push(ref)
      return
    default:
      return
  }
}

const dependenciesOf = (decl: Declaration): ReadonlyArray<Declaration> => {
  const deps: Array<Declaration> = []
  switch (decl._tag) {
    case "Struct":
      decl.fields().forEach((field) => directDependencies(field.type, deps))
      break
    case "Enum":
      decl.variants.forEach((variant) => {
        if (variant.payload !== undefined) directDependencies(variant.payload, deps)
      })
      break
    case "Alias":
      directDependencies(decl.underlying, deps)
      break
  }
  return deps
}

/**
 * Depth-first post-order from the name-sorted nodes: dependencies come first
 * except along cycles.
 */
const declarationOrder = (nodes: ReadonlyArray<TypeNode>, ctx: RenderContext): ReadonlyArray<TypeNode> => {
  const byKey = new Map(nodes.map((node) => [node.key, node] as const))
  const done = new Set<string>()
  const order: Array<TypeNode> = []
  const visit = (node: TypeNode): void => {
    if (done.has(node.key)) {
      return
    }
    done.add(node.key)
    for (const dep of dependenciesOf(node.declaration)) {
      const target = byKey.get(originKey(dep.origin))
      if (target !== undefined) {
        visit(target)
      }
    }
    order.push(node)
  }
  sortByName(nodes, ctx).forEach(visit)
  return order
}

// ─────────────────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────────────────

interface Env {
  readonly ctx: RenderContext
  readonly dialect: Dialect
  readonly declared: Set<string>
  lazy: boolean
  usesTypes: boolean
  usesTypeValues: boolean
}

const schemaName = (env: Env, decl: Declaration): string => `${env.ctx.names.nameOf(decl.origin)}Schema`

const schemaExpr = (ref: TypeRef, env: Env): string => {
  switch (ref._tag) {
    case "Primitive":
      return env.dialect.primitive(ref.kind)
    case "Optional":
      return env.dialect.nullable(schemaExpr(unwrapOptional(ref), env))
    case "List":
      return env.dialect.array(schemaExpr(ref.element, env))
    case "Map":
      return env.dialect.record(
        ref.key._tag === "Primitive" ? env.dialect.primitive("string") : schemaExpr(ref.key, env),
        schemaExpr(ref.value, env),
      )
    case "Struct":
    case "Enum":
    case "Alias": {
      if (env.declared.has(originKey(ref.origin))) {
        return schemaName(env, ref)
      }
      env.lazy = true
      env.usesTypes = true
      return env.dialect.lazy(schemaName(env, ref), `types.${env.ctx.names.nameOf(ref.origin)}`)
    }
    case "Unsupported":
      return env.dialect.literals([])
  }
}

const declarationExpr = (decl: Declaration, env: Env): string => {
  const name = env.ctx.names.nameOf(decl.origin)
  switch (decl._tag) {
    case "Struct":
      return env.dialect.object(
        decl.fields().map((field) => {
          const inner = schemaExpr(unwrapOptional(field.type), env)
          return {
            key: propertyKey(wireName(field, env.ctx.config.fieldCase)),
            value: isOptionalField(field) ? env.dialect.optionalField(inner, env.ctx.config) : inner,
          }
        }),
        "",
      )
    case "Enum": {
      if (hasPayloads(decl)) {
        return env.dialect.taggedUnion(decl.variants.map((variant) =>
          env.dialect.inlineObject([
            { key: "type", value: env.dialect.literals([variant.value]) },
            ...(variant.payload !== undefined ? [{ key: "payload", value: schemaExpr(variant.payload, env) }] : []),
          ])
        ))
      }
      if (env.ctx.config.enumStyle === "union" || decl.variants.length === 0) {
        return env.dialect.literals(decl.variants.map((v) => v.value))
      }
      env.usesTypes = true
      env.usesTypeValues = true
      return env.dialect.nativeEnum(`types.${name}`)
    }
    case "Alias":
      return schemaExpr(decl.underlying, env)
  }
}

/**
 * @since 0.1.0
 */
export const schemaFileName = (flavor: Exclude<Flavor, "none">): string => dialects[flavor].fileName

/**
 * Render the schema file for `flavor`.
 *
 * @since 0.1.0
 */
export const renderSchemasFile = (
  nodes: ReadonlyArray<TypeNode>,
  flavor: Exclude<Flavor, "none">,
  ctx: RenderContext,
): string => {
  const dialect = dialects[flavor]
  const env: Env = { ctx, dialect, declared: new Set(), lazy: false, usesTypes: false, usesTypeValues: false }
  const declarations = declarationOrder(nodes, ctx).map((node) => {
    env.lazy = false
    const expr = declarationExpr(node.declaration, env)
    const name = ctx.names.nameOf(node.origin)
    env.declared.add(node.key)
    const binding = env.lazy
      ? `export const ${name}Schema: ${dialect.annotation(`types.${name}`)} = ${expr};`
      : `export const ${name}Schema = ${expr};`
    return `${binding}\n`
  })
  const typesImport = env.usesTypeValues
    ? `import * as types from "${sibling(ctx.config, "types")}";\n`
    : env.usesTypes
    ? `import type * as types from "${sibling(ctx.config, "types")}";\n`
    : ""
  return `${fileHeader(ctx.config)}${dialect.importLine}\n${typesImport}\n${declarations.join("\n")}`
}
