/**
 * @module typebridge/generator/extract
 *
 * Type Graph Extractor. Walks every method's request and response
 * descriptor and collects each named type reachable from them, through struct
 * fields, container elements, alias targets and enum payloads.
 *
 * A type is expanded once per origin identity, which is what makes recursive
 * and mutually recursive structs terminate. Methods are walked in key order,
 * request before response, fields in declaration order, so the first error
 * found is the same on every run.
 *
 * @since 0.1.0
 */

import * as Arr from "effect/Array"
import * as Either from "effect/Either"
import * as Order from "effect/Order"
import type { MethodDescriptor } from "../core/registry/Registry.js"
import { wireName, type WireFormat } from "../core/descriptor/naming.js"
import {
  formatOrigin,
  originKey,
  type Declaration,
  type EnumDecl,
  type Origin,
  type StructDecl,
  type TypeRef,
} from "../core/descriptor/types.js"
import { ExtractionError } from "../errors/index.js"
import { sanitize } from "./identifier.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A discovered named type.
 *
 * @since 0.1.0
 * @category models
 */
export interface TypeNode {
  readonly key: string
  readonly origin: Origin
  readonly declaration: Declaration
}

/**
 * @since 0.1.0
 * @category models
 */
export interface TypeGraph {
  readonly methods: ReadonlyArray<MethodDescriptor>
  /** Sorted by module path, then declared name. */
  readonly nodes: ReadonlyArray<TypeNode>
}

export const byOrigin: Order.Order<TypeNode> = Order.combine(
  Order.mapInput(Order.string, (node: TypeNode) => node.origin.module),
  Order.mapInput(Order.string, (node: TypeNode) => node.origin.name),
)

// ─────────────────────────────────────────────────────────────────────────────
// Traversal
// ─────────────────────────────────────────────────────────────────────────────

const isMapKey = (ref: TypeRef): boolean => {
  switch (ref._tag) {
    case "Primitive":
      return ref.kind === "string" || ref.kind === "int" || ref.kind === "int64" || ref.kind === "uint"
    case "Enum":
      return ref.variants.every((v) => v.payload === undefined)
    case "Alias":
      return isMapKey(ref.underlying)
    default:
      return false
  }
}

class Walker {
  readonly visited = new Map<string, TypeNode>()

  constructor(readonly wire: WireFormat) {}

  visit(ref: TypeRef, path: string): ExtractionError | undefined {
    switch (ref._tag) {
      case "Primitive":
        return undefined
      case "Optional":
        return this.visit(ref.element, path)
      case "List":
        return this.visit(ref.element, `${path}[]`)
      case "Map":
        if (!isMapKey(ref.key)) {
          return new ExtractionError({ path, reason: "map keys must be strings, integers or enums without payloads" })
        }
        return this.visit(ref.key, path) ?? this.visit(ref.value, `${path}{}`)
      case "Unsupported":
        return new ExtractionError({ path, reason: `${ref.construct} ${ref.description} has no wire representation` })
      case "Struct":
      case "Enum":
      case "Alias":
        return this.declaration(ref, path)
    }
  }

  declaration(decl: Declaration, path: string): ExtractionError | undefined {
    const key = originKey(decl.origin)
    const seen = this.visited.get(key)
    if (seen !== undefined) {
      return seen.declaration === decl
        ? undefined
        : new ExtractionError({ path, reason: `${formatOrigin(decl.origin)} is declared more than once with different definitions` })
    }
    if (sanitize(decl.origin.name) === "") {
      return new ExtractionError({ path, reason: `"${decl.origin.name}" is not a usable type name` })
    }
    this.visited.set(key, { key, origin: decl.origin, declaration: decl })

    switch (decl._tag) {
      case "Struct":
        return this.struct(decl, path)
      case "Enum":
        return this.enumeration(decl, path)
      case "Alias":
        return this.visit(decl.underlying, path)
    }
  }

  struct(decl: StructDecl, path: string): ExtractionError | undefined {
    if (decl.opaque) {
      return new ExtractionError({ path, reason: `${formatOrigin(decl.origin)} is opaque and has no serializable fields` })
    }
    const names = new Map<string, string>()
    for (const field of decl.fields()) {
      const name = wireName(field, this.wire.fieldCase)
      const clash = names.get(name)
      if (clash !== undefined) {
        return new ExtractionError({
          path,
          reason: `fields ${clash} and ${field.name} of ${formatOrigin(decl.origin)} both serialize as "${name}"`,
        })
      }
      names.set(name, field.name)
      const error = this.visit(field.type, `${path}.${field.name}`)
      if (error !== undefined) {
        return error
      }
    }
    return undefined
  }

  enumeration(decl: EnumDecl, path: string): ExtractionError | undefined {
    const values = new Set<string | number>()
    for (const variant of decl.variants) {
      if (values.has(variant.value)) {
        return new ExtractionError({
          path,
          reason: `${formatOrigin(decl.origin)} has more than one variant with value ${JSON.stringify(variant.value)}`,
        })
      }
      values.add(variant.value)
      if (variant.payload !== undefined) {
        const error = this.visit(variant.payload, `${path}.${variant.name}`)
        if (error !== undefined) {
          return error
        }
      }
    }
    return undefined
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Collect every named type reachable from `methods`.
 *
 * @since 0.1.0
 */
export const extract = (
  methods: ReadonlyArray<MethodDescriptor>,
  wire: WireFormat,
): Either.Either<TypeGraph, ExtractionError> => {
  const walker = new Walker(wire)
  for (const method of methods) {
    const error = walker.visit(method.request, `${method.key}.request`) ??
      walker.visit(method.response, `${method.key}.response`)
    if (error !== undefined) {
      return Either.left(error)
    }
  }
  return Either.right({
    methods,
    nodes: Arr.sort(walker.visited.values(), byOrigin),
  })
}
