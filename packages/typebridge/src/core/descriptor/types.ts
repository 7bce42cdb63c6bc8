/**
 * @module typebridge/core/descriptor/types
 *
 * The type-description model every registered request and response is
 * expressed in. The generator walks these values; it never inspects
 * TypeScript types.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Origin
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Where a named type was declared. `(module, name)` is its identity until
 * names are resolved.
 *
 * @since 0.1.0
 * @category models
 */
export interface Origin {
  readonly module: string
  readonly name: string
}

export const originKey = (origin: Origin): string => `${origin.module}\u0000${origin.name}`

export const formatOrigin = (origin: Origin): string =>
  origin.module === "" ? origin.name : `${origin.module}.${origin.name}`

// ─────────────────────────────────────────────────────────────────────────────
// Type References
// ─────────────────────────────────────────────────────────────────────────────

export type PrimitiveKind =
  | "string"
  | "int"
  | "int64"
  | "uint"
  | "float"
  | "bool"
  | "bytes"
  | "time"
  | "duration"
  | "any"
  | "empty"

export interface PrimitiveRef {
  readonly _tag: "Primitive"
  readonly kind: PrimitiveKind
}

export interface OptionalRef {
  readonly _tag: "Optional"
  readonly element: TypeRef
}

export interface ListRef {
  readonly _tag: "List"
  readonly element: TypeRef
}

export interface MapRef {
  readonly _tag: "Map"
  readonly key: TypeRef
  readonly value: TypeRef
}

/**
 * A host construct with no wire representation. Reaching one from a
 * registered method fails extraction.
 */
export interface UnsupportedRef {
  readonly _tag: "Unsupported"
  readonly construct: "function" | "channel"
  readonly description: string
}

export interface Field {
  readonly name: string
  readonly type: TypeRef
  readonly wireName?: string
  readonly optional: boolean
  readonly doc?: string
}

export interface StructDecl {
  readonly _tag: "Struct"
  readonly origin: Origin
  readonly doc?: string
  /** `true` for types that exist but expose nothing serializable. */
  readonly opaque: boolean
  readonly fields: () => ReadonlyArray<Field>
}

export interface Variant {
  readonly name: string
  readonly value: string | number
  readonly payload?: TypeRef
  readonly doc?: string
}

export interface EnumDecl {
  readonly _tag: "Enum"
  readonly origin: Origin
  readonly doc?: string
  readonly variants: ReadonlyArray<Variant>
}

export interface AliasDecl {
  readonly _tag: "Alias"
  readonly origin: Origin
  readonly doc?: string
  readonly underlying: TypeRef
}

/**
 * Named composite types. These become declarations in the generated output;
 * everything else is rendered inline.
 *
 * @since 0.1.0
 * @category models
 */
export type Declaration = StructDecl | EnumDecl | AliasDecl

/**
 * @since 0.1.0
 * @category models
 */
export type TypeRef =
  | PrimitiveRef
  | OptionalRef
  | ListRef
  | MapRef
  | UnsupportedRef
  | Declaration

export const isDeclaration = (ref: TypeRef): ref is Declaration =>
  ref._tag === "Struct" || ref._tag === "Enum" || ref._tag === "Alias"

export const hasPayloads = (decl: EnumDecl): boolean =>
  decl.variants.some((v) => v.payload !== undefined)

/**
 * Strip any number of optional wrappers.
 *
 * @since 0.1.0
 */
export const unwrapOptional = (ref: TypeRef): TypeRef =>
  ref._tag === "Optional" ? unwrapOptional(ref.element) : ref
