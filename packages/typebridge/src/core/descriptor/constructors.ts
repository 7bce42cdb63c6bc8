/**
 * @module typebridge/core/descriptor/constructors
 *
 * Constructors for type descriptors, usually imported as `T`.
 *
 * @example
 * ```ts
 * import { T } from "typebridge"
 *
 * const User: T.Struct = T.struct({ module: "acme/users", name: "User" }, () => [
 *   T.field("id", T.int),
 *   T.field("displayName", T.string, { wireName: "display_name" }),
 *   T.field("manager", T.optional(User)),
 * ])
 * ```
 */

import type {
  AliasDecl,
  EnumDecl,
  Field,
  ListRef,
  MapRef,
  OptionalRef,
  Origin,
  PrimitiveKind,
  PrimitiveRef,
  StructDecl,
  TypeRef,
  UnsupportedRef,
  Variant,
} from "./types.js"

export type Struct = StructDecl
export type Enum = EnumDecl
export type Alias = AliasDecl
export type Ref = TypeRef

interface DeclarationOptions extends Origin {
  readonly doc?: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Primitives
// ─────────────────────────────────────────────────────────────────────────────

const primitive = (kind: PrimitiveKind): PrimitiveRef => ({ _tag: "Primitive", kind })

export const string: PrimitiveRef = primitive("string")
export const int: PrimitiveRef = primitive("int")
/** Integers wider than 2^53; emitted as `number` with a precision warning. */
export const int64: PrimitiveRef = primitive("int64")
export const uint: PrimitiveRef = primitive("uint")
export const float: PrimitiveRef = primitive("float")
export const bool: PrimitiveRef = primitive("bool")
/** `Uint8Array` on the host, base64 on the wire. */
export const bytes: PrimitiveRef = primitive("bytes")
/** `Date` on the host, an ISO-8601 string on the wire. */
export const time: PrimitiveRef = primitive("time")
/** Milliseconds. */
export const duration: PrimitiveRef = primitive("duration")
export const any: PrimitiveRef = primitive("any")
/** A request or response with no fields. */
export const empty: PrimitiveRef = primitive("empty")

// ─────────────────────────────────────────────────────────────────────────────
// Containers
// ─────────────────────────────────────────────────────────────────────────────

export const optional = (element: TypeRef): OptionalRef => ({ _tag: "Optional", element })

export const list = (element: TypeRef): ListRef => ({ _tag: "List", element })

export const map = (key: TypeRef, value: TypeRef): MapRef => ({ _tag: "Map", key, value })

// ─────────────────────────────────────────────────────────────────────────────
// Named Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Fields are supplied through a thunk so a struct can refer to itself or to
 * structs declared after it. Annotate the binding (`const Node: T.Struct`)
 * when it does.
 */
export const struct = (
  options: DeclarationOptions,
  fields: () => ReadonlyArray<Field>,
): StructDecl => ({
  _tag: "Struct",
  origin: { module: options.module, name: options.name },
  ...(options.doc !== undefined ? { doc: options.doc } : {}),
  opaque: false,
  fields,
})

/**
 * A type that exists on the host but has no serializable fields.
 */
export const opaque = (options: DeclarationOptions): StructDecl => ({
  _tag: "Struct",
  origin: { module: options.module, name: options.name },
  ...(options.doc !== undefined ? { doc: options.doc } : {}),
  opaque: true,
  fields: () => [],
})

export const field = (
  name: string,
  type: TypeRef,
  options: { readonly wireName?: string; readonly optional?: boolean; readonly doc?: string } = {},
): Field => ({
  name,
  type,
  optional: options.optional ?? false,
  ...(options.wireName !== undefined ? { wireName: options.wireName } : {}),
  ...(options.doc !== undefined ? { doc: options.doc } : {}),
})

export const enumeration = (
  options: DeclarationOptions,
  variants: ReadonlyArray<Variant>,
): EnumDecl => ({
  _tag: "Enum",
  origin: { module: options.module, name: options.name },
  ...(options.doc !== undefined ? { doc: options.doc } : {}),
  variants,
})

export const variant = (
  name: string,
  value: string | number,
  options: { readonly payload?: TypeRef; readonly doc?: string } = {},
): Variant => ({
  name,
  value,
  ...(options.payload !== undefined ? { payload: options.payload } : {}),
  ...(options.doc !== undefined ? { doc: options.doc } : {}),
})

export const alias = (options: DeclarationOptions, underlying: TypeRef): AliasDecl => ({
  _tag: "Alias",
  origin: { module: options.module, name: options.name },
  ...(options.doc !== undefined ? { doc: options.doc } : {}),
  underlying,
})

// ─────────────────────────────────────────────────────────────────────────────
// Unsupported
// ─────────────────────────────────────────────────────────────────────────────

export const func = (description: string): UnsupportedRef => ({
  _tag: "Unsupported",
  construct: "function",
  description,
})

export const channel = (description: string): UnsupportedRef => ({
  _tag: "Unsupported",
  construct: "channel",
  description,
})
