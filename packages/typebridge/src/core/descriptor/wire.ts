/**
 * @module typebridge/core/descriptor/wire
 *
 * Converts host values to and from their JSON wire form, guided by a type
 * descriptor. Struct keys are renamed with {@link wireName}, the same
 * function the Type Emitter uses.
 *
 * Host-side conventions: `bytes` are `Uint8Array`, `time` values are `Date`,
 * maps are plain objects, absent optional fields are `undefined`, and enums
 * with payloads are `{ type, payload }` objects.
 */

import * as Either from "effect/Either"
import * as Predicate from "effect/Predicate"
import { WireError } from "../rpc/errors.js"
import { wireName, type WireFormat } from "./naming.js"
import type { EnumDecl, Field, PrimitiveKind, StructDecl, TypeRef } from "./types.js"

type Result = Either.Either<unknown, WireError>

const fail = (path: string, reason: string): Result => Either.left(new WireError({ path, reason }))

const at = (path: string, segment: string): string => (path === "" ? segment : `${path}.${segment}`)

const kindOf = (value: unknown): string =>
  value === null ? "null" : Array.isArray(value) ? "array" : typeof value

const isOptionalField = (field: Field): boolean => field.optional || field.type._tag === "Optional"

// ─────────────────────────────────────────────────────────────────────────────
// Primitives
// ─────────────────────────────────────────────────────────────────────────────

const checkNumber = (kind: PrimitiveKind, value: unknown, path: string): Result => {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return fail(path, `expected ${kind}, got ${kindOf(value)}`)
  }
  if ((kind === "int" || kind === "int64" || kind === "uint") && !Number.isInteger(value)) {
    return fail(path, `expected ${kind}, got ${value}`)
  }
  if (kind === "uint" && value < 0) {
    return fail(path, `expected uint, got ${value}`)
  }
  return Either.right(value)
}

const encodePrimitive = (kind: PrimitiveKind, value: unknown, path: string): Result => {
  switch (kind) {
    case "string":
      return typeof value === "string" ? Either.right(value) : fail(path, `expected string, got ${kindOf(value)}`)
    case "bool":
      return typeof value === "boolean" ? Either.right(value) : fail(path, `expected bool, got ${kindOf(value)}`)
    case "int":
    case "int64":
    case "uint":
    case "float":
    case "duration":
      return checkNumber(kind, value, path)
    case "bytes":
      return value instanceof Uint8Array
        ? Either.right(Buffer.from(value).toString("base64"))
        : fail(path, `expected Uint8Array, got ${kindOf(value)}`)
    case "time":
      return value instanceof Date && !Number.isNaN(value.getTime())
        ? Either.right(value.toISOString())
        : fail(path, "expected a valid Date")
    case "any":
      return Either.right(value)
    case "empty":
      return Predicate.isRecord(value) ? Either.right({}) : fail(path, `expected object, got ${kindOf(value)}`)
  }
}

const decodePrimitive = (kind: PrimitiveKind, value: unknown, path: string): Result => {
  switch (kind) {
    case "bytes":
      return typeof value === "string"
        ? Either.right(new Uint8Array(Buffer.from(value, "base64")))
        : fail(path, `expected base64 string, got ${kindOf(value)}`)
    case "time": {
      if (typeof value !== "string") {
        return fail(path, `expected timestamp string, got ${kindOf(value)}`)
      }
      const date = new Date(value)
      return Number.isNaN(date.getTime()) ? fail(path, `invalid timestamp "${value}"`) : Either.right(date)
    }
    default:
      return encodePrimitive(kind, value, path)
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Traversal
// ─────────────────────────────────────────────────────────────────────────────

type Direction = "encode" | "decode"

// Own properties only: keys such as `__proto__` and `constructor` are data.
const ownValue = (value: Readonly<Record<string, unknown>>, key: string): unknown =>
  Object.hasOwn(value, key) ? value[key] : undefined

const setKey = (out: Record<string, unknown>, key: string, item: unknown): void => {
  Object.defineProperty(out, key, { value: item, enumerable: true, writable: true, configurable: true })
}

const convertStruct = (
  decl: StructDecl,
  value: unknown,
  format: WireFormat,
  path: string,
  direction: Direction,
): Result => {
  if (decl.opaque) {
    return fail(path, `${decl.origin.name} has no wire representation`)
  }
  if (!Predicate.isRecord(value)) {
    return fail(path, `expected object, got ${kindOf(value)}`)
  }
  const out: Record<string, unknown> = {}
  for (const field of decl.fields()) {
    const key = wireName(field, format.fieldCase)
    const [from, to] = direction === "encode" ? [field.name, key] : [key, field.name]
    const fieldPath = at(path, field.name)
    const raw = ownValue(value, from)
    if (raw === undefined || raw === null) {
      if (!isOptionalField(field)) {
        return fail(fieldPath, "is required")
      }
      if (direction === "encode" && format.optionalStyle === "null") {
        setKey(out, to, null)
      }
      continue
    }
    const converted = convert(field.type, raw, format, fieldPath, direction)
    if (Either.isLeft(converted)) {
      return converted
    }
    setKey(out, to, converted.right)
  }
  return Either.right(out)
}

const convertEnum = (
  decl: EnumDecl,
  value: unknown,
  format: WireFormat,
  path: string,
  direction: Direction,
): Result => {
  const payloads = decl.variants.some((v) => v.payload !== undefined)
  const tag = payloads && Predicate.hasProperty(value, "type") ? value.type : value
  const variant = decl.variants.find((v) => v.value === tag)
  if (variant === undefined) {
    return fail(path, `${String(JSON.stringify(tag))} is not a ${decl.origin.name} value`)
  }
  if (!payloads) {
    return Either.right(variant.value)
  }
  if (variant.payload === undefined) {
    return Either.right({ type: variant.value })
  }
  const payload = Predicate.hasProperty(value, "payload") ? value.payload : undefined
  return Either.map(
    convert(variant.payload, payload, format, at(path, "payload"), direction),
    (converted) => ({ type: variant.value, payload: converted }),
  )
}

const convert = (type: TypeRef, value: unknown, format: WireFormat, path: string, direction: Direction): Result => {
  switch (type._tag) {
    case "Primitive":
      return direction === "encode"
        ? encodePrimitive(type.kind, value, path)
        : decodePrimitive(type.kind, value, path)
    case "Optional":
      if (value === undefined || value === null) {
        return Either.right(direction === "encode" ? null : undefined)
      }
      return convert(type.element, value, format, path, direction)
    case "List": {
      if (!Array.isArray(value)) {
        return fail(path, `expected array, got ${kindOf(value)}`)
      }
      const out: Array<unknown> = []
      for (let i = 0; i < value.length; i++) {
        const item = convert(type.element, value[i], format, `${path}[${i}]`, direction)
        if (Either.isLeft(item)) {
          return item
        }
        out.push(item.right)
      }
      return Either.right(out)
    }
    case "Map": {
      if (!Predicate.isRecord(value)) {
        return fail(path, `expected object, got ${kindOf(value)}`)
      }
      const out: Record<string, unknown> = {}
      for (const [key, item] of Object.entries(value)) {
        const converted = convert(type.value, item, format, `${path}[${JSON.stringify(key)}]`, direction)
        if (Either.isLeft(converted)) {
          return converted
        }
        setKey(out, key, converted.right)
      }
      return Either.right(out)
    }
    case "Struct":
      return convertStruct(type, value, format, path, direction)
    case "Enum":
      return convertEnum(type, value, format, path, direction)
    case "Alias":
      return convert(type.underlying, value, format, path, direction)
    case "Unsupported":
      return fail(path, `${type.construct} ${type.description} cannot cross the wire`)
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Host value → JSON-compatible wire value.
 *
 * @since 0.1.0
 */
export const encode = (type: TypeRef, value: unknown, format: WireFormat): Either.Either<unknown, WireError> =>
  convert(type, value, format, "", "encode")

/**
 * JSON wire value → host value. Unknown struct keys are ignored.
 *
 * @since 0.1.0
 */
export const decode = (type: TypeRef, value: unknown, format: WireFormat): Either.Either<unknown, WireError> =>
  convert(type, value, format, "", "decode")
