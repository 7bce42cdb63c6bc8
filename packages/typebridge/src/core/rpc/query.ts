/**
 * @module typebridge/core/rpc/query
 *
 * Query-string form of `GET` requests. Keys are sorted, arrays repeat their
 * key, strings are sent as-is unless they parse as JSON, and every other
 * value is sent as JSON. Reading a query back needs the request descriptor:
 * string fields take a bare value literally and unquote a JSON string.
 *
 * @since 0.1.0
 */

import * as Either from "effect/Either"
import { wireName, type WireFormat } from "../descriptor/naming.js"
import type { StructDecl, TypeRef } from "../descriptor/types.js"

const parseJson = (raw: string) => Either.try((): unknown => JSON.parse(raw))

// A string that would read back as JSON (`"123"`, `"true"`) is sent quoted.
const queryValue = (value: unknown): string =>
  typeof value === "string" && Either.isLeft(parseJson(value)) ? value : JSON.stringify(value)

/**
 * Flatten a wire request object into ordered query parameters. `null` and
 * `undefined` members are omitted.
 *
 * @since 0.1.0
 */
export const toQueryParams = (request: unknown): ReadonlyArray<readonly [string, string]> => {
  if (typeof request !== "object" || request === null || Array.isArray(request)) {
    return []
  }
  const params: Array<readonly [string, string]> = []
  const entries = Object.entries(request).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  for (const [key, value] of entries) {
    if (value === null || value === undefined) {
      continue
    }
    if (Array.isArray(value)) {
      value.forEach((item: unknown) => params.push([key, queryValue(item)]))
    } else {
      params.push([key, queryValue(value)])
    }
  }
  return params
}

/**
 * `true` when values of `type` travel as bare strings.
 */
const isStringLike = (type: TypeRef): boolean => {
  switch (type._tag) {
    case "Primitive":
      return type.kind === "string" || type.kind === "bytes" || type.kind === "time"
    case "Optional":
      return isStringLike(type.element)
    case "Alias":
      return isStringLike(type.underlying)
    case "Enum":
      return type.variants.length > 0 &&
        type.variants.every((v) => typeof v.value === "string" && v.payload === undefined)
    default:
      return false
  }
}

const isList = (type: TypeRef): TypeRef | undefined => {
  switch (type._tag) {
    case "List":
      return type.element
    case "Optional":
      return isList(type.element)
    case "Alias":
      return isList(type.underlying)
    default:
      return undefined
  }
}

// Unparseable input is passed through so the wire decoder reports it against
// the field's path.
const parseValue = (type: TypeRef, raw: string): unknown => {
  const parsed = parseJson(raw)
  if (isStringLike(type)) {
    return Either.isRight(parsed) && typeof parsed.right === "string" ? parsed.right : raw
  }
  return Either.getOrElse(parsed, () => raw)
}

const structOf = (type: TypeRef): StructDecl | undefined => {
  switch (type._tag) {
    case "Struct":
      return type
    case "Alias":
      return structOf(type.underlying)
    default:
      return undefined
  }
}

/**
 * Rebuild the wire request for `type` from query parameters. Parameters that
 * name no field are ignored; a required list with no parameters is empty.
 *
 * @since 0.1.0
 */
export const fromQueryParams = (
  type: TypeRef,
  params: URLSearchParams,
  format: WireFormat,
): Record<string, unknown> => {
  const struct = structOf(type)
  const out: Record<string, unknown> = {}
  if (struct === undefined) {
    return out
  }
  for (const field of struct.fields()) {
    const key = wireName(field, format.fieldCase)
    const values = params.getAll(key)
    const element = isList(field.type)
    if (values.length === 0) {
      // An empty array writes no parameters.
      if (element !== undefined && !field.optional && field.type._tag !== "Optional") {
        out[key] = []
      }
      continue
    }
    out[key] = element !== undefined
      ? values.map((raw) => parseValue(element, raw))
      : parseValue(field.type, values[values.length - 1] ?? "")
  }
  return out
}
