/**
 * @module typebridge/generator/identifier
 *
 * Identifier rules for generated TypeScript.
 */

import { readFileSync } from "node:fs"
import * as Schema from "effect/Schema"

const reservedWords: ReadonlySet<string> = new Set(
  Schema.decodeUnknownSync(Schema.Array(Schema.String))(
    JSON.parse(readFileSync(new URL("./reserved-words.json", import.meta.url), "utf8")),
  ),
)

// Globals that emitted declarations refer to by name; a declaration with the
// same name would shadow them.
const emitterGlobals: ReadonlySet<string> = new Set(["Record"])

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/

export const isIdentifier = (name: string): boolean => IDENTIFIER.test(name)

export const isReserved = (name: string): boolean => reservedWords.has(name) || emitterGlobals.has(name)

/**
 * `default` → `default_`, `Record` → `Record_`. Other names pass through.
 */
export const escapeReserved = (name: string): string => (isReserved(name) ? `${name}_` : name)

/**
 * Turn an arbitrary string (a module path, a declared name) into identifier
 * characters: runs of anything else become one `_`, edges are trimmed, and a
 * leading digit is prefixed with `_`.
 */
export const sanitize = (raw: string): string => {
  const cleaned = raw
    .replace(/[^A-Za-z0-9_$]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "")
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned
}

/**
 * A property key as it may appear in an object type or literal.
 */
export const propertyKey = (name: string): string => (isIdentifier(name) ? name : JSON.stringify(name))
