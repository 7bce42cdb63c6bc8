/**
 * @module typebridge/core/descriptor/naming
 *
 * Field naming on the wire. The Type Emitter and the wire codec both go
 * through {@link wireName}, so generated declarations and encoded payloads
 * cannot disagree.
 */

import type { Field } from "./types.js"

/**
 * @since 0.1.0
 * @category models
 */
export type FieldCase = "preserve" | "camel" | "pascal" | "snake" | "kebab"

/**
 * @since 0.1.0
 * @category models
 */
export type OptionalStyle = "undefined" | "null"

/**
 * The two settings that change what a payload looks like on the wire.
 *
 * @since 0.1.0
 * @category models
 */
export interface WireFormat {
  readonly fieldCase: FieldCase
  /** `undefined` omits absent optional keys, `null` writes them as `null`. */
  readonly optionalStyle: OptionalStyle
}

export const defaultWireFormat: WireFormat = {
  fieldCase: "preserve",
  optionalStyle: "undefined",
}

/**
 * Split an identifier into words at case changes, digits followed by capitals
 * and `_`, `-` or whitespace separators. Acronyms stay together:
 * `HTTPServer` → `["HTTP", "Server"]`.
 *
 * @since 0.1.0
 */
export const splitWords = (name: string): ReadonlyArray<string> =>
  name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .split(/[\s_-]+/)
    .filter((word) => word.length > 0)

const capitalize = (word: string): string =>
  word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()

/**
 * @since 0.1.0
 */
export const applyCase = (name: string, fieldCase: FieldCase): string => {
  if (fieldCase === "preserve") {
    return name
  }
  const words = splitWords(name)
  switch (fieldCase) {
    case "camel":
      return words.map((w, i) => (i === 0 ? w.toLowerCase() : capitalize(w))).join("")
    case "pascal":
      return words.map(capitalize).join("")
    case "snake":
      return words.map((w) => w.toLowerCase()).join("_")
    case "kebab":
      return words.map((w) => w.toLowerCase()).join("-")
  }
}

/**
 * The key a field is written under: its explicit override, else its declared
 * name in the configured case.
 *
 * @since 0.1.0
 */
export const wireName = (field: Field, fieldCase: FieldCase): string =>
  field.wireName ?? applyCase(field.name, fieldCase)
