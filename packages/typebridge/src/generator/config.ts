/**
 * @module typebridge/generator/config
 *
 * Generator configuration: a plain value with documented defaults, decoded
 * with Schema and checked for invalid combinations before any type is
 * extracted.
 *
 * @since 0.1.0
 */

import * as Either from "effect/Either"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"
import type { FieldCase, OptionalStyle, WireFormat } from "../core/descriptor/naming.js"
import { ConfigurationError } from "../errors/index.js"
import { normalizePrefix } from "./resolve.js"

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

/**
 * How enums without payloads are declared.
 *
 * - `union`: `type Status = "active" | "disabled"`
 * - `enum`: `enum Status { Active = "active" }`
 * - `const_enum`: `const enum Status { ... }`
 * - `object`: `const Status = { Active: "active" } as const` plus a type
 *
 * @since 0.1.0
 * @category Configuration
 */
export const EnumStyle = Schema.Literal("union", "enum", "const_enum", "object")
export type EnumStyle = typeof EnumStyle.Type

/**
 * Which runtime validation schemas to emit next to the types.
 *
 * @since 0.1.0
 * @category Configuration
 */
export const Flavor = Schema.Literal("none", "effect", "zod")
export type Flavor = typeof Flavor.Type

export const ImportExtension = Schema.Literal(".js", ".ts", "")
export type ImportExtension = typeof ImportExtension.Type

const FieldCaseSchema = Schema.Literal("preserve", "camel", "pascal", "snake", "kebab")
const OptionalStyleSchema = Schema.Literal("undefined", "null")

export const GeneratorConfigSchema = Schema.Struct({
  outDir: Schema.optionalWith(Schema.String, { default: () => "generated" }),
  stripPrefix: Schema.optionalWith(Schema.String, { default: () => "" }),
  enumStyle: Schema.optionalWith(EnumStyle, { default: () => "union" }),
  optionalStyle: Schema.optional(OptionalStyleSchema),
  fieldCase: Schema.optional(FieldCaseSchema),
  flavor: Schema.optionalWith(Flavor, { default: () => "none" }),
  discovery: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  emitComments: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  frontmatter: Schema.optionalWith(Schema.String, { default: () => "" }),
  runtimeModule: Schema.optionalWith(Schema.String, { default: () => "typebridge/client" }),
  importExtension: Schema.optionalWith(ImportExtension, { default: () => ".js" }),
})

/**
 * What callers pass in. Every option is optional.
 *
 * @since 0.1.0
 * @category Configuration
 */
export type GeneratorOptions = typeof GeneratorConfigSchema.Encoded

/**
 * @since 0.1.0
 * @category Configuration
 */
export interface GeneratorConfig {
  /** Directory generated files are written to. Default: "generated" */
  readonly outDir: string
  /** Module path prefix removed when naming types. Default: "" (none) */
  readonly stripPrefix: string
  /** Default: "union" */
  readonly enumStyle: EnumStyle
  /** Taken from the registry's wire format unless given. */
  readonly optionalStyle: OptionalStyle
  /** Taken from the registry's wire format unless given. */
  readonly fieldCase: FieldCase
  /** Default: "none" */
  readonly flavor: Flavor
  /** Also write `discovery.json`. Default: true */
  readonly discovery: boolean
  /** Copy descriptor docs into JSDoc. Default: true */
  readonly emitComments: boolean
  /** Text placed below the generated-file header. Default: "" */
  readonly frontmatter: string
  /** Module generated clients import their runtime from. Default: "typebridge/client" */
  readonly runtimeModule: string
  /** Extension used on relative imports between generated files. Default: ".js" */
  readonly importExtension: ImportExtension
}

// ─────────────────────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────────────────────

const fromParseError = (error: ParseResult.ParseError): ConfigurationError => {
  const [issue] = ParseResult.ArrayFormatter.formatErrorSync(error)
  return new ConfigurationError({
    option: issue === undefined || issue.path.length === 0 ? "options" : issue.path.map(String).join("."),
    reason: issue?.message ?? error.message,
  })
}

const decodeOptions = Schema.decodeUnknownEither(GeneratorConfigSchema)

/**
 * Decode `options` and check it against the registry's wire format.
 *
 * The wire format is fixed by the registry because the server's codec uses
 * it; an explicit `fieldCase` or `optionalStyle` must agree with it.
 *
 * @since 0.1.0
 */
export const resolveConfig = (
  options: unknown,
  wire: WireFormat,
): Either.Either<GeneratorConfig, ConfigurationError> =>
  Either.flatMap(Either.mapLeft(decodeOptions(options), fromParseError), (decoded): Either.Either<GeneratorConfig, ConfigurationError> => {
    if (decoded.enumStyle === "const_enum" && decoded.flavor !== "none") {
      return Either.left(new ConfigurationError({
        option: "enumStyle",
        reason: `const_enum declarations are erased at compile time, so the ${decoded.flavor} schemas have nothing to validate against; use "enum", "object" or "union"`,
      }))
    }
    if (decoded.optionalStyle !== undefined && decoded.optionalStyle !== wire.optionalStyle) {
      return Either.left(new ConfigurationError({
        option: "optionalStyle",
        reason: `the registry encodes optional fields as "${wire.optionalStyle}", not "${decoded.optionalStyle}"`,
      }))
    }
    if (decoded.fieldCase !== undefined && decoded.fieldCase !== wire.fieldCase) {
      return Either.left(new ConfigurationError({
        option: "fieldCase",
        reason: `the registry names fields with "${wire.fieldCase}", not "${decoded.fieldCase}"`,
      }))
    }
    if (decoded.outDir.trim() === "") {
      return Either.left(new ConfigurationError({ option: "outDir", reason: "must not be empty" }))
    }
    if (decoded.runtimeModule.trim() === "") {
      return Either.left(new ConfigurationError({ option: "runtimeModule", reason: "must not be empty" }))
    }
    return Either.right({
      ...decoded,
      stripPrefix: normalizePrefix(decoded.stripPrefix),
      optionalStyle: wire.optionalStyle,
      fieldCase: wire.fieldCase,
    })
  })
