import * as Either from "effect/Either"
import { describe, expect, it } from "vitest"
import { defaultWireFormat } from "../core/descriptor/naming.js"
import { resolveConfig } from "../generator/config.js"

const reasonOf = (options: unknown, wire = defaultWireFormat) => {
  const result = resolveConfig(options, wire)
  return Either.isLeft(result) ? { option: result.left.option, reason: result.left.reason } : undefined
}

describe("resolveConfig", () => {
  it("fills in documented defaults", () => {
    expect(resolveConfig({}, defaultWireFormat)).toEqual(Either.right({
      outDir: "generated",
      stripPrefix: "",
      enumStyle: "union",
      optionalStyle: "undefined",
      fieldCase: "preserve",
      flavor: "none",
      discovery: true,
      emitComments: true,
      frontmatter: "",
      runtimeModule: "typebridge/client",
      importExtension: ".js",
    }))
  })

  it("takes the wire options from the registry", () => {
    const config = resolveConfig({}, { fieldCase: "snake", optionalStyle: "null" })

    expect(Either.map(config, (c) => [c.fieldCase, c.optionalStyle])).toEqual(Either.right(["snake", "null"]))
  })

  it("normalizes a trailing slash on the strip prefix", () => {
    expect(Either.map(resolveConfig({ stripPrefix: "pkg/api/" }, defaultWireFormat), (c) => c.stripPrefix)).toEqual(
      Either.right("pkg/api"),
    )
  })

  it("rejects const_enum with a validation flavor", () => {
    expect(reasonOf({ enumStyle: "const_enum", flavor: "zod" })).toEqual({
      option: "enumStyle",
      reason:
        "const_enum declarations are erased at compile time, so the zod schemas have nothing to validate against; use \"enum\", \"object\" or \"union\"",
    })
  })

  it("accepts const_enum without a flavor", () => {
    expect(Either.isRight(resolveConfig({ enumStyle: "const_enum" }, defaultWireFormat))).toBe(true)
  })

  it("rejects an optional style the registry does not use", () => {
    expect(reasonOf({ optionalStyle: "null" })).toEqual({
      option: "optionalStyle",
      reason: "the registry encodes optional fields as \"undefined\", not \"null\"",
    })
  })

  it("rejects a field case the registry does not use", () => {
    expect(reasonOf({ fieldCase: "camel" })).toEqual({
      option: "fieldCase",
      reason: "the registry names fields with \"preserve\", not \"camel\"",
    })
  })

  it("accepts wire options that agree with the registry", () => {
    expect(Either.isRight(resolveConfig({ fieldCase: "snake" }, { fieldCase: "snake", optionalStyle: "undefined" }))).toBe(
      true,
    )
  })

  it("rejects empty paths", () => {
    expect(reasonOf({ outDir: "  " })).toEqual({ option: "outDir", reason: "must not be empty" })
    expect(reasonOf({ runtimeModule: "" })).toEqual({ option: "runtimeModule", reason: "must not be empty" })
  })

  it("names the option that failed to decode", () => {
    expect(reasonOf({ enumStyle: "weird" })?.option).toBe("enumStyle")
    expect(reasonOf({ discovery: "yes" })?.option).toBe("discovery")
    expect(reasonOf(42)?.option).toBe("options")
  })
})
