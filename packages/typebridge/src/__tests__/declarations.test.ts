import * as Effect from "effect/Effect"
import { describe, expect, it } from "vitest"
import * as T from "../core/descriptor/constructors.js"
import type { WireFormat } from "../core/descriptor/naming.js"
import * as Endpoint from "../core/registry/Endpoint.js"
import * as Registry from "../core/registry/Registry.js"
import type { GeneratorOptions } from "../generator/config.js"
import { generate } from "../generator/generate.js"

const typesFor = (
  response: T.Ref,
  options: GeneratorOptions = {},
  wire: Partial<WireFormat> = {},
): Promise<string> =>
  Effect.runPromise(
    Effect.gen(function* () {
      const registry = yield* Registry.make(wire)
      yield* registry.register(
        "Api",
        "Get",
        Endpoint.query({ request: T.empty, response, handler: () => Effect.die("unused") }),
      )
      const result = yield* generate(registry, { stripPrefix: "acme", ...options })
      return result.files.find((f) => f.path === "types.ts")?.content ?? ""
    }),
  )

const header = "// Code generated by typebridge. DO NOT EDIT.\n\n"

const Status = T.enumeration({ module: "acme", name: "Status" }, [
  T.variant("Active", "active", { doc: "Can sign in." }),
  T.variant("Disabled", "disabled"),
])

describe("type emitter", () => {
  it("renders structs with optional and nullable fields", async () => {
    const Account = T.struct({ module: "acme", name: "Account", doc: "A customer account." }, () => [
      T.field("id", T.int),
      T.field("nickname", T.optional(T.string)),
      T.field("scores", T.list(T.optional(T.float))),
      T.field("labels", T.map(T.string, T.bool)),
      T.field("raw", T.bytes),
    ])

    expect(await typesFor(Account)).toBe(
      header +
        "/** A customer account. */\n" +
        "export interface Account {\n" +
        "  id: number;\n" +
        "  nickname?: string;\n" +
        "  scores: (number | null)[];\n" +
        "  labels: Record<string, boolean>;\n" +
        "  raw: string;\n" +
        "}\n",
    )
  })

  it("renames a type that would shadow the map type", async () => {
    const Named = T.struct({ module: "acme", name: "Record" }, () => [T.field("tags", T.map(T.string, T.string))])

    expect(await typesFor(Named)).toBe(
      header +
        "export interface Record_ {\n" +
        "  tags: Record<string, string>;\n" +
        "}\n",
    )
  })

  it("keys fields by wire name and writes null for absent optionals in the null style", async () => {
    const Account = T.struct({ module: "acme", name: "Account" }, () => [
      T.field("accountId", T.int),
      T.field("displayName", T.string, { optional: true }),
      T.field("legacyId", T.string, { wireName: "legacy-id" }),
    ])

    expect(await typesFor(Account, {}, { fieldCase: "snake", optionalStyle: "null" })).toBe(
      header +
        "export interface Account {\n" +
        "  account_id: number;\n" +
        "  display_name: string | null;\n" +
        "  \"legacy-id\": string;\n" +
        "}\n",
    )
  })

  it("renders enums as a string union by default", async () => {
    expect(await typesFor(Status)).toBe(header + "export type Status = \"active\" | \"disabled\";\n")
  })

  it("renders enums in the enum style", async () => {
    expect(await typesFor(Status, { enumStyle: "enum" })).toBe(
      header +
        "export enum Status {\n" +
        "  /** Can sign in. */\n" +
        "  Active = \"active\",\n" +
        "  Disabled = \"disabled\",\n" +
        "}\n",
    )
  })

  it("renders enums in the const_enum style", async () => {
    expect(await typesFor(Status, { enumStyle: "const_enum", emitComments: false })).toBe(
      header +
        "export const enum Status {\n" +
        "  Active = \"active\",\n" +
        "  Disabled = \"disabled\",\n" +
        "}\n",
    )
  })

  it("renders enums in the object style", async () => {
    expect(await typesFor(Status, { enumStyle: "object", emitComments: false })).toBe(
      header +
        "export const Status = {\n" +
        "  Active: \"active\",\n" +
        "  Disabled: \"disabled\",\n" +
        "} as const;\n" +
        "export type Status = (typeof Status)[keyof typeof Status];\n",
    )
  })

  it("renders enums with payloads as a tagged union", async () => {
    const Point = T.struct({ module: "acme", name: "Point" }, () => [T.field("x", T.float)])
    const Shape = T.enumeration({ module: "acme", name: "Shape" }, [
      T.variant("Dot", "dot", { payload: Point }),
      T.variant("None", "none"),
    ])

    expect(await typesFor(Shape)).toBe(
      header +
        "export interface Point {\n" +
        "  x: number;\n" +
        "}\n" +
        "\n" +
        "export type Shape =\n" +
        "  | { type: \"dot\"; payload: Point }\n" +
        "  | { type: \"none\" };\n",
    )
  })

  it("renders aliases and qualified names", async () => {
    const Money = T.struct({ module: "shared/money", name: "Money" }, () => [T.field("cents", T.int)])
    const Price = T.alias({ module: "acme/billing", name: "Price" }, Money)

    expect(await typesFor(Price)).toBe(
      header +
        "export type billing_Price = shared_money_Money;\n" +
        "\n" +
        "export interface shared_money_Money {\n" +
        "  cents: number;\n" +
        "}\n",
    )
  })

  it("renders empty structs", async () => {
    const Nothing = T.struct({ module: "acme", name: "Nothing" }, () => [])

    expect(await typesFor(Nothing)).toBe(header + "export interface Nothing {}\n")
  })

  it("places frontmatter below the header", async () => {
    const Nothing = T.struct({ module: "acme", name: "Nothing" }, () => [])

    expect(await typesFor(Nothing, { frontmatter: "/* eslint-disable */" })).toBe(
      "// Code generated by typebridge. DO NOT EDIT.\n/* eslint-disable */\n\nexport interface Nothing {}\n",
    )
  })

  it("writes an empty module when no named types are reachable", async () => {
    expect(await typesFor(T.int)).toBe(header + "export {};\n")
  })
})
