import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { describe, expect, it } from "vitest"
import * as T from "../core/descriptor/constructors.js"
import { defaultWireFormat } from "../core/descriptor/naming.js"
import * as Endpoint from "../core/registry/Endpoint.js"
import * as Registry from "../core/registry/Registry.js"
import type { MethodDescriptor } from "../core/registry/Registry.js"
import { extract } from "../generator/extract.js"
import { candidateName, resolve } from "../generator/resolve.js"
import { sanitize } from "../generator/identifier.js"

const methodsOf = (
  entries: ReadonlyArray<readonly [string, T.Ref, T.Ref]>,
): ReadonlyArray<MethodDescriptor> =>
  Effect.runSync(
    Effect.gen(function* () {
      const registry = yield* Registry.make()
      for (const [key, request, response] of entries) {
        const [service = "", method = ""] = key.split(".")
        yield* Effect.orDie(registry.register(
          service,
          method,
          Endpoint.exec({ request, response, handler: (r: unknown) => Effect.succeed(r) }),
        ))
      }
      return yield* registry.methods
    }),
  )

const TreeNode: T.Struct = T.struct({ module: "acme/api", name: "TreeNode" }, () => [
  T.field("label", T.string),
  T.field("children", T.list(TreeNode)),
])

describe("extract", () => {
  it("produces exactly one node for a self-referential struct", () => {
    const graph = extract(methodsOf([["Trees.Get", T.empty, TreeNode]]), defaultWireFormat)

    expect(Either.isRight(graph)).toBe(true)
    if (Either.isRight(graph)) {
      expect(graph.right.nodes.map((n) => n.origin.name)).toEqual(["TreeNode"])
    }
  })

  it("terminates on mutual recursion", () => {
    const Employee: T.Struct = T.struct({ module: "acme/hr", name: "Employee" }, () => [
      T.field("team", T.optional(Team)),
    ])
    const Team: T.Struct = T.struct({ module: "acme/hr", name: "Team" }, () => [
      T.field("members", T.list(Employee)),
    ])

    const graph = extract(methodsOf([["Hr.Get", T.empty, Team]]), defaultWireFormat)

    expect(Either.map(graph, (g) => g.nodes.map((n) => n.origin.name))).toEqual(Either.right(["Employee", "Team"]))
  })

  it("collects types reachable through containers, aliases and payloads", () => {
    const Id = T.alias({ module: "acme/api", name: "Id" }, T.string)
    const Color = T.enumeration({ module: "acme/api", name: "Color" }, [T.variant("Red", "red")])
    const Point = T.struct({ module: "acme/geo", name: "Point" }, () => [T.field("x", T.float)])
    const Shape = T.enumeration({ module: "acme/geo", name: "Shape" }, [
      T.variant("Dot", "dot", { payload: Point }),
    ])
    const Request = T.struct({ module: "acme/api", name: "Request" }, () => [
      T.field("ids", T.list(Id)),
      T.field("byColor", T.map(Color, T.list(Shape))),
    ])

    const graph = extract(methodsOf([["Shapes.Find", Request, T.empty]]), defaultWireFormat)

    expect(Either.map(graph, (g) => g.nodes.map((n) => `${n.origin.module}.${n.origin.name}`))).toEqual(
      Either.right(["acme/api.Color", "acme/api.Id", "acme/api.Request", "acme/geo.Point", "acme/geo.Shape"]),
    )
  })

  it("fails on a function-typed field with the field path", () => {
    const Widget = T.struct({ module: "acme/ui", name: "Widget" }, () => [
      T.field("onClick", T.func("onClick")),
    ])

    const graph = extract(methodsOf([["Ui.Render", Widget, T.empty]]), defaultWireFormat)

    expect(Either.isLeft(graph)).toBe(true)
    if (Either.isLeft(graph)) {
      expect(graph.left.path).toBe("Ui.Render.request.onClick")
      expect(graph.left.reason).toBe("function onClick has no wire representation")
    }
  })

  it("fails on opaque types", () => {
    const Conn = T.opaque({ module: "acme/db", name: "Conn" })
    const Holder = T.struct({ module: "acme/db", name: "Holder" }, () => [T.field("conn", Conn)])

    const graph = extract(methodsOf([["Db.Open", T.empty, Holder]]), defaultWireFormat)

    expect(Either.isLeft(graph)).toBe(true)
    if (Either.isLeft(graph)) {
      expect(graph.left.path).toBe("Db.Open.response.conn")
      expect(graph.left.reason).toBe("acme/db.Conn is opaque and has no serializable fields")
    }
  })

  it("fails on map keys that cannot be object keys", () => {
    const Key = T.struct({ module: "acme/api", name: "Key" }, () => [])
    const Lookup = T.struct({ module: "acme/api", name: "Lookup" }, () => [
      T.field("entries", T.map(Key, T.string)),
    ])

    const graph = extract(methodsOf([["Kv.Get", Lookup, T.empty]]), defaultWireFormat)

    expect(Either.isLeft(graph)).toBe(true)
    if (Either.isLeft(graph)) {
      expect(graph.left.reason).toBe("map keys must be strings, integers or enums without payloads")
    }
  })

  it("fails when two fields serialize under the same name", () => {
    const Clash = T.struct({ module: "acme/api", name: "Clash" }, () => [
      T.field("userId", T.int),
      T.field("user_id", T.int),
    ])

    const graph = extract(methodsOf([["Users.Get", Clash, T.empty]]), { fieldCase: "snake", optionalStyle: "undefined" })

    expect(Either.isLeft(graph)).toBe(true)
    if (Either.isLeft(graph)) {
      expect(graph.left.reason).toBe("fields userId and user_id of acme/api.Clash both serialize as \"user_id\"")
    }
  })

  it("fails when one origin has two different definitions", () => {
    const A = T.struct({ module: "acme/api", name: "Thing" }, () => [T.field("a", T.int)])
    const B = T.struct({ module: "acme/api", name: "Thing" }, () => [T.field("b", T.int)])

    const graph = extract(methodsOf([["Things.Get", A, B]]), defaultWireFormat)

    expect(Either.isLeft(graph)).toBe(true)
    if (Either.isLeft(graph)) {
      expect(graph.left.path).toBe("Things.Get.response")
      expect(graph.left.reason).toBe("acme/api.Thing is declared more than once with different definitions")
    }
  })
})

describe("resolve", () => {
  const origin = (module: string, name: string) => ({ module, name })

  it("keeps the declared name for the strip prefix module itself", () => {
    expect(candidateName(origin("pkg/api", "Widget"), "pkg/api")).toBe("Widget")
  })

  it("qualifies subpackages by their path below the prefix", () => {
    expect(candidateName(origin("pkg/api/v1", "User"), "pkg/api")).toBe("v1_User")
    expect(candidateName(origin("pkg/api/v2", "User"), "pkg/api")).toBe("v2_User")
    expect(candidateName(origin("pkg/api/admin/v1", "User"), "pkg/api/")).toBe("admin_v1_User")
  })

  it("qualifies everything else by its full module path", () => {
    expect(candidateName(origin("github.com/acme/shared", "Money"), "pkg/api")).toBe("github_com_acme_shared_Money")
    expect(candidateName(origin("pkg/apiary", "Bee"), "pkg/api")).toBe("pkg_apiary_Bee")
  })

  it("escapes reserved words", () => {
    expect(candidateName(origin("pkg/api", "default"), "pkg/api")).toBe("default_")
  })

  it("escapes globals the emitted declarations refer to", () => {
    expect(candidateName(origin("pkg/api", "Record"), "pkg/api")).toBe("Record_")
    expect(candidateName(origin("pkg/api/v1", "Record"), "pkg/api")).toBe("v1_Record")
  })

  it("gives distinct origins distinct names", () => {
    const V1User = T.struct({ module: "pkg/api/v1", name: "User" }, () => [])
    const V2User = T.struct({ module: "pkg/api/v2", name: "User" }, () => [])
    const Widget = T.struct({ module: "pkg/api", name: "Widget" }, () => [
      T.field("a", V1User),
      T.field("b", V2User),
    ])
    const graph = Either.getOrThrow(extract(methodsOf([["W.Get", T.empty, Widget]]), defaultWireFormat))

    const names = Either.map(resolve(graph.nodes, "pkg/api"), (r) => graph.nodes.map((n) => r.nameOf(n.origin)))

    expect(names).toEqual(Either.right(["Widget", "v1_User", "v2_User"]))
  })

  it("fails when two origins sanitize to the same name", () => {
    const A = T.struct({ module: "pkg/api/v1", name: "User" }, () => [])
    const B = T.struct({ module: "pkg/api/v1-", name: "User" }, () => [])
    const Both = T.struct({ module: "pkg/api", name: "Both" }, () => [T.field("a", A), T.field("b", B)])
    const graph = Either.getOrThrow(extract(methodsOf([["W.Get", T.empty, Both]]), defaultWireFormat))

    const result = resolve(graph.nodes, "pkg/api")

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.name).toBe("v1_User")
      expect(result.left.first).toBe("pkg/api/v1.User")
      expect(result.left.second).toBe("pkg/api/v1-.User")
    }
  })

  it("sanitizes module paths into identifiers", () => {
    expect(sanitize("github.com/acme/api")).toBe("github_com_acme_api")
    expect(sanitize("2fa/codes")).toBe("_2fa_codes")
    expect(sanitize("//")).toBe("")
  })
})
