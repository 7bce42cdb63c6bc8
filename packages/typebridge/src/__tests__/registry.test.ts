import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as Stream from "effect/Stream"
import { describe, expect, it } from "vitest"
import * as Atom from "../core/atom/Atom.js"
import * as T from "../core/descriptor/constructors.js"
import * as Endpoint from "../core/registry/Endpoint.js"
import * as Registry from "../core/registry/Registry.js"
import { RegistrationError } from "../errors/index.js"

const Ping = T.struct({ module: "acme/api", name: "Ping" }, () => [T.field("message", T.string)])

const echo = Endpoint.query<{ message: string }, { message: string }>({
  request: Ping,
  response: Ping,
  handler: (request) => Effect.succeed(request),
})

describe("Registry", () => {
  it("describes a registered method", async () => {
    const descriptor = await Effect.runPromise(
      Effect.flatMap(Registry.make(), (registry) => registry.register("Echo", "Say", echo)),
    )

    expect(descriptor).toMatchObject({
      service: "Echo",
      method: "Say",
      key: "Echo.Say",
      path: "/Echo/Say",
      kind: "unary",
      primitive: "query",
      httpMethod: "GET",
    })
  })

  it("maps each primitive to its verb and kind", async () => {
    const methods = await Effect.runPromise(
      Effect.gen(function* () {
        const registry = yield* Registry.make()
        const counter = yield* Atom.make({ count: 0 })
        const service = registry.service("Echo")
        yield* service.register("Query", echo)
        yield* service.register(
          "Exec",
          Endpoint.exec({ request: Ping, response: Ping, handler: (r: unknown) => Effect.succeed(r) }),
        )
        yield* service.register(
          "Stream",
          Endpoint.stream({ request: Ping, response: Ping, handler: () => Stream.empty }),
        )
        yield* service.register("Live", Endpoint.live(counter, { response: T.map(T.string, T.int) }))
        return yield* registry.methods
      }),
    )

    expect(methods.map((m) => [m.method, m.primitive, m.kind, m.httpMethod])).toEqual([
      ["Exec", "exec", "unary", "POST"],
      ["Live", "atom", "streaming", "POST"],
      ["Query", "query", "unary", "GET"],
      ["Stream", "stream", "streaming", "POST"],
    ])
  })

  it("rejects a duplicate key instead of overwriting", async () => {
    const error = await Effect.runPromise(
      Effect.gen(function* () {
        const registry = yield* Registry.make()
        yield* registry.register("Echo", "Say", echo)
        return yield* Effect.flip(registry.register("Echo", "Say", echo))
      }),
    )

    expect(error).toBeInstanceOf(RegistrationError)
    expect(error.key).toBe("Echo.Say")
    expect(error.reason).toBe("Duplicate")
  })

  it("keeps the first endpoint after a rejected duplicate", async () => {
    const other = Endpoint.exec({ request: Ping, response: Ping, handler: (r: unknown) => Effect.succeed(r) })
    const primitive = await Effect.runPromise(
      Effect.gen(function* () {
        const registry = yield* Registry.make()
        yield* registry.register("Echo", "Say", echo)
        yield* Effect.either(registry.register("Echo", "Say", other))
        const entry = yield* registry.lookup("Echo.Say")
        return Option.map(entry, (e) => e.descriptor.primitive)
      }),
    )

    expect(primitive).toEqual(Option.some("query"))
  })

  it("rejects names that are not identifiers", async () => {
    const error = await Effect.runPromise(
      Effect.flatMap(Registry.make(), (registry) => Effect.flip(registry.register("Echo", "say-it", echo))),
    )

    expect(error.key).toBe("Echo.say-it")
    expect(error.reason).toBe("InvalidName")
  })

  it("refuses registration once frozen", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const registry = yield* Registry.make()
        yield* registry.freeze
        const frozen = yield* registry.isFrozen
        const error = yield* Effect.flip(registry.register("Echo", "Say", echo))
        return { frozen, reason: error.reason }
      }),
    )

    expect(result).toEqual({ frozen: true, reason: "Frozen" })
  })

  it("lists methods sorted by key", async () => {
    const keys = await Effect.runPromise(
      Effect.gen(function* () {
        const registry = yield* Registry.make()
        yield* registry.register("Users", "List", echo)
        yield* registry.register("Accounts", "Get", echo)
        yield* registry.register("Users", "Get", echo)
        const methods = yield* registry.methods
        return methods.map((m) => m.key)
      }),
    )

    expect(keys).toEqual(["Accounts.Get", "Users.Get", "Users.List"])
  })

  it("merges the wire format with defaults", async () => {
    const registry = await Effect.runPromise(Registry.make({ fieldCase: "snake" }))

    expect(registry.wire).toEqual({ fieldCase: "snake", optionalStyle: "undefined" })
  })
})
