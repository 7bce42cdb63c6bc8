import * as Chunk from "effect/Chunk"
import * as Effect from "effect/Effect"
import * as Fiber from "effect/Fiber"
import * as Stream from "effect/Stream"
import { describe, expect, it } from "vitest"
import * as T from "../core/descriptor/constructors.js"
import * as Endpoint from "../core/registry/Endpoint.js"
import * as Devtools from "../core/server/Devtools.js"
import * as Server from "../core/server/Server.js"
import type { DiscoveryDocument } from "../generator/emit/manifest.js"
import { generate } from "../generator/generate.js"
import { makeShop } from "./test-utils/index.js"

const invoke = (key: string, body: unknown) =>
  Effect.runPromise(Effect.flatMap(makeShop(), ({ registry }) => Server.invoke(registry, key, body)))

describe("Server.invoke", () => {
  it("decodes, runs and encodes a unary call", async () => {
    expect(await invoke("Widgets.Get", { id: 3 })).toEqual({ result: { id: 3, name: "widget-3", tags: [] } })
  })

  it("turns a handler failure into an error envelope", async () => {
    expect(await invoke("Widgets.Get", { id: 0 })).toEqual({
      error: { code: "not_found", message: "widget 0 not found" },
    })
  })

  it("keeps empty details", async () => {
    expect(await invoke("Widgets.Create", { id: 1, name: "", tags: [] })).toEqual({
      error: { code: "invalid_argument", message: "name is required", details: {} },
    })
  })

  it("rejects a request that does not match its descriptor", async () => {
    expect(await invoke("Widgets.Get", {})).toEqual({
      error: { code: "invalid_argument", message: "id: is required", details: { path: "id" } },
    })
    expect(await invoke("Widgets.Create", { id: 1, name: "a", tags: [], color: "green" })).toEqual({
      error: { code: "invalid_argument", message: "color: \"green\" is not a Color value", details: { path: "color" } },
    })
  })

  it("answers unknown methods with not_found", async () => {
    expect(await invoke("Nope.Nope", {})).toEqual({ error: { code: "not_found", message: "Unknown method: Nope.Nope" } })
  })

  it("refuses to call a streaming method as unary", async () => {
    expect(await invoke("Stats.Visits", {})).toEqual({
      error: { code: "invalid_argument", message: "Stats.Visits is a streaming method" },
    })
  })

  it("hides handler defects behind internal", async () => {
    const envelope = await Effect.runPromise(
      Effect.gen(function* () {
        const { registry } = yield* makeShop()
        yield* registry.register(
          "Broken",
          "Call",
          Endpoint.exec({ request: T.empty, response: T.empty, handler: () => Effect.die(new Error("boom")) }),
        )
        return yield* Server.invoke(registry, "Broken.Call", {})
      }),
    )

    expect(envelope).toEqual({ error: { code: "internal", message: "internal error" } })
  })

  it("reports a response that does not match its descriptor as internal", async () => {
    const envelope = await Effect.runPromise(
      Effect.gen(function* () {
        const { registry } = yield* makeShop()
        yield* registry.register(
          "Broken",
          "Shape",
          Endpoint.exec({
            request: T.empty,
            response: T.struct({ module: "acme/api", name: "Count" }, () => [T.field("n", T.int)]),
            handler: () => Effect.succeed({ n: "one" }),
          }),
        )
        return yield* Server.invoke(registry, "Broken.Shape", {})
      }),
    )

    expect(envelope).toEqual({ error: { code: "internal", message: "internal error" } })
  })
})

describe("Server.stream", () => {
  it("serves an atom's current value and later updates", async () => {
    const envelopes = await Effect.runPromise(
      Effect.gen(function* () {
        const { registry, visits } = yield* makeShop()
        const fiber = yield* Effect.fork(Stream.runCollect(Stream.take(Server.streamEnvelopes(registry, "Stats.Visits", {}), 2)))
        while ((yield* visits.subscriberCount) === 0) {
          yield* Effect.sleep("1 millis")
        }
        yield* visits.update((v) => ({ count: v.count + 1 }))
        return Chunk.toReadonlyArray(yield* Fiber.join(fiber))
      }),
    )

    expect(envelopes).toEqual([{ result: { count: 0 } }, { result: { count: 1 } }])
  })

  it("ends with one error envelope for a failing stream", async () => {
    const envelopes = await Effect.runPromise(
      Effect.gen(function* () {
        const { registry } = yield* makeShop()
        yield* registry.register(
          "Feed",
          "Tail",
          Endpoint.stream({
            request: T.empty,
            response: T.int,
            handler: () => Stream.concat(Stream.make(1, 2), Stream.die("lost")),
          }),
        )
        return Chunk.toReadonlyArray(yield* Stream.runCollect(Server.streamEnvelopes(registry, "Feed.Tail", {})))
      }),
    )

    expect(envelopes).toEqual([
      { result: 1 },
      { result: 2 },
      { error: { code: "internal", message: "internal error" } },
    ])
  })

  it("refuses to stream a unary method", async () => {
    const envelopes = await Effect.runPromise(
      Effect.flatMap(makeShop(), ({ registry }) =>
        Stream.runCollect(Server.streamEnvelopes(registry, "Widgets.Get", { id: 1 }))),
    )

    expect(Chunk.toReadonlyArray(envelopes)).toEqual([
      { error: { code: "invalid_argument", message: "Widgets.Get is a unary method" } },
    ])
  })
})

describe("Server.layer", () => {
  it("freezes the registry when built", async () => {
    const reason = await Effect.runPromise(
      Effect.gen(function* () {
        const { registry } = yield* makeShop()
        yield* Effect.provide(Effect.void, Server.layer(registry))
        const error = yield* Effect.flip(registry.register("Late", "Method", Endpoint.exec({
          request: T.empty,
          response: T.empty,
          handler: () => Effect.succeed({}),
        })))
        return error.reason
      }),
    )

    expect(reason).toBe("Frozen")
  })
})

describe("Devtools", () => {
  it("answers Ping", async () => {
    const envelope = await Effect.runPromise(
      Effect.gen(function* () {
        const { registry } = yield* makeShop()
        yield* Devtools.register(registry, { port: 8080 })
        return yield* Server.invoke(registry, "Devtools.Ping", {})
      }),
    )

    expect(envelope).toEqual({ result: { ok: true } })
  })

  it("reports process information", async () => {
    const envelope = await Effect.runPromise(
      Effect.gen(function* () {
        const { registry } = yield* makeShop()
        yield* Devtools.register(registry, { port: 8080, version: "1.2.3" })
        return yield* Server.invoke(registry, "Devtools.Info", {})
      }),
    )

    expect(envelope).toMatchObject({ result: { port: 8080, version: "1.2.3", cpuCount: expect.any(Number) } })
  })

  it("lists the same services as the generated manifest", async () => {
    const { status, discovery } = await Effect.runPromise(
      Effect.gen(function* () {
        const { registry } = yield* makeShop()
        yield* Devtools.register(registry, { port: 9000 })
        const result = yield* generate(registry, { stripPrefix: "acme/api" })
        const status = yield* Server.invoke(registry, "Devtools.Status", {})
        const discovery: DiscoveryDocument = JSON.parse(result.files.find((f) => f.path === "discovery.json")?.content ?? "")
        return { status, discovery }
      }),
    )

    const fromManifest = Object.fromEntries(discovery.services.map((s) => [s.name, s.methods.map((m) => m.name)]))
    expect(status).toEqual({ result: { ok: true, port: 9000, services: fromManifest } })
    expect(fromManifest).toEqual({
      Devtools: ["Info", "Ping", "Status"],
      Stats: ["Visits"],
      Users: ["List"],
      Widgets: ["Create", "Get"],
    })
  })
})
