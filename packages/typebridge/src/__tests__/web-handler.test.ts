import * as Effect from "effect/Effect"
import { describe, expect, it } from "vitest"
import * as T from "../core/descriptor/constructors.js"
import * as Endpoint from "../core/registry/Endpoint.js"
import * as WebHandler from "../core/server/WebHandler.js"
import { makeShop } from "./test-utils/index.js"

const shopHandler = async (options: Partial<WebHandler.WebHandlerConfig> = {}) => {
  const { registry } = await Effect.runPromise(makeShop())
  return WebHandler.toWebHandler(registry, options)
}

const post = (url: string, body: string) =>
  new Request(url, { method: "POST", headers: { "content-type": "application/json" }, body })

const readUntil = async (response: Response, terminator: string): Promise<string> => {
  const body = response.body
  if (body === null) {
    return ""
  }
  const reader = body.getReader()
  const decoder = new TextDecoder()
  let text = ""
  while (!text.includes(terminator)) {
    const { done, value } = await reader.read()
    if (done) break
    text += decoder.decode(value, { stream: true })
  }
  await reader.cancel()
  return text
}

describe("WebHandler", () => {
  it("serves queries from the query string", async () => {
    const handler = await shopHandler()
    const response = await handler(new Request("http://localhost/Widgets/Get?id=3"))

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({ result: { id: 3, name: "widget-3", tags: [] } })
  })

  it("serves exec methods from a JSON body", async () => {
    const handler = await shopHandler()
    const response = await handler(post("http://localhost/Widgets/Create", "{\"id\":9,\"name\":\"gear\",\"tags\":[\"x\"]}"))

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({ result: { id: 9, name: "gear", tags: ["x"] } })
  })

  it("maps error codes to HTTP statuses", async () => {
    const handler = await shopHandler()
    const missing = await handler(new Request("http://localhost/Widgets/Get?id=0"))
    const invalid = await handler(post("http://localhost/Widgets/Create", "{\"id\":1,\"name\":\"\",\"tags\":[]}"))

    expect(missing.status).toBe(404)
    expect(await missing.json()).toEqual({ error: { code: "not_found", message: "widget 0 not found" } })
    expect(invalid.status).toBe(400)
    expect(await invalid.json()).toEqual({ error: { code: "invalid_argument", message: "name is required", details: {} } })
  })

  it("answers the wrong verb with 405", async () => {
    const handler = await shopHandler()
    const response = await handler(post("http://localhost/Widgets/Get", "{\"id\":1}"))

    expect(response.status).toBe(405)
    expect(response.headers.get("allow")).toBe("GET")
    expect(await response.json()).toEqual({ error: { code: "invalid_argument", message: "Widgets.Get requires GET" } })
  })

  it("answers unknown paths with 404", async () => {
    const handler = await shopHandler()
    const response = await handler(new Request("http://localhost/Nope/Nope"))

    expect(response.status).toBe(404)
    expect(await response.json()).toEqual({ error: { code: "not_found", message: "No method at /Nope/Nope" } })
  })

  it("rejects bodies that are not JSON", async () => {
    const handler = await shopHandler()
    const response = await handler(post("http://localhost/Widgets/Create", "{bad"))

    expect(response.status).toBe(400)
    expect(await response.json()).toEqual({ error: { code: "invalid_argument", message: "request body is not valid JSON" } })
  })

  it("mounts under a base path", async () => {
    const handler = await shopHandler({ basePath: "/rpc/" })

    expect((await handler(new Request("http://localhost/rpc/Widgets/Get?id=2"))).status).toBe(200)
    expect((await handler(new Request("http://localhost/Widgets/Get?id=2"))).status).toBe(404)
  })

  it("streams live methods as server-sent events", async () => {
    const handler = await shopHandler()
    const response = await handler(post("http://localhost/Stats/Visits", "{}"))

    expect(response.status).toBe(200)
    expect(response.headers.get("content-type")).toContain("text/event-stream")
    expect(await readUntil(response, "\n\n")).toBe("data: {\"result\":{\"count\":0}}\n\n")
  })

  it("freezes the registry once it serves a request", async () => {
    const { registry } = await Effect.runPromise(makeShop())
    const handler = WebHandler.toWebHandler(registry)
    await handler(new Request("http://localhost/Widgets/Get?id=1"))

    const error = await Effect.runPromise(Effect.flip(registry.register("Late", "Method", Endpoint.exec({
      request: T.empty,
      response: T.empty,
      handler: () => Effect.succeed({}),
    }))))

    expect(error.reason).toBe("Frozen")
  })

  it("sends heartbeats between events", async () => {
    const handler = await shopHandler({ heartbeatInterval: "5 millis" })
    const response = await handler(post("http://localhost/Stats/Visits", "{}"))
    const text = await readUntil(response, ": heartbeat\n\n")

    expect(text.startsWith("data: {\"result\":{\"count\":0}}\n\n: heartbeat\n\n")).toBe(true)
  })
})
