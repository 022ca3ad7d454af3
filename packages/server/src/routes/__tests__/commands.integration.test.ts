import { NullLogger } from "@kvrest/logger"
import { mock } from "vitest-mock-extended"
import { z } from "zod"
import { createMemoryConnectionFactory } from "../../adapters/memory/memory-connection"
import type { Connection, ConnectionFactory } from "../../ports/connection"
import { createRestServer } from "../../rest-server"
import type { Application } from "../../server/server"

const TOKEN = "test-token"

function buildApp(getConnection: ConnectionFactory): Application {
  const { server } = createRestServer(
    { logger: new NullLogger(), getConnection },
    { apiToken: TOKEN, port: 0, requestLogging: { enabled: false } },
  )

  return server.buildApp()
}

const auth = { Authorization: `Bearer ${TOKEN}` }

describe("REST command routes", () => {
  let app: Application

  beforeEach(() => {
    app = buildApp(createMemoryConnectionFactory({ users: { user: "pwd" } }))
  })

  it("runs a command from the path", async () => {
    const res = await app.request("/echo/hello", { headers: auth })

    expect(res.status).toBe(200)
    expect(res.headers.get("content-type")).toMatch(/^application\/json/)
    await expect(res.json()).resolves.toStrictEqual({ result: "hello" })
  })

  it("runs a command from a root JSON body", async () => {
    const res = await app.request("/", {
      method: "POST",
      headers: auth,
      body: JSON.stringify(["SET", "counter", 41]),
    })

    expect(res.status).toBe(200)
    await expect(res.json()).resolves.toStrictEqual({ result: "OK" })

    const incr = await app.request("/incr/counter", { method: "POST", headers: auth })

    await expect(incr.json()).resolves.toStrictEqual({ result: 42 })
  })

  it("runs a pipeline", async () => {
    const res = await app.request("/pipeline", {
      method: "POST",
      headers: auth,
      body: JSON.stringify([
        ["SET", "k", "v"],
        ["GET", "k"],
        ["NOPE"],
      ]),
    })

    expect(res.status).toBe(200)
    await expect(res.json()).resolves.toStrictEqual([
      { result: "OK" },
      { result: "v" },
      { error: "ERR unknown command 'NOPE', with args beginning with: " },
    ])
  })

  it("answers 401 without a token", async () => {
    const res = await app.request("/ping")

    expect(res.status).toBe(401)
    await expect(res.json()).resolves.toStrictEqual({ error: "Unauthorized" })
  })

  it("accepts the token in the query string", async () => {
    const res = await app.request(`/ping?_token=${TOKEN}`)

    expect(res.status).toBe(200)
    await expect(res.json()).resolves.toStrictEqual({ result: "PONG" })
  })

  it("answers 405 with an empty body for other methods", async () => {
    const res = await app.request("/ping", { method: "PUT", headers: auth })

    expect(res.status).toBe(405)
    await expect(res.text()).resolves.toBe("")
  })

  it("answers 400 with the backing store's error", async () => {
    const res = await app.request("/get", { headers: auth })

    expect(res.status).toBe(400)
    await expect(res.json()).resolves.toStrictEqual({
      error: "ERR wrong number of arguments for 'get' command",
    })
  })

  it("issues tokens bound to an ACL user", async () => {
    const issued = await app.request("/", {
      method: "POST",
      headers: auth,
      body: JSON.stringify(["ACL", "RESTTOKEN", "user", "pwd"]),
    })

    expect(issued.status).toBe(200)

    const { result } = z.object({ result: z.string() }).parse(await issued.json())

    expect(result).toMatch(/^[0-9a-f]{64}$/)

    const whoami = await app.request("/acl/whoami", {
      headers: { Authorization: `Bearer ${result}` },
    })

    await expect(whoami.json()).resolves.toStrictEqual({ result: "user" })
  })

  it("echoes the request id", async () => {
    const res = await app.request("/ping", {
      headers: { ...auth, "x-request-id": "req-1" },
    })

    expect(res.headers.get("x-request-id")).toBe("req-1")
  })

  it("serves liveness without a token", async () => {
    const res = await app.request("/health")

    expect(res.status).toBe(200)
    await expect(res.json()).resolves.toStrictEqual({ ok: true })
  })

  it("reports not ready before the server starts", async () => {
    const res = await app.request("/ready")

    expect(res.status).toBe(503)
    await expect(res.json()).resolves.toStrictEqual({ ok: false, reason: "starting" })
  })

  it("answers 500 when the backing store is unreachable", async () => {
    const failing = buildApp(async () => {
      throw new Error("ECONNREFUSED")
    })

    const res = await failing.request("/ping", { headers: auth })

    expect(res.status).toBe(500)
    await expect(res.json()).resolves.toStrictEqual({ error: "ERR internal error" })
  })
})

describe("backingStoreCheck", () => {
  it("fails readiness when PING does not answer PONG", async () => {
    const conn = mock<Connection>()
    conn.do.mockResolvedValue("LOADING")
    conn.close.mockResolvedValue(undefined)

    const { server } = createRestServer(
      { logger: new NullLogger(), getConnection: async () => conn },
      { apiToken: TOKEN, port: 0, host: "127.0.0.1" },
    )

    const handle = await server.start()

    try {
      const res = await server.buildApp().request("/ready")

      expect(res.status).toBe(503)
      await expect(res.json()).resolves.toStrictEqual({ ok: false, reason: "backing-store" })
      expect(conn.close).toHaveBeenCalled()
    } finally {
      await handle.stop()
    }
  })
})
