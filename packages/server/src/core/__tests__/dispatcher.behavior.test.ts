import type { Logger } from "@kvrest/logger"
import { NullLogger } from "@kvrest/logger"
import { mock } from "vitest-mock-extended"
import { createMemoryConnectionFactory } from "../../adapters/memory/memory-connection"
import { MemoryStore } from "../../adapters/memory/memory-store"
import type { Connection } from "../../ports/connection"
import type { Mock } from "../../tests/mock"
import { createDispatcher, type DispatchRequest, isRestTokenCommand, requestToken } from "../dispatcher"
import { TokenStore } from "../token-store"

const API_TOKEN = "test-token"

const WRONGTYPE = "WRONGTYPE Operation against a key holding the wrong kind of value"
const WRONGPASS = "WRONGPASS invalid username-password pair or user is disabled."

type RequestParts = {
  method?: string
  path?: string
  body?: string
  authorization?: string
}

function request(init: RequestParts = {}): DispatchRequest {
  return {
    method: init.method ?? "POST",
    url: `http://localhost${init.path ?? "/"}`,
    authorization: "authorization" in init ? init.authorization : `Bearer ${API_TOKEN}`,
    readBody: async () => init.body ?? "",
  }
}

describe("dispatcher", () => {
  describe("against the memory store", () => {
    let tokenStore: TokenStore

    function dispatcher() {
      return createDispatcher({
        apiToken: API_TOKEN,
        getConnection: createMemoryConnectionFactory(new MemoryStore({ users: { user: "pwd" } })),
        tokenStore,
        logger: new NullLogger(),
      })
    }

    beforeEach(() => {
      tokenStore = new TokenStore()
    })

    describe("authentication", () => {
      it("rejects a missing token", async () => {
        const res = await dispatcher()(request({ authorization: undefined, body: '["PING"]' }))

        expect(res).toStrictEqual({ status: 401, body: { error: "Unauthorized" } })
      })

      it("rejects an unknown token", async () => {
        const res = await dispatcher()(request({ authorization: "Bearer nope", body: '["PING"]' }))

        expect(res).toStrictEqual({ status: 401, body: { error: "Unauthorized" } })
      })

      it("prefers the _token query parameter over the header", async () => {
        const dispatch = dispatcher()

        const viaQuery = await dispatch(
          request({ path: `/ping?_token=${API_TOKEN}`, authorization: "Bearer nope" }),
        )
        const wrongQuery = await dispatch(request({ path: "/ping?_token=nope" }))

        expect(viaQuery).toStrictEqual({ status: 200, body: { result: "PONG" } })
        expect(wrongQuery.status).toBe(401)
      })

      it("authenticates before checking the method", async () => {
        const res = await dispatcher()(request({ method: "PUT", authorization: undefined }))

        expect(res.status).toBe(401)
      })
    })

    it("answers 405 with an empty body for other methods", async () => {
      const res = await dispatcher()(request({ method: "DELETE", path: "/get/a" }))

      expect(res).toStrictEqual({ status: 405 })
    })

    it("answers 500 when the body cannot be read", async () => {
      const req: DispatchRequest = {
        ...request(),
        readBody: () => Promise.reject(new Error("socket hang up")),
      }

      expect(await dispatcher()(req)).toStrictEqual({
        status: 500,
        body: { error: "socket hang up" },
      })
    })

    describe("root path", () => {
      it("runs a JSON array command", async () => {
        const res = await dispatcher()(request({ body: '["ECHO","a"]' }))

        expect(res).toStrictEqual({ status: 200, body: { result: "a" } })
      })

      it("serializes a missing value as null", async () => {
        const res = await dispatcher()(request({ body: '["GET","missing"]' }))

        expect(res).toStrictEqual({ status: 200, body: { result: null } })
      })

      it("reports parse and empty errors", async () => {
        const dispatch = dispatcher()

        expect(await dispatch(request({ body: "{" }))).toStrictEqual({
          status: 400,
          body: { error: "ERR failed to parse command" },
        })
        expect(await dispatch(request({ body: "[]" }))).toStrictEqual({
          status: 400,
          body: { error: "ERR empty command" },
        })
      })

      it("passes backing-store errors through", async () => {
        const res = await dispatcher()(request({ body: '["NOPE","x"]' }))

        expect(res).toStrictEqual({
          status: 400,
          body: { error: "ERR unknown command 'NOPE', with args beginning with: 'x' " },
        })
      })

      it("ignores a trailing slash", async () => {
        const res = await dispatcher()(request({ path: "/", body: '["PING"]' }))

        expect(res).toStrictEqual({ status: 200, body: { result: "PONG" } })
      })
    })

    describe("path-encoded commands", () => {
      it("appends query pairs as arguments", async () => {
        const dispatch = dispatcher()

        const set = await dispatch(request({ method: "GET", path: "/set/a/v?EX=10" }))
        const ttl = await dispatch(request({ method: "GET", path: "/ttl/a" }))

        expect(set).toStrictEqual({ status: 200, body: { result: "OK" } })
        expect(ttl).toStrictEqual({ status: 200, body: { result: 10 } })
      })

      it("uses the body as the last path argument", async () => {
        const dispatch = dispatcher()

        await dispatch(request({ path: "/set/greeting", body: "hello world" }))
        const res = await dispatch(request({ path: "/get/greeting" }))

        expect(res).toStrictEqual({ status: 200, body: { result: "hello world" } })
      })

      it("reports the store's arity errors", async () => {
        const res = await dispatcher()(request({ path: "/get" }))

        expect(res).toStrictEqual({
          status: 400,
          body: { error: "ERR wrong number of arguments for 'get' command" },
        })
      })
    })

    describe("pipeline", () => {
      it("runs every command and keeps positions", async () => {
        const res = await dispatcher()(
          request({
            path: "/pipeline",
            body: '[["SET","a","1"],["HGETALL","a"],["GET","a"]]',
          }),
        )

        expect(res).toStrictEqual({
          status: 200,
          body: [{ result: "OK" }, { error: WRONGTYPE }, { result: "1" }],
        })
      })

      it("reports empty inner commands in place", async () => {
        const res = await dispatcher()(
          request({ path: "/pipeline/", body: '[["ECHO","x"],[],["ECHO","y"]]' }),
        )

        expect(res).toStrictEqual({
          status: 200,
          body: [{ result: "x" }, { error: "ERR empty pipeline command" }, { result: "y" }],
        })
      })

      it("rejects malformed and empty pipelines", async () => {
        const dispatch = dispatcher()

        expect(await dispatch(request({ path: "/pipeline", body: '["GET","a"]' }))).toStrictEqual({
          status: 400,
          body: { error: "ERR failed to parse pipeline request" },
        })
        expect(await dispatch(request({ path: "/pipeline", body: "[]" }))).toStrictEqual({
          status: 400,
          body: { error: "ERR empty pipeline request" },
        })
      })
    })

    describe("ACL RESTTOKEN", () => {
      it("surfaces a wrong password unchanged", async () => {
        const res = await dispatcher()(
          request({ body: '["ACL","RESTTOKEN","user","wrongpass"]' }),
        )

        expect(res).toStrictEqual({ status: 400, body: { error: WRONGPASS } })
        expect(tokenStore.size).toBe(0)
      })

      it("requires exactly a username and a password", async () => {
        const res = await dispatcher()(request({ body: '["ACL","RESTTOKEN","user"]' }))

        expect(res).toStrictEqual({
          status: 400,
          body: { error: "ERR invalid syntax. Usage: ACL RESTTOKEN username password" },
        })
      })

      it("issues a token that authenticates as the user", async () => {
        const dispatch = dispatcher()

        const issued = await dispatch(request({ body: '["acl","resttoken","user","pwd"]' }))

        expect(issued.status).toBe(200)
        const token = issued.body && "result" in issued.body ? issued.body.result : undefined
        expect(typeof token).toBe("string")
        expect(token).not.toBe("")
        expect(tokenStore.lookup(String(token))).toStrictEqual({
          username: "user",
          password: "pwd",
        })

        const whoami = await dispatch(
          request({ body: '["ACL","WHOAMI"]', authorization: `Bearer ${String(token)}` }),
        )

        expect(whoami).toStrictEqual({ status: 200, body: { result: "user" } })
      })

      it("uses the admin token without authenticating the connection", async () => {
        const res = await dispatcher()(request({ body: '["ACL","WHOAMI"]' }))

        expect(res).toStrictEqual({ status: 200, body: { result: "default" } })
      })
    })
  })

  describe("connection handling", () => {
    let conn: Mock<Connection>
    let logger: Mock<Logger>
    let tokenStore: TokenStore

    function dispatcher() {
      return createDispatcher({
        apiToken: API_TOKEN,
        getConnection: async () => conn,
        tokenStore,
        logger,
      })
    }

    beforeEach(() => {
      conn = mock<Connection>()
      logger = mock<Logger>()
      tokenStore = new TokenStore()

      conn.close.mockResolvedValue(undefined)
    })

    it("closes the connection after a command", async () => {
      conn.do.mockResolvedValue("PONG")

      await dispatcher()(request({ body: '["PING"]' }))

      expect(conn.do).toHaveBeenCalledWith("PING")
      expect(conn.close).toHaveBeenCalledOnce()
    })

    it("closes the connection after a failed command", async () => {
      conn.do.mockRejectedValue(new Error("ERR boom"))

      const res = await dispatcher()(request({ body: '["PING"]' }))

      expect(res).toStrictEqual({ status: 400, body: { error: "ERR boom" } })
      expect(conn.close).toHaveBeenCalledOnce()
    })

    it("does not open a connection for rejected requests", async () => {
      const getConnection = vi.fn(async () => conn)
      const dispatch = createDispatcher({
        apiToken: API_TOKEN,
        getConnection,
        tokenStore,
        logger,
      })

      await dispatch(request({ authorization: undefined }))
      await dispatch(request({ method: "PATCH" }))

      expect(getConnection).not.toHaveBeenCalled()
    })

    it("logs close failures without changing the reply", async () => {
      conn.do.mockResolvedValue("PONG")
      conn.close.mockRejectedValue(new Error("already closed"))

      const res = await dispatcher()(request({ body: '["PING"]' }))

      expect(res).toStrictEqual({ status: 200, body: { result: "PONG" } })
      expect(logger.warn).toHaveBeenCalledWith("Failed to close backing connection", {
        err: expect.any(Error),
      })
    })

    it("logs command names only", async () => {
      conn.do.mockResolvedValue("OK")

      await dispatcher()(request({ body: '["SET","secret-key","secret-value"]' }))

      expect(logger.debug).toHaveBeenCalledWith("Executing command", { command: "SET" })
    })

    it("authenticates issued tokens before the command", async () => {
      tokenStore.store("issued", { username: "user", password: "pwd" })
      conn.do.mockResolvedValue("OK")

      await dispatcher()(request({ body: '["GET","a"]', authorization: "Bearer issued" }))

      expect(conn.do.mock.calls).toStrictEqual([
        ["AUTH", "user", "pwd"],
        ["GET", "a"],
      ])
    })

    it("stops when authenticating an issued token fails", async () => {
      tokenStore.store("issued", { username: "user", password: "old" })
      conn.do.mockRejectedValue(new Error(WRONGPASS))

      const res = await dispatcher()(
        request({ body: '["GET","a"]', authorization: "Bearer issued" }),
      )

      expect(res).toStrictEqual({ status: 400, body: { error: WRONGPASS } })
      expect(conn.do).toHaveBeenCalledTimes(1)
    })

    it("rejects a non-string ACL GENPASS reply", async () => {
      conn.do.mockImplementation(async (command) => (command === "AUTH" ? "OK" : 42))

      const res = await dispatcher()(request({ body: '["ACL","RESTTOKEN","user","pwd"]' }))

      expect(res).toStrictEqual({
        status: 400,
        body: { error: "ERR unexpected reply to ACL GENPASS" },
      })
      expect(tokenStore.size).toBe(0)
    })

    it("logs token issuance with the username only", async () => {
      conn.do.mockImplementation(async (command) => (command === "AUTH" ? "OK" : "fresh-token"))

      await dispatcher()(request({ body: '["ACL","RESTTOKEN","user","pwd"]' }))

      expect(logger.info).toHaveBeenCalledWith("Issued REST token", { username: "user" })
    })

    it("propagates connection factory failures", async () => {
      const dispatch = createDispatcher({
        apiToken: API_TOKEN,
        getConnection: () => Promise.reject(new Error("ECONNREFUSED")),
        tokenStore,
        logger,
      })

      await expect(dispatch(request({ body: '["PING"]' }))).rejects.toThrow("ECONNREFUSED")
    })
  })
})

describe("requestToken", () => {
  it("strips the Bearer prefix", () => {
    expect(requestToken(new URL("http://x/"), "Bearer abc")).toBe("abc")
  })

  it("accepts a bare header value", () => {
    expect(requestToken(new URL("http://x/"), "abc")).toBe("abc")
  })

  it("is empty without credentials", () => {
    expect(requestToken(new URL("http://x/"), undefined)).toBe("")
  })
})

describe("isRestTokenCommand", () => {
  it("matches ACL RESTTOKEN in any case", () => {
    expect(isRestTokenCommand("acl", ["ResTToken", "u", "p"])).toBe(true)
    expect(isRestTokenCommand("ACL", ["WHOAMI"])).toBe(false)
    expect(isRestTokenCommand("ACL", [])).toBe(false)
  })
})
