import { TokenStore } from "../token-store"

describe("TokenStore", () => {
  it("maps tokens to credentials", () => {
    const store = new TokenStore()

    store.store("token-1", { username: "user", password: "pwd" })

    expect(store.lookup("token-1")).toStrictEqual({ username: "user", password: "pwd" })
    expect(store.lookup("token-2")).toBeUndefined()
    expect(store.size).toBe(1)
  })

  it("keeps its own copy of the credential", () => {
    const store = new TokenStore()
    const credential = { username: "user", password: "pwd" }

    store.store("t", credential)
    credential.password = "changed"

    expect(store.lookup("t")?.password).toBe("pwd")
  })

  it("forgets every token on clear", () => {
    const store = new TokenStore()

    store.store("a", { username: "u", password: "p" })
    store.store("b", { username: "u", password: "p" })
    store.clear()

    expect(store.size).toBe(0)
    expect(store.lookup("a")).toBeUndefined()
  })
})
