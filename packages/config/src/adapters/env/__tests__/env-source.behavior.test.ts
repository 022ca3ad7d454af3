import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns all values when no prefix", async () => {
    const source = new EnvSource({ env: { PORT: "8080", HOST: "localhost" } })

    await expect(source.load()).resolves.toEqual({ PORT: "8080", HOST: "localhost" })
  })

  it("filters and strips the prefix", async () => {
    const env = {
      KVREST_API_TOKEN: "test-token",
      KVREST_PORT: "9000",
      PATH: "/usr/bin",
      KVREST_: "ignored",
    }

    const source = new EnvSource({ env, prefix: "KVREST_" })

    await expect(source.load()).resolves.toEqual({ API_TOKEN: "test-token", PORT: "9000" })
  })

  it("is named env", () => {
    expect(new EnvSource({ env: {} }).name).toBe("env")
  })
})
