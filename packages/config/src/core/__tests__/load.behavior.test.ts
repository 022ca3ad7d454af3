import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigError, loadConfig } from "../load"

const schema = z.object({
  API_TOKEN: z.string().min(1),
  PORT: z.coerce.number().int().default(8080),
  HOST: z.string().default("0.0.0.0"),
})

describe("loadConfig", () => {
  it("validates, coerces and applies defaults", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { API_TOKEN: "test-token", PORT: "9000" } })],
    })

    expect(config.value).toEqual({ API_TOKEN: "test-token", PORT: 9000, HOST: "0.0.0.0" })
    expect(config.get("PORT")).toBe(9000)
  })

  it("lets later sources override earlier ones and records provenance", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { API_TOKEN: "from-env", PORT: "9000" } }),
        new ObjectSource({ PORT: 7000 }, "cli"),
      ],
    })

    expect(config.get("API_TOKEN")).toBe("from-env")
    expect(config.get("PORT")).toBe(7000)
    expect(config.explain("API_TOKEN")).toBe("env")
    expect(config.explain("PORT")).toBe("object:cli")
    expect(config.explain("HOST")).toBe("default")
    expect(config.sourcesUsed()).toEqual(["env", "object:cli"])
  })

  it("reports keys the schema does not know", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ API_TOKEN: "test-token", REDIS_ADDR: "stale" })],
    })

    expect(config.unknownKeys()).toEqual(["REDIS_ADDR"])
  })

  it("throws a ConfigError naming the invalid keys", async () => {
    const promise = loadConfig({
      schema,
      sources: [new ObjectSource({ PORT: "not-a-port" })],
    })

    await expect(promise).rejects.toBeInstanceOf(ConfigError)
    await expect(promise).rejects.toMatchObject({
      code: "config_invalid",
      context: { keys: ["API_TOKEN", "PORT"] },
    })
  })

  it("ignores undefined values", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ API_TOKEN: "test-token", PORT: "9000" }),
        new ObjectSource({ PORT: undefined }, "later"),
      ],
    })

    expect(config.get("PORT")).toBe(9000)
  })
})
