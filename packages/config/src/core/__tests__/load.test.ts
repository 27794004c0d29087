import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigValidationError, loadConfig } from "../load"

const schema = z.object({
  REDIS_ADDR: z.string().default("localhost:6379"),
  REDIS_DB: z.coerce.number().int().default(0),
})

describe("loadConfig", () => {
  it("applies schema defaults when no source provides a key", async () => {
    const config = await loadConfig({ schema, sources: [new ObjectSource({})] })

    expect(config.value).toStrictEqual({ REDIS_ADDR: "localhost:6379", REDIS_DB: 0 })
    expect(config.explain("REDIS_ADDR")).toBe("default")
  })

  it("later sources override earlier ones", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { REDIS_ADDR: "env-host:6379", REDIS_DB: "1" } }),
        new ObjectSource({ REDIS_DB: "4" }),
      ],
    })

    expect(config.get("REDIS_ADDR")).toBe("env-host:6379")
    expect(config.get("REDIS_DB")).toBe(4)
    expect(config.explain("REDIS_ADDR")).toBe("env")
    expect(config.explain("REDIS_DB")).toBe("object:overrides")
  })

  it("ignores undefined values from a source", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ REDIS_ADDR: "a:1" }),
        new EnvSource({ env: { REDIS_ADDR: undefined } }),
      ],
    })

    expect(config.get("REDIS_ADDR")).toBe("a:1")
  })

  it("reports keys the schema does not know", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ REDIS_ADRR: "typo:1" })],
    })

    expect(config.unknownKeys()).toStrictEqual(["REDIS_ADRR"])
  })

  it("throws ConfigValidationError on invalid values", async () => {
    const promise = loadConfig({
      schema,
      sources: [new ObjectSource({ REDIS_DB: "not-a-number" })],
    })

    await expect(promise).rejects.toBeInstanceOf(ConfigValidationError)
    await expect(promise).rejects.toMatchObject({
      code: "config_invalid",
      context: { sources: ["object:overrides"] },
    })
  })
})
