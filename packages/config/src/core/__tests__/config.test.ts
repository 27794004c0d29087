import { Config } from "../config"

describe("Config", () => {
  const data = { REDIS_ADDR: "cache:6379", REDIS_DB: 2, REDIS_IS_CLUSTER: false }
  const provenance = {
    REDIS_ADDR: "env",
    REDIS_DB: "dotenv:.env",
    REDIS_IS_CLUSTER: "default",
  }
  const mergedKeys = new Set(["REDIS_ADDR", "REDIS_DB", "REDIS_POOL"])

  const config = new Config(data, provenance, mergedKeys)

  it("get() returns typed values", () => {
    const addr: string = config.get("REDIS_ADDR")
    const db: number = config.get("REDIS_DB")

    expect(addr).toBe("cache:6379")
    expect(db).toBe(2)
  })

  it("keys() lists schema keys only", () => {
    expect(config.keys()).toStrictEqual(["REDIS_ADDR", "REDIS_DB", "REDIS_IS_CLUSTER"])
  })

  it("explain() names the providing source", () => {
    expect(config.explain("REDIS_ADDR")).toBe("env")
    expect(config.explain("REDIS_DB")).toBe("dotenv:.env")
    expect(config.explain("REDIS_IS_CLUSTER")).toBe("default")
  })

  it("sourcesUsed() returns unique source names in order", () => {
    expect(config.sourcesUsed()).toStrictEqual(["env", "dotenv:.env", "default"])
  })

  it("unknownKeys() returns keys not in the schema", () => {
    expect(config.unknownKeys()).toStrictEqual(["REDIS_POOL"])
  })

  it("value is frozen", () => {
    expect(Object.isFrozen(config.value)).toBe(true)
  })
})
