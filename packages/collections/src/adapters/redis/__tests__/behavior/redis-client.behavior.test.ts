import { createClient, createCluster } from "redis"
import type { RedisConnectionConfig } from "../../../../config/redis-connection"
import { createRedisCollectionsClient, toRedisUrl } from "../../redis-client"

vi.mock("redis", () => ({
  createClient: vi.fn(),
  createCluster: vi.fn(),
}))

const base: RedisConnectionConfig = {
  addr: "localhost:6379",
  db: 0,
  enableTls: false,
  isCluster: false,
  masterOnly: false,
  keyPrefix: "",
}

describe("createRedisCollectionsClient", () => {
  it("builds a single-node client with the selected database", () => {
    createRedisCollectionsClient({ ...base, db: 2 })

    expect(vi.mocked(createClient)).toHaveBeenCalledExactlyOnceWith({
      url: "redis://localhost:6379",
      database: 2,
    })
    expect(vi.mocked(createCluster)).not.toHaveBeenCalled()
  })

  it("passes credentials and switches to TLS", () => {
    createRedisCollectionsClient({
      ...base,
      addr: "cache:6380",
      enableTls: true,
      username: "app",
      password: "test-secret",
    })

    expect(vi.mocked(createClient)).toHaveBeenCalledExactlyOnceWith({
      url: "rediss://cache:6380",
      database: 0,
      username: "app",
      password: "test-secret",
    })
  })

  it("builds a cluster client that may read from replicas", () => {
    createRedisCollectionsClient({ ...base, addr: "node-1:7000", isCluster: true, password: "test-secret" })

    expect(vi.mocked(createCluster)).toHaveBeenCalledExactlyOnceWith({
      rootNodes: [{ url: "redis://node-1:7000" }],
      defaults: { password: "test-secret" },
      useReplicas: true,
    })
    expect(vi.mocked(createClient)).not.toHaveBeenCalled()
  })

  it("keeps reads on primaries when masterOnly is set", () => {
    createRedisCollectionsClient({ ...base, isCluster: true, masterOnly: true })

    expect(vi.mocked(createCluster)).toHaveBeenCalledExactlyOnceWith({
      rootNodes: [{ url: "redis://localhost:6379" }],
      defaults: {},
      useReplicas: false,
    })
  })
})

describe("toRedisUrl", () => {
  it("uses the rediss scheme for TLS", () => {
    expect(toRedisUrl({ addr: "h:1", enableTls: true })).toBe("rediss://h:1")
    expect(toRedisUrl({ addr: "h:1", enableTls: false })).toBe("redis://h:1")
  })
})
