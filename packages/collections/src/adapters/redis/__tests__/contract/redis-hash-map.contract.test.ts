import { integerCodec, stringCodec } from "../../../../core/codec/primitive-codecs"
import { describeHashMapContract } from "../../../../ports/__tests__/hash-map.contract"
import { createMemoryHarness } from "../../../../tests/utils/collections-test-helpers"
import { RedisHashMap } from "../../redis-hash-map"

describeHashMapContract("RedisHashMap over MemoryCollectionsClient", () => {
  const { clock, client } = createMemoryHarness(1_700_000_000_000)

  return {
    map: new RedisHashMap(
      { client, field: stringCodec, value: integerCodec },
      { key: "scores", keyspacePrefix: "test:" },
    ),
    client,
    advance: async (ms) => clock.advance(ms),
  }
})
