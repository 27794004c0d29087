import { stringCodec } from "../../../../core/codec/primitive-codecs"
import { describeZQueueContract } from "../../../../ports/__tests__/z-queue.contract"
import { createMemoryHarness } from "../../../../tests/utils/collections-test-helpers"
import { RedisZQueue } from "../../redis-z-queue"

describeZQueueContract("RedisZQueue over MemoryCollectionsClient", () => {
  const { clock, client } = createMemoryHarness(1_700_000_000_000)

  return {
    queue: new RedisZQueue({ client, member: stringCodec }, { key: "jobs", keyspacePrefix: "test:" }),
    client,
    advance: async (ms) => clock.advance(ms),
  }
})
