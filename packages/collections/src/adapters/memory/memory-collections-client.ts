import type { Clock } from "@keyline/clock"
import type {
  CollectionsClient,
  CollectionsMulti,
  ScoredMember,
  ZRangeByScoreOptions,
} from "../../ports/collections-client"
import { MemoryKeyspace } from "./memory-keyspace"

export type MemoryCollectionsClientDeps = {
  /** Drives expiry. */
  clock: Clock

  /** Existing state to share; a new, empty keyspace when omitted. */
  keyspace?: MemoryKeyspace

  /** Commands reject with the signal's reason once it is aborted. */
  signal?: AbortSignal
}

/**
 * In-process {@link CollectionsClient} with the server's hash and sorted-set
 * semantics, for tests and local development.
 *
 * @remarks
 * Single process only. MULTI batches run every queued command, then reject
 * with the first failure, matching the server's EXEC.
 */
export class MemoryCollectionsClient implements CollectionsClient {
  private readonly keyspace: MemoryKeyspace

  constructor(private readonly deps: MemoryCollectionsClientDeps) {
    this.keyspace = deps.keyspace ?? new MemoryKeyspace(deps.clock)
  }

  hSet(key: string, fields: ReadonlyMap<string, string>): Promise<number> {
    return this.run(() => this.keyspace.hSet(key, fields))
  }

  hGet(key: string, field: string): Promise<string | null> {
    return this.run(() => this.keyspace.hGet(key, field))
  }

  hmGet(key: string, fields: readonly string[]): Promise<(string | null)[]> {
    return this.run(() => this.keyspace.hmGet(key, fields))
  }

  hGetAll(key: string): Promise<Record<string, string>> {
    return this.run(() => this.keyspace.hGetAll(key))
  }

  hDel(key: string, fields: readonly string[]): Promise<number> {
    return this.run(() => this.keyspace.hDel(key, fields))
  }

  hExists(key: string, field: string): Promise<number> {
    return this.run(() => this.keyspace.hExists(key, field))
  }

  hLen(key: string): Promise<number> {
    return this.run(() => this.keyspace.hLen(key))
  }

  hKeys(key: string): Promise<string[]> {
    return this.run(() => this.keyspace.hKeys(key))
  }

  hVals(key: string): Promise<string[]> {
    return this.run(() => this.keyspace.hVals(key))
  }

  hIncrBy(key: string, field: string, increment: number): Promise<number> {
    return this.run(() => this.keyspace.hIncrBy(key, field, increment))
  }

  hIncrByFloat(key: string, field: string, increment: number): Promise<string> {
    return this.run(() => this.keyspace.hIncrByFloat(key, field, increment))
  }

  zAdd(key: string, members: readonly ScoredMember[]): Promise<number> {
    return this.run(() => this.keyspace.zAdd(key, members))
  }

  zRem(key: string, members: readonly string[]): Promise<number> {
    return this.run(() => this.keyspace.zRem(key, members))
  }

  zRangeWithScores(
    key: string,
    min: string,
    max: string,
    options: ZRangeByScoreOptions,
  ): Promise<ScoredMember[]> {
    return this.run(() => this.keyspace.zRangeWithScores(key, min, max, options))
  }

  zPopMinCount(key: string, count: number): Promise<ScoredMember[]> {
    return this.run(() => this.keyspace.zPopMinCount(key, count))
  }

  zPopMaxCount(key: string, count: number): Promise<ScoredMember[]> {
    return this.run(() => this.keyspace.zPopMaxCount(key, count))
  }

  zRemRangeByScore(key: string, min: string, max: string): Promise<number> {
    return this.run(() => this.keyspace.zRemRangeByScore(key, min, max))
  }

  zCard(key: string): Promise<number> {
    return this.run(() => this.keyspace.zCard(key))
  }

  zCount(key: string, min: string, max: string): Promise<number> {
    return this.run(() => this.keyspace.zCount(key, min, max))
  }

  zScore(key: string, member: string): Promise<number | null> {
    return this.run(() => this.keyspace.zScore(key, member))
  }

  pExpire(key: string, ms: number): Promise<number> {
    return this.run(() => this.keyspace.pExpire(key, ms))
  }

  pTTL(key: string): Promise<number> {
    return this.run(() => this.keyspace.pTTL(key))
  }

  multi(): CollectionsMulti {
    return new MemoryMulti(this.keyspace, this.deps.signal)
  }

  withAbortSignal(signal: AbortSignal): CollectionsClient {
    return new MemoryCollectionsClient({ ...this.deps, keyspace: this.keyspace, signal })
  }

  private async run<R>(command: () => R): Promise<R> {
    this.deps.signal?.throwIfAborted()
    return command()
  }
}

class MemoryMulti implements CollectionsMulti {
  private readonly queue: (() => unknown)[] = []

  constructor(
    private readonly keyspace: MemoryKeyspace,
    private readonly signal: AbortSignal | undefined,
  ) {}

  hSet(key: string, fields: ReadonlyMap<string, string>): CollectionsMulti {
    return this.enqueue(() => this.keyspace.hSet(key, fields))
  }

  hIncrBy(key: string, field: string, increment: number): CollectionsMulti {
    return this.enqueue(() => this.keyspace.hIncrBy(key, field, increment))
  }

  hIncrByFloat(key: string, field: string, increment: number): CollectionsMulti {
    return this.enqueue(() => this.keyspace.hIncrByFloat(key, field, increment))
  }

  zAdd(key: string, members: readonly ScoredMember[]): CollectionsMulti {
    return this.enqueue(() => this.keyspace.zAdd(key, members))
  }

  pExpire(key: string, ms: number): CollectionsMulti {
    return this.enqueue(() => this.keyspace.pExpire(key, ms))
  }

  async exec(): Promise<unknown[]> {
    this.signal?.throwIfAborted()

    const replies: unknown[] = []
    const failures: unknown[] = []
    for (const command of this.queue.splice(0)) {
      try {
        replies.push(command())
      } catch (err) {
        failures.push(err)
        replies.push(err)
      }
    }

    if (failures.length > 0) throw failures[0]
    return replies
  }

  private enqueue(command: () => unknown): this {
    this.queue.push(command)
    return this
  }
}
