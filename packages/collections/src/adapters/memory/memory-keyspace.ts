import type { Clock, Milliseconds } from "@keyline/clock"
import type { ScoredMember, ZRangeByScoreOptions } from "../../ports/collections-client"
import { aboveLimit, belowLimit, compareMembers, parseScoreLimit } from "./score-range"

type HashEntry = {
  kind: "hash"
  fields: Map<string, string>
  expiresAt?: Milliseconds
}

type ZSetEntry = {
  kind: "zset"
  scores: Map<string, number>
  expiresAt?: Milliseconds
}

type Entry = HashEntry | ZSetEntry

const WRONGTYPE = "WRONGTYPE Operation against a key holding the wrong kind of value"

const INTEGER = /^[+-]?\d+$/
const FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

function wrongArity(command: string): Error {
  return new Error(`ERR wrong number of arguments for '${command}' command`)
}

/**
 * Synchronous state behind {@link MemoryCollectionsClient}. Containers that
 * become empty are removed, and expired ones are dropped lazily on access.
 */
export class MemoryKeyspace {
  private readonly entries = new Map<string, Entry>()

  constructor(private readonly clock: Clock) {}

  hSet(key: string, fields: ReadonlyMap<string, string>): number {
    if (fields.size === 0) throw wrongArity("hset")

    const hash = this.hash(key, true)
    let added = 0
    for (const [field, value] of fields) {
      if (!hash.fields.has(field)) added++
      hash.fields.set(field, value)
    }
    return added
  }

  hGet(key: string, field: string): string | null {
    return this.hash(key)?.fields.get(field) ?? null
  }

  hmGet(key: string, fields: readonly string[]): (string | null)[] {
    const hash = this.hash(key)
    return fields.map((field) => hash?.fields.get(field) ?? null)
  }

  hGetAll(key: string): Record<string, string> {
    return Object.fromEntries(this.hash(key)?.fields ?? [])
  }

  hDel(key: string, fields: readonly string[]): number {
    if (fields.length === 0) throw wrongArity("hdel")

    const hash = this.hash(key)
    if (!hash) return 0

    let removed = 0
    for (const field of fields) {
      if (hash.fields.delete(field)) removed++
    }
    if (hash.fields.size === 0) this.entries.delete(key)
    return removed
  }

  hExists(key: string, field: string): number {
    return this.hash(key)?.fields.has(field) ? 1 : 0
  }

  hLen(key: string): number {
    return this.hash(key)?.fields.size ?? 0
  }

  hKeys(key: string): string[] {
    return [...(this.hash(key)?.fields.keys() ?? [])]
  }

  hVals(key: string): string[] {
    return [...(this.hash(key)?.fields.values() ?? [])]
  }

  hIncrBy(key: string, field: string, increment: number): number {
    const current = this.hash(key)?.fields.get(field) ?? "0"
    if (!INTEGER.test(current)) throw new Error("ERR hash value is not an integer")

    const next = Number(current) + increment
    if (!Number.isSafeInteger(next)) throw new Error("ERR increment or decrement would overflow")

    this.hash(key, true).fields.set(field, String(next))
    return next
  }

  hIncrByFloat(key: string, field: string, increment: number): string {
    const current = this.hash(key)?.fields.get(field) ?? "0"
    if (!FLOAT.test(current)) throw new Error("ERR hash value is not a float")

    const next = Number(current) + increment
    if (!Number.isFinite(next)) throw new Error("ERR increment would produce NaN or Infinity")

    const reply = String(next)
    this.hash(key, true).fields.set(field, reply)
    return reply
  }

  zAdd(key: string, members: readonly ScoredMember[]): number {
    if (members.length === 0) throw wrongArity("zadd")
    if (members.some(({ score }) => Number.isNaN(score))) {
      throw new Error("ERR value is not a valid float")
    }

    const zset = this.zset(key, true)
    let added = 0
    for (const { value, score } of members) {
      if (!zset.scores.has(value)) added++
      zset.scores.set(value, score)
    }
    return added
  }

  zRem(key: string, members: readonly string[]): number {
    if (members.length === 0) throw wrongArity("zrem")

    const zset = this.zset(key)
    if (!zset) return 0

    let removed = 0
    for (const member of members) {
      if (zset.scores.delete(member)) removed++
    }
    if (zset.scores.size === 0) this.entries.delete(key)
    return removed
  }

  zRangeWithScores(
    key: string,
    min: string,
    max: string,
    options: ZRangeByScoreOptions,
  ): ScoredMember[] {
    // REV takes the upper bound first.
    const lower = parseScoreLimit(options.REV ? max : min)
    const upper = parseScoreLimit(options.REV ? min : max)

    const inRange = this.sorted(key).filter(
      ({ score }) => aboveLimit(score, lower) && belowLimit(score, upper),
    )
    const ordered = options.REV ? inRange.reverse() : inRange

    if (!options.LIMIT) return ordered

    const { offset, count } = options.LIMIT
    return ordered.slice(offset, count < 0 ? undefined : offset + count)
  }

  zPopMinCount(key: string, count: number): ScoredMember[] {
    return this.pop(key, count, this.sorted(key))
  }

  zPopMaxCount(key: string, count: number): ScoredMember[] {
    return this.pop(key, count, this.sorted(key).reverse())
  }

  zRemRangeByScore(key: string, min: string, max: string): number {
    const removed = this.zRangeWithScores(key, min, max, { BY: "SCORE" })
    const zset = this.zset(key)
    if (!zset) return 0

    for (const { value } of removed) zset.scores.delete(value)
    if (zset.scores.size === 0) this.entries.delete(key)
    return removed.length
  }

  zCard(key: string): number {
    return this.zset(key)?.scores.size ?? 0
  }

  zCount(key: string, min: string, max: string): number {
    return this.zRangeWithScores(key, min, max, { BY: "SCORE" }).length
  }

  zScore(key: string, member: string): number | null {
    return this.zset(key)?.scores.get(member) ?? null
  }

  /**
   * A non-positive duration deletes the key, as the server does.
   */
  pExpire(key: string, ms: number): number {
    if (!Number.isSafeInteger(ms)) throw new Error("ERR value is not an integer or out of range")

    const entry = this.live(key)
    if (!entry) return 0

    if (ms <= 0) {
      this.entries.delete(key)
    } else {
      entry.expiresAt = this.clock.nowMs() + ms
    }
    return 1
  }

  /**
   * @returns Remaining milliseconds, `-1` without expiry, `-2` when absent.
   */
  pTTL(key: string): number {
    const entry = this.live(key)
    if (!entry) return -2
    if (entry.expiresAt === undefined) return -1

    return entry.expiresAt - this.clock.nowMs()
  }

  private pop(key: string, count: number, ordered: ScoredMember[]): ScoredMember[] {
    if (count < 0) throw new Error("ERR value is out of range, must be positive")

    const popped = ordered.slice(0, count)
    const zset = this.zset(key)
    if (!zset) return []

    for (const { value } of popped) zset.scores.delete(value)
    if (zset.scores.size === 0) this.entries.delete(key)
    return popped
  }

  private sorted(key: string): ScoredMember[] {
    const zset = this.zset(key)
    if (!zset) return []

    return [...zset.scores]
      .map(([value, score]) => ({ value, score }))
      .sort((a, b) => a.score - b.score || compareMembers(a.value, b.value))
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined

    if (entry.expiresAt !== undefined && entry.expiresAt <= this.clock.nowMs()) {
      this.entries.delete(key)
      return undefined
    }
    return entry
  }

  private hash(key: string): HashEntry | undefined
  private hash(key: string, create: true): HashEntry
  private hash(key: string, create = false): HashEntry | undefined {
    const entry = this.live(key)
    if (entry?.kind === "hash") return entry
    if (entry) throw new Error(WRONGTYPE)
    if (!create) return undefined

    const created: HashEntry = { kind: "hash", fields: new Map() }
    this.entries.set(key, created)
    return created
  }

  private zset(key: string): ZSetEntry | undefined
  private zset(key: string, create: true): ZSetEntry
  private zset(key: string, create = false): ZSetEntry | undefined {
    const entry = this.live(key)
    if (entry?.kind === "zset") return entry
    if (entry) throw new Error(WRONGTYPE)
    if (!create) return undefined

    const created: ZSetEntry = { kind: "zset", scores: new Map() }
    this.entries.set(key, created)
    return created
  }
}
