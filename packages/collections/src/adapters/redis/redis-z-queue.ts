import type { Logger } from "@keyline/logger"
import { decodeWith } from "../../core/codec/decode"
import { MemberNotFoundError } from "../../core/errors"
import {
  assertPagination,
  assertPopCount,
  assertScore,
  formatBound,
  formatBoundLiteral,
} from "../../core/score"
import type { Codec } from "../../ports/codec"
import type { CollectionCallOptions, CollectionWriteOptions } from "../../ports/collection-options"
import type {
  CollectionsClient,
  ScoredMember,
  ZRangeByScoreOptions,
} from "../../ports/collections-client"
import type {
  ScoreBound,
  ScoreBoundLiteral,
  ZElement,
  ZPopResult,
  ZQueue,
} from "../../ports/z-queue"
import { RedisCollection, type RedisCollectionOptions } from "./redis-collection"

export type RedisZQueueDeps<T> = {
  client: CollectionsClient
  member: Codec<T>
  logger?: Logger
}

export type RedisZQueueOptions = RedisCollectionOptions & {
  /** Initial direction of the unqualified range calls. Default: false */
  desc?: boolean
}

type CallOptions = Partial<CollectionCallOptions>

export class RedisZQueue<T> extends RedisCollection implements ZQueue<T> {
  desc: boolean

  private readonly memberCodec: Codec<T>

  constructor(deps: RedisZQueueDeps<T>, opts: RedisZQueueOptions) {
    super(deps.client, opts, deps.logger, "z-queue")
    this.memberCodec = deps.member
    this.desc = opts.desc ?? false
  }

  async add(member: T, score: number, opts?: Partial<CollectionWriteOptions>): Promise<void> {
    await this.addMany([{ member, score }], opts)
  }

  async addMany(
    elements: readonly ZElement<T>[],
    opts?: Partial<CollectionWriteOptions>,
  ): Promise<void> {
    if (elements.length === 0) return

    const scored = elements.map(({ member, score }): ScoredMember => {
      assertScore(score)
      return { value: this.memberCodec.encode(member), score }
    })

    await this.write("zAdd", opts, (multi) => multi.zAdd(this.key, scored))
  }

  async remove(member: T, opts?: CallOptions): Promise<void> {
    await this.removeMany([member], opts)
  }

  async removeMany(members: readonly T[], opts?: CallOptions): Promise<void> {
    if (members.length === 0) return

    const encoded = members.map((member) => this.memberCodec.encode(member))
    await this.call("zRem", opts, (c) => c.zRem(this.key, encoded))
  }

  rangeByScore(
    minScore: ScoreBound,
    maxScore: ScoreBound,
    opts?: CallOptions,
  ): Promise<ZElement<T>[]> {
    return this.range(minScore, maxScore, 0, -1, this.desc, opts)
  }

  rangeByScoreWithLimit(
    minScore: ScoreBound,
    maxScore: ScoreBound,
    offset: number,
    count: number,
    opts?: CallOptions,
  ): Promise<ZElement<T>[]> {
    return this.range(minScore, maxScore, offset, count, this.desc, opts)
  }

  rangeFromScore(minScore: ScoreBound, opts?: CallOptions): Promise<ZElement<T>[]> {
    return this.range(minScore, Infinity, 0, -1, this.desc, opts)
  }

  rangeToScore(maxScore: ScoreBound, opts?: CallOptions): Promise<ZElement<T>[]> {
    return this.range(-Infinity, maxScore, 0, -1, this.desc, opts)
  }

  rangeByScoreRev(
    minScore: ScoreBound,
    maxScore: ScoreBound,
    opts?: CallOptions,
  ): Promise<ZElement<T>[]> {
    return this.range(minScore, maxScore, 0, -1, !this.desc, opts)
  }

  rangeByScoreWithLimitRev(
    minScore: ScoreBound,
    maxScore: ScoreBound,
    offset: number,
    count: number,
    opts?: CallOptions,
  ): Promise<ZElement<T>[]> {
    return this.range(minScore, maxScore, offset, count, !this.desc, opts)
  }

  rangeFromScoreRev(minScore: ScoreBound, opts?: CallOptions): Promise<ZElement<T>[]> {
    return this.range(minScore, Infinity, 0, -1, !this.desc, opts)
  }

  rangeToScoreRev(maxScore: ScoreBound, opts?: CallOptions): Promise<ZElement<T>[]> {
    return this.range(-Infinity, maxScore, 0, -1, !this.desc, opts)
  }

  async popMin(opts?: CallOptions): Promise<ZPopResult<T>> {
    return this.toPopResult(await this.popMinMany(1, opts))
  }

  async popMax(opts?: CallOptions): Promise<ZPopResult<T>> {
    return this.toPopResult(await this.popMaxMany(1, opts))
  }

  async popMinMany(count: number, opts?: CallOptions): Promise<ZElement<T>[]> {
    assertPopCount(count)
    if (count === 0) return []

    const popped = await this.call("zPopMinCount", opts, (c) => c.zPopMinCount(this.key, count))
    return this.toElements(popped)
  }

  async popMaxMany(count: number, opts?: CallOptions): Promise<ZElement<T>[]> {
    assertPopCount(count)
    if (count === 0) return []

    const popped = await this.call("zPopMaxCount", opts, (c) => c.zPopMaxCount(this.key, count))
    return this.toElements(popped)
  }

  async removeRangeByScore(
    min: ScoreBoundLiteral,
    max: ScoreBoundLiteral,
    opts?: CallOptions,
  ): Promise<number> {
    const lo = formatBoundLiteral(min)
    const hi = formatBoundLiteral(max)

    return this.call("zRemRangeByScore", opts, (c) => c.zRemRangeByScore(this.key, lo, hi))
  }

  async count(opts?: CallOptions): Promise<number> {
    return this.call("zCard", opts, (c) => c.zCard(this.key))
  }

  async countByScore(
    min: ScoreBoundLiteral,
    max: ScoreBoundLiteral,
    opts?: CallOptions,
  ): Promise<number> {
    const lo = formatBoundLiteral(min)
    const hi = formatBoundLiteral(max)

    return this.call("zCount", opts, (c) => c.zCount(this.key, lo, hi))
  }

  async score(member: T, opts?: CallOptions): Promise<number> {
    const encoded = this.memberCodec.encode(member)
    const score = await this.call("zScore", opts, (c) => c.zScore(this.key, encoded))
    if (score === null) throw new MemberNotFoundError(this.key, encoded)

    return Math.trunc(score)
  }

  private async range(
    min: ScoreBound,
    max: ScoreBound,
    offset: number,
    count: number,
    desc: boolean,
    opts?: CallOptions,
  ): Promise<ZElement<T>[]> {
    assertPagination(offset, count)

    const lo = formatBound(min)
    const hi = formatBound(max)
    const options: ZRangeByScoreOptions = {
      BY: "SCORE",
      ...(desc && { REV: true }),
      ...((offset > 0 || count >= 0) && { LIMIT: { offset, count } }),
    }

    const replies = await this.call("zRangeWithScores", opts, (c) =>
      desc
        ? c.zRangeWithScores(this.key, hi, lo, options)
        : c.zRangeWithScores(this.key, lo, hi, options),
    )
    return this.toElements(replies)
  }

  private toElements(replies: readonly ScoredMember[]): ZElement<T>[] {
    return replies.map(({ value, score }) => ({
      member: decodeWith(this.memberCodec, value),
      score: Math.trunc(score),
    }))
  }

  private toPopResult(elements: readonly ZElement<T>[]): ZPopResult<T> {
    const [element] = elements
    return element ? { kind: "popped", element } : { kind: "empty" }
  }
}
