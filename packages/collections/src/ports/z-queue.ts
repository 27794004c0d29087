import type { CollectionCallOptions, CollectionWriteOptions } from "./collection-options"

/**
 * One sorted-set element.
 *
 * @remarks
 * Scores are integers. The store keeps them as doubles, so only safe
 * integers (`Number.isSafeInteger`) are accepted on write.
 */
export type ZElement<T> = {
  member: T
  score: number
}

export type ZPopped<T> = {
  readonly kind: "popped"
  readonly element: ZElement<T>
}

export type ZEmpty = {
  readonly kind: "empty"
}

export type ZPopResult<T> = ZPopped<T> | ZEmpty

/**
 * Score bound for range queries. `-Infinity` and `Infinity` mean unbounded.
 */
export type ScoreBound = number

/**
 * Score bound in the store's own syntax: a number, `"-inf"`, `"+inf"`, or an
 * exclusive bound such as `"(10"`.
 */
export type ScoreBoundLiteral = number | "-inf" | "+inf" | `(${number}`

/**
 * Typed access to one remote sorted set.
 *
 * @remarks
 * Range calls return elements ordered by score, ascending unless `desc` is
 * set. The `…Rev` variants invert `desc` for that call only. Elements with
 * equal scores keep the store's member-lexical order.
 */
export interface ZQueue<T> {
  /** Full container key, including any keyspace prefix. */
  readonly key: string

  /**
   * Default direction of the unqualified range calls.
   *
   * @remarks
   * Plain mutable state; changing it while range calls are in flight is
   * the caller's responsibility.
   */
  desc: boolean

  /** Insert a member or update its score. */
  add(member: T, score: number, opts?: Partial<CollectionWriteOptions>): Promise<void>

  /** Empty input resolves immediately. */
  addMany(
    elements: readonly ZElement<T>[],
    opts?: Partial<CollectionWriteOptions>,
  ): Promise<void>

  /** Removing an absent member is a no-op. */
  remove(member: T, opts?: Partial<CollectionCallOptions>): Promise<void>

  removeMany(members: readonly T[], opts?: Partial<CollectionCallOptions>): Promise<void>

  rangeByScore(
    minScore: ScoreBound,
    maxScore: ScoreBound,
    opts?: Partial<CollectionCallOptions>,
  ): Promise<ZElement<T>[]>

  /**
   * Paginated range. `count = -1` means no limit.
   */
  rangeByScoreWithLimit(
    minScore: ScoreBound,
    maxScore: ScoreBound,
    offset: number,
    count: number,
    opts?: Partial<CollectionCallOptions>,
  ): Promise<ZElement<T>[]>

  /** Elements with `score >= minScore`. */
  rangeFromScore(
    minScore: ScoreBound,
    opts?: Partial<CollectionCallOptions>,
  ): Promise<ZElement<T>[]>

  /** Elements with `score <= maxScore`. */
  rangeToScore(
    maxScore: ScoreBound,
    opts?: Partial<CollectionCallOptions>,
  ): Promise<ZElement<T>[]>

  rangeByScoreRev(
    minScore: ScoreBound,
    maxScore: ScoreBound,
    opts?: Partial<CollectionCallOptions>,
  ): Promise<ZElement<T>[]>

  rangeByScoreWithLimitRev(
    minScore: ScoreBound,
    maxScore: ScoreBound,
    offset: number,
    count: number,
    opts?: Partial<CollectionCallOptions>,
  ): Promise<ZElement<T>[]>

  rangeFromScoreRev(
    minScore: ScoreBound,
    opts?: Partial<CollectionCallOptions>,
  ): Promise<ZElement<T>[]>

  rangeToScoreRev(
    maxScore: ScoreBound,
    opts?: Partial<CollectionCallOptions>,
  ): Promise<ZElement<T>[]>

  /** Remove and return the lowest-scoring element. */
  popMin(opts?: Partial<CollectionCallOptions>): Promise<ZPopResult<T>>

  /** Remove and return the highest-scoring element. */
  popMax(opts?: Partial<CollectionCallOptions>): Promise<ZPopResult<T>>

  /** Up to `count` lowest-scoring elements; fewer when the set is smaller. */
  popMinMany(count: number, opts?: Partial<CollectionCallOptions>): Promise<ZElement<T>[]>

  popMaxMany(count: number, opts?: Partial<CollectionCallOptions>): Promise<ZElement<T>[]>

  /**
   * @returns The number of elements removed.
   */
  removeRangeByScore(
    min: ScoreBoundLiteral,
    max: ScoreBoundLiteral,
    opts?: Partial<CollectionCallOptions>,
  ): Promise<number>

  count(opts?: Partial<CollectionCallOptions>): Promise<number>

  countByScore(
    min: ScoreBoundLiteral,
    max: ScoreBoundLiteral,
    opts?: Partial<CollectionCallOptions>,
  ): Promise<number>

  /**
   * Score of `member`.
   *
   * @throws MemberNotFoundError when the member is absent.
   */
  score(member: T, opts?: Partial<CollectionCallOptions>): Promise<number>
}
