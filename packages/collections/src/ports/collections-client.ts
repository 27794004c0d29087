/**
 * A sorted-set member as the store returns it.
 */
export type ScoredMember = {
  value: string
  score: number
}

export type ZRangeByScoreOptions = {
  BY: "SCORE"

  /**
   * Descending order. The store then expects the upper bound first.
   */
  REV?: boolean

  /** `count < 0` returns everything after `offset`. */
  LIMIT?: { offset: number; count: number }
}

/**
 * Commands queued into one MULTI/EXEC batch.
 */
export type CollectionsMulti = {
  hSet(key: string, fields: ReadonlyMap<string, string>): CollectionsMulti
  hIncrBy(key: string, field: string, increment: number): CollectionsMulti
  hIncrByFloat(key: string, field: string, increment: number): CollectionsMulti
  zAdd(key: string, members: readonly ScoredMember[]): CollectionsMulti
  pExpire(key: string, ms: number): CollectionsMulti

  /**
   * Runs the batch. Resolves with one reply per queued command, or rejects
   * with the first failure.
   */
  exec(): Promise<unknown[]>
}

/**
 * The subset of a node-redis client the collection adapters issue.
 *
 * @remarks
 * Method names and reply shapes follow node-redis v5 with its default type
 * mapping, so a real client can be handed over as is. The in-memory client
 * implements the same contract for tests.
 */
export type CollectionsClient = {
  hSet(key: string, fields: ReadonlyMap<string, string>): Promise<number>
  hGet(key: string, field: string): Promise<string | null>
  hmGet(key: string, fields: readonly string[]): Promise<(string | null)[]>
  hGetAll(key: string): Promise<Record<string, string>>
  hDel(key: string, fields: readonly string[]): Promise<number>
  hExists(key: string, field: string): Promise<number>
  hLen(key: string): Promise<number>
  hKeys(key: string): Promise<string[]>
  hVals(key: string): Promise<string[]>
  hIncrBy(key: string, field: string, increment: number): Promise<number>
  hIncrByFloat(key: string, field: string, increment: number): Promise<string>

  zAdd(key: string, members: readonly ScoredMember[]): Promise<number>
  zRem(key: string, members: readonly string[]): Promise<number>
  zRangeWithScores(
    key: string,
    min: string,
    max: string,
    options: ZRangeByScoreOptions,
  ): Promise<ScoredMember[]>
  zPopMinCount(key: string, count: number): Promise<ScoredMember[]>
  zPopMaxCount(key: string, count: number): Promise<ScoredMember[]>
  zRemRangeByScore(key: string, min: string, max: string): Promise<number>
  zCard(key: string): Promise<number>
  zCount(key: string, min: string, max: string): Promise<number>
  zScore(key: string, member: string): Promise<number | null>

  pExpire(key: string, ms: number): Promise<number>
  pTTL(key: string): Promise<number>

  multi(): CollectionsMulti

  /**
   * A view of this client whose commands observe `signal`.
   */
  withAbortSignal(signal: AbortSignal): CollectionsClient
}
