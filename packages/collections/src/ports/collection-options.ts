import type { Milliseconds } from "@keyline/clock"

type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }
type SecondsTtl = { kind: "seconds"; seconds: number }

/**
 * Expiry applied to the whole container, not to a single field or member.
 */
export type CollectionTtl = MillisecondsTtl | SecondsTtl

export interface CollectionCallOptions {
  /**
   * Abort signal handed to the store client unchanged. An aborted call
   * rejects with the client's abort error, never a `RemoteStoreError`.
   *
   * @remarks
   * Writes run as one MULTI/EXEC batch. The signal is checked right before
   * the batch is sent; a batch already sent cannot be cancelled.
   */
  readonly signal?: AbortSignal
}

export interface CollectionWriteOptions extends CollectionCallOptions {
  /**
   * Refresh the container's expiry in the same atomic batch as the write.
   *
   * @remarks
   * Only a positive duration is applied; zero or a negative value leaves
   * the current expiry untouched.
   */
  readonly ttl?: CollectionTtl
}
