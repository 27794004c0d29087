import { createNullLogger, type Logger } from "@keyline/logger"
import { AbortError } from "redis"
import type {
  CollectionCallOptions,
  CollectionTtl,
  CollectionWriteOptions,
} from "../../ports/collection-options"
import type { CollectionsClient, CollectionsMulti } from "../../ports/collections-client"
import type { ContainerKey, KeyspacePrefix } from "../../ports/container-key"
import { isAbortError, RemoteStoreError } from "../../core/errors"

export type RedisCollectionDeps = {
  /** Shared client; the caller owns `connect()` and `close()`. */
  client: CollectionsClient
  logger?: Logger
}

export type RedisCollectionOptions = {
  key: ContainerKey
  keyspacePrefix?: KeyspacePrefix
}

type CallOptions = Partial<CollectionCallOptions> | undefined

/**
 * Shared plumbing of the collection adapters: key binding, per-call abort
 * signals, MULTI batches with an optional expiry refresh, and mapping
 * client failures to `RemoteStoreError`.
 */
export abstract class RedisCollection {
  readonly key: string

  protected readonly logger: Logger

  protected constructor(
    private readonly client: CollectionsClient,
    opts: RedisCollectionOptions,
    logger: Logger | undefined,
    module: string,
  ) {
    this.key = `${opts.keyspacePrefix ?? ""}${opts.key}`
    this.logger = (logger ?? createNullLogger()).child({ module, key: this.key })
  }

  protected async call<R>(
    command: string,
    opts: CallOptions,
    fn: (client: CollectionsClient) => Promise<R>,
  ): Promise<R> {
    const signal = opts?.signal
    const client = signal ? this.client.withAbortSignal(signal) : this.client

    try {
      return await fn(client)
    } catch (err) {
      throw this.toFailure(command, err, signal)
    }
  }

  /**
   * Runs `enqueue` plus, for a positive ttl, a `pExpire` of the container in
   * one MULTI/EXEC batch.
   *
   * @returns The batch replies, in queue order.
   */
  protected async write(
    command: string,
    opts: Partial<CollectionWriteOptions> | undefined,
    enqueue: (multi: CollectionsMulti) => void,
  ): Promise<unknown[]> {
    const ttlMs = opts?.ttl ? toMilliseconds(opts.ttl) : 0

    const replies = await this.call(command, opts, (client) => {
      const multi = client.multi()
      enqueue(multi)
      if (ttlMs > 0) multi.pExpire(this.key, ttlMs)

      // node-redis does not forward command options to queued MULTI commands.
      opts?.signal?.throwIfAborted()
      return multi.exec()
    })

    if (ttlMs > 0) this.logger.debug("expiry refreshed", { command, ttlMs })

    return replies
  }

  private toFailure(command: string, err: unknown, signal?: AbortSignal): unknown {
    if (err instanceof AbortError || isAbortError(err, signal)) return err

    this.logger.warn(`${command} failed`, { command, err })
    return new RemoteStoreError(command, this.key, err)
  }
}

/**
 * Whole milliseconds, rounded up. PEXPIRE rejects fractions.
 */
export function toMilliseconds(ttl: CollectionTtl): number {
  return Math.ceil(ttl.kind === "seconds" ? ttl.seconds * 1000 : ttl.milliseconds)
}

/**
 * Integer replies arrive as numbers; float replies as their decimal text.
 */
export function toNumberReply(reply: unknown): number | undefined {
  if (typeof reply === "number") return reply
  if (typeof reply !== "string") return undefined

  const lower = reply.toLowerCase()
  if (lower === "inf" || lower === "+inf") return Infinity
  if (lower === "-inf") return -Infinity

  const value = Number(reply)
  return Number.isNaN(value) ? undefined : value
}
