import {
  type Capsule,
  CapsuleLifecycle,
  type ICapsuleStore,
  type RetryPolicy,
  type ScoredMember,
  type StoreConfig,
} from "capsule-digger"
import { DEFAULT_SORTED_SET_KEY, REDIS_NODE_STORE_TYPE } from "./constants"

/**
 * The commands the store sends. A client from `createClient()` fits, whatever
 * modules, functions or scripts it was created with.
 */
export interface RedisNodeClient {
  zAdd(key: string, member: { score: number; value: string }): Promise<unknown>
  zRangeByScore(
    key: string,
    min: number,
    max: number,
    options: { LIMIT: { offset: number; count: number } }
  ): Promise<readonly unknown[]>
  zPopMin(key: string): Promise<{ value: string | Buffer; score: number } | null>
  zRem(key: string, member: string): Promise<unknown>
  del(key: string): Promise<unknown>
}

export interface RedisNodeStoreConfig<P> extends StoreConfig<P> {
  client: RedisNodeClient
  key?: string
}

/**
 * Capsule store on a Redis sorted set through node-redis. Issues the same
 * commands as the ioredis store, except that `ZREM` is sent on its own.
 */
export class RedisNodeStore<P = unknown> implements ICapsuleStore<P> {
  private readonly client: RedisNodeClient
  private readonly key: string
  private readonly lifecycle: CapsuleLifecycle<P>

  constructor(config: RedisNodeStoreConfig<P>) {
    const { client, key, ...storeConfig } = config
    this.client = client
    this.key = key ?? DEFAULT_SORTED_SET_KEY

    this.lifecycle = new CapsuleLifecycle({
      ...storeConfig,
      type: REDIS_NODE_STORE_TYPE,
      commands: {
        insert: async (score, member) => {
          await this.client.zAdd(this.key, { score, value: member })
        },
        hasDue: async (maxScore) => {
          const members = await this.client.zRangeByScore(this.key, 0, maxScore, {
            LIMIT: { offset: 0, count: 1 },
          })
          return members.length > 0
        },
        popMin: () => this.popMin(),
        remove: async (member) => {
          await this.client.zRem(this.key, member)
        },
        clear: async () => {
          await this.client.del(this.key)
        },
      },
    })
  }

  get sortedSetKey(): string {
    return this.key
  }

  type(): string {
    return this.lifecycle.type()
  }

  buryFor(payload: P, durationMs: number): Promise<Capsule<P>> {
    return this.lifecycle.buryFor(payload, durationMs)
  }

  buryUntil(payload: P, dueAtMs: number): Promise<Capsule<P>> {
    return this.lifecycle.buryUntil(payload, dueAtMs)
  }

  dig(signal?: AbortSignal): Promise<Capsule<P> | null> {
    return this.lifecycle.dig(signal)
  }

  destroy(capsule: Capsule<P>, retry?: RetryPolicy, signal?: AbortSignal): Promise<void> {
    return this.lifecycle.destroy(capsule, retry, signal)
  }

  destroyAll(): Promise<void> {
    return this.lifecycle.destroyAll()
  }

  private async popMin(): Promise<ScoredMember | null> {
    // node-redis answers an empty set with null
    const head = await this.client.zPopMin(this.key)
    if (!head) return null
    return { member: head.value.toString(), score: head.score }
  }
}
