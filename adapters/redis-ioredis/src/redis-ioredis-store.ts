import type { Redis } from "ioredis"
import {
  type Capsule,
  CapsuleLifecycle,
  type ICapsuleStore,
  OperationalError,
  type RetryPolicy,
  type ScoredMember,
  type StoreConfig,
} from "capsule-digger"
import { DEFAULT_SORTED_SET_KEY, REDIS_IOREDIS_STORE_TYPE } from "./constants"

export interface RedisIoRedisStoreConfig<P> extends StoreConfig<P> {
  redis: Redis
  key?: string
}

/**
 * Capsule store on a Redis sorted set through ioredis.
 *
 * - bury:        `ZADD key <dueAt> <capsule>`
 * - dig:         `ZRANGEBYSCORE key 0 <now> LIMIT 0 1`, then `ZPOPMIN key 1`
 *                (a premature pop is put back with `ZADD` at its score)
 * - destroy:     `ZREM key <capsule>` inside `MULTI`/`EXEC`
 * - destroyAll:  `DEL key`
 */
export class RedisIoRedisStore<P = unknown> implements ICapsuleStore<P> {
  private readonly redis: Redis
  private readonly key: string
  private readonly lifecycle: CapsuleLifecycle<P>

  constructor(config: RedisIoRedisStoreConfig<P>) {
    const { redis, key, ...storeConfig } = config
    this.redis = redis
    this.key = key ?? DEFAULT_SORTED_SET_KEY

    this.lifecycle = new CapsuleLifecycle({
      ...storeConfig,
      type: REDIS_IOREDIS_STORE_TYPE,
      commands: {
        insert: (score, member) => this.insert(score, member),
        hasDue: (maxScore) => this.hasDue(maxScore),
        popMin: () => this.popMin(),
        remove: (member) => this.remove(member),
        clear: () => this.clear(),
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

  private async insert(score: number, member: string): Promise<void> {
    await this.redis.zadd(this.key, score, member)
  }

  private async hasDue(maxScore: number): Promise<boolean> {
    const members = await this.redis.zrangebyscore(this.key, 0, maxScore, "LIMIT", 0, 1)
    return members.length > 0
  }

  private async popMin(): Promise<ScoredMember | null> {
    const [member, score] = await this.redis.zpopmin(this.key, 1)
    if (member === undefined || score === undefined) return null
    return { member, score: Number(score) }
  }

  private async remove(member: string): Promise<void> {
    const results = await this.redis.multi().zrem(this.key, member).exec()
    if (!results) {
      throw new OperationalError("ZREM transaction was aborted", { member })
    }

    for (const [error] of results) {
      if (error) throw error
    }
  }

  private async clear(): Promise<void> {
    await this.redis.del(this.key)
  }
}
