import RedisMock from "ioredis-mock"
import {
  CapsuleCodec,
  DecodeError,
  Digger,
  RequeueExhaustedError,
  StoreOperationError,
} from "capsule-digger"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { RedisIoRedisStore } from "./index"

const KEY = "test:capsules:ioredis"

describe("RedisIoRedisStore", () => {
  let redis: any
  let store: RedisIoRedisStore<string>
  const codec = new CapsuleCodec<string>()
  const logger = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() }

  beforeEach(() => {
    redis = new RedisMock()
    store = new RedisIoRedisStore<string>({
      redis,
      key: KEY,
      codec,
      requeueRetry: { maxAttempts: 3, delayMs: 1 },
      destroyRetry: { maxAttempts: 3, delayMs: 1 },
    })
  })

  afterEach(async () => {
    await redis.flushall()
    vi.restoreAllMocks()
    vi.clearAllMocks()
  })

  it("should report its type", () => {
    expect(store.type()).toBe("RedisIoRedis")
  })

  it("should fall back to the default key", () => {
    expect(new RedisIoRedisStore({ redis }).sortedSetKey).toBe("capsules")
  })

  describe("bury", () => {
    it("should add the capsule to the sorted set at the due time", async () => {
      const before = Date.now()
      await store.buryFor("test", 60_000)

      const members: string[] = await redis.zrange(KEY, 0, -1, "WITHSCORES")
      expect(members).toHaveLength(2)

      const [member, score] = members
      const capsule = codec.decode(member ?? "")
      expect(capsule.payload).toBe("test")
      expect(Number(score)).toBeGreaterThanOrEqual(before + 60_000)
      expect(Number(score)).toBeLessThanOrEqual(Date.now() + 60_000)
    })

    it("should bury until an exact timestamp", async () => {
      const capsule = await store.buryUntil("test", 1_700_000_000_000)

      expect(Number(await redis.zscore(KEY, capsule.encode()))).toBe(1_700_000_000_000)
    })

    it("should keep bursts of identical payloads as separate entries", async () => {
      await Promise.all([store.buryFor("same", 1000), store.buryFor("same", 1000), store.buryFor("same", 1000)])

      expect(await redis.zcard(KEY)).toBe(3)
    })
  })

  describe("dig", () => {
    it("should return null for an empty set", async () => {
      await expect(store.dig()).resolves.toBeNull()
    })

    it("should not return a capsule before it is due", async () => {
      const dueAt = Date.now() + 5
      const capsule = await store.buryUntil("soon", dueAt)

      await expect(store.dig()).resolves.toBeNull()

      expect(await redis.zcard(KEY)).toBe(1)
      expect(Number(await redis.zscore(KEY, capsule.encode()))).toBe(dueAt)
    })

    it("should pop a due capsule", async () => {
      const buried = await store.buryUntil("hello", Date.now() - 1000)

      const capsule = await store.dig()

      expect(capsule?.payload).toBe("hello")
      expect(capsule?.id).toBe(buried.id)
      expect(capsule?.dugOutAt).toBeGreaterThan(0)
      expect(await redis.zcard(KEY)).toBe(0)
    })

    it("should pop the earliest capsule first", async () => {
      await store.buryUntil("second", Date.now() - 1000)
      await store.buryUntil("first", Date.now() - 2000)

      expect((await store.dig())?.payload).toBe("first")
      expect((await store.dig())?.payload).toBe("second")
    })

    it("should requeue a prematurely popped capsule at its original score", async () => {
      const dueAt = Date.now() + 60_000
      const capsule = await store.buryUntil("later", dueAt)
      vi.spyOn(redis, "zrangebyscore").mockResolvedValueOnce(["someone else's capsule"])

      await expect(store.dig()).resolves.toBeNull()

      expect(await redis.zrange(KEY, 0, -1, "WITHSCORES")).toEqual([capsule.encode(), String(dueAt)])
    })

    it("should give up requeueing after the configured attempts", async () => {
      await store.buryUntil("later", Date.now() + 60_000)
      vi.spyOn(redis, "zrangebyscore").mockResolvedValueOnce(["someone else's capsule"])
      const zadd = vi.spyOn(redis, "zadd").mockRejectedValue(new Error("READONLY"))

      await expect(store.dig()).rejects.toBeInstanceOf(RequeueExhaustedError)
      expect(zadd).toHaveBeenCalledTimes(3)
      expect(await redis.zcard(KEY)).toBe(0)
    })

    it("should drop a malformed member with a DecodeError", async () => {
      await redis.zadd(KEY, Date.now() - 1000, "%%% not a capsule %%%")

      await expect(store.dig()).rejects.toBeInstanceOf(DecodeError)
      expect(await redis.zcard(KEY)).toBe(0)
    })

    it("should surface transport errors", async () => {
      vi.spyOn(redis, "zrangebyscore").mockRejectedValueOnce(new Error("Connection is closed."))

      await expect(store.dig()).rejects.toThrow(
        new StoreOperationError("check for due capsules", "RedisIoRedis", new Error("Connection is closed."))
      )
    })
  })

  describe("destroy", () => {
    it("should remove the capsule", async () => {
      const keep = await store.buryFor("keep", 60_000)
      const drop = await store.buryFor("drop", 60_000)

      await store.destroy(drop)

      expect(await redis.zrange(KEY, 0, -1)).toEqual([keep.encode()])
    })

    it("should succeed when the capsule is already gone", async () => {
      const capsule = await store.buryFor("hello", 60_000)

      await store.destroy(capsule)
      await expect(store.destroy(capsule)).resolves.toBeUndefined()
    })

    it("should remove every capsule on destroyAll", async () => {
      await store.buryFor("a", 1000)
      await store.buryFor("b", 2000)

      await store.destroyAll()

      expect(await redis.exists(KEY)).toBe(0)
    })
  })

  describe("with a digger", () => {
    it("should deliver a buried capsule once and empty the set", async () => {
      const digger = new Digger(store, 250, { logger })
      const received: string[] = []
      digger.setHandler((_digger, capsule) => {
        received.push(capsule.payload)
      })

      digger.start()
      try {
        await digger.buryFor("hello", 1000)
        await vi.waitFor(() => expect(received).toEqual(["hello"]), { timeout: 2000, interval: 50 })
      } finally {
        await digger.stop()
      }

      expect(await redis.zcard(KEY)).toBe(0)
    })

    it("should deliver every capsule exactly once across several diggers", async () => {
      const deliveries = new Map<string, number>()
      const diggers = Array.from({ length: 4 }, () => {
        const digger = new Digger(store, 2, { logger })
        digger.setHandler((_digger, capsule) => {
          deliveries.set(capsule.payload, (deliveries.get(capsule.payload) ?? 0) + 1)
        })
        return digger
      })

      diggers.forEach((digger) => digger.start())
      try {
        await Promise.all(Array.from({ length: 40 }, (_, index) => store.buryFor(`job-${index}`, 5)))
        await vi.waitFor(() => expect(deliveries.size).toBe(40), { timeout: 4000, interval: 20 })
      } finally {
        await Promise.all(diggers.map((digger) => digger.stop()))
      }

      expect([...deliveries.values()].every((count) => count === 1)).toBe(true)
      expect(await redis.zcard(KEY)).toBe(0)
    })
  })
})
