export const REDIS_IOREDIS_STORE_TYPE = "RedisIoRedis"
export const DEFAULT_SORTED_SET_KEY = "capsules"
