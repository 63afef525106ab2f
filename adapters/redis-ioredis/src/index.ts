export { RedisIoRedisStore, type RedisIoRedisStoreConfig } from "./redis-ioredis-store"
export { DEFAULT_SORTED_SET_KEY, REDIS_IOREDIS_STORE_TYPE } from "./constants"
