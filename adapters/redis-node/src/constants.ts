export const REDIS_NODE_STORE_TYPE = "RedisNode"
export const DEFAULT_SORTED_SET_KEY = "capsules"
