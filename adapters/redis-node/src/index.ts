export { DEFAULT_SORTED_SET_KEY, REDIS_NODE_STORE_TYPE } from "./constants"
export { RedisNodeStore, type RedisNodeClient, type RedisNodeStoreConfig } from "./redis-node-store"
