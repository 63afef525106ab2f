export { Capsule, type CapsuleInit } from "./capsule/capsule"
export { CapsuleCodec, jsonPayloadSerializer } from "./capsule/capsule-codec"
export * from "./errors/errors"
export { formatErrorMessage } from "./errors/error-utils"
export { CapsuleLifecycle } from "./services/capsule-lifecycle"
export { Digger, resolveDiggerConfig } from "./services/digger"
export { InMemoryStore } from "./stores/in-memory/in-memory-store"
export type * from "./types/interfaces"
export * from "./types/types"
export { withRetry } from "./utils/retry"
export { sleep, withTimeout } from "./utils/time-utils"
