import type { Capsule } from "../capsule/capsule"
import type { CapsuleCodec } from "../capsule/capsule-codec"
import type { Digger } from "../services/digger"
import type { ErrorHandler, Logger, RetryPolicy, ScoredMember } from "./types"

export interface ICapsuleStore<P> {
  type: () => string
  buryFor: (payload: P, durationMs: number) => Promise<Capsule<P>>
  buryUntil: (payload: P, dueAtMs: number) => Promise<Capsule<P>>
  /** Once `signal` is aborted nothing more is popped; an entry already popped is put back. */
  dig: (signal?: AbortSignal) => Promise<Capsule<P> | null>
  /** An aborted `signal` stops further remove attempts. */
  destroy: (capsule: Capsule<P>, retry?: RetryPolicy, signal?: AbortSignal) => Promise<void>
  destroyAll: () => Promise<void>
}

/**
 * The five primitives a backing sorted set has to offer. Only `popMin` needs to
 * be atomic; it is the single point where concurrent diggers are serialized.
 */
export interface SortedSetCommands {
  insert: (score: number, member: string) => Promise<void>
  hasDue: (maxScore: number) => Promise<boolean>
  popMin: () => Promise<ScoredMember | null>
  remove: (member: string) => Promise<void>
  clear: () => Promise<void>
}

export interface StoreConfig<P> {
  codec?: CapsuleCodec<P>
  requeueRetry?: RetryPolicy
  destroyRetry?: RetryPolicy
  now?: () => number
}

export interface CapsuleLifecycleConfig<P> extends StoreConfig<P> {
  type: string
  commands: SortedSetCommands
}

export type CapsuleHandler<P> = (digger: Digger<P>, capsule: Capsule<P>) => void | Promise<void>

export interface DiggerConfig {
  retryLimit?: number
  retryIntervalMs?: number
  logger?: Logger
  digTimeoutMs?: number
  destroyTimeoutMs?: number
  stopTimeoutMs?: number
  onError?: ErrorHandler | undefined
}

export type ResolvedDiggerConfig = Required<Omit<DiggerConfig, "onError">> & Pick<DiggerConfig, "onError">
