import type { Capsule } from "../capsule/capsule"

export type ScoredMember = {
  score: number
  member: string
}

export type RetryPolicy = {
  maxAttempts: number
  delayMs: number
}

export interface PayloadSerializer<P> {
  serialize(payload: P): string
  deserialize(text: string): P
}

export type ErrorHandler = (error: unknown, capsule?: Capsule<unknown>) => void

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export const DEFAULT_STORE_RETRY: RetryPolicy = {
  maxAttempts: 100,
  delayMs: 10,
}

export const DEFAULT_DIGGER_RETRY_LIMIT = 100
export const DEFAULT_DIGGER_RETRY_INTERVAL_MS = 500
export const DEFAULT_OPERATION_TIMEOUT_MS = 60_000
