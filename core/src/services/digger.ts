import type { Capsule } from "../capsule/capsule"
import { formatErrorMessage } from "../errors/error-utils"
import { ConfigurationError, HandlerAlreadySetError, HandlerError, TimeoutError } from "../errors/errors"
import type {
  CapsuleHandler,
  DiggerConfig,
  ICapsuleStore,
  ResolvedDiggerConfig,
} from "../types/interfaces"
import {
  DEFAULT_DIGGER_RETRY_INTERVAL_MS,
  DEFAULT_DIGGER_RETRY_LIMIT,
  DEFAULT_OPERATION_TIMEOUT_MS,
} from "../types/types"
import { withTimeout } from "../utils/time-utils"

export function resolveDiggerConfig(config: DiggerConfig = {}): ResolvedDiggerConfig {
  return {
    retryLimit:
      config.retryLimit !== undefined && config.retryLimit > 0
        ? config.retryLimit
        : DEFAULT_DIGGER_RETRY_LIMIT,
    retryIntervalMs:
      config.retryIntervalMs !== undefined && config.retryIntervalMs > 0
        ? config.retryIntervalMs
        : DEFAULT_DIGGER_RETRY_INTERVAL_MS,
    logger: config.logger ?? console,
    digTimeoutMs: config.digTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS,
    destroyTimeoutMs: config.destroyTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS,
    stopTimeoutMs: config.stopTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS,
    onError: config.onError,
  }
}

/**
 * Polls a store every `digIntervalMs`, hands each due capsule to the handler and
 * then destroys it.
 *
 * A tick runs to completion (dig, handler, destroy) before the next one is
 * scheduled, so a slow handler or store lowers the effective poll rate. Every
 * failure is reported through the logger and `onError`; none of them stops the
 * loop. Delivery is at-least-once: a capsule whose destroy fails can be dug up
 * again.
 *
 * A dig or destroy that times out is aborted through its signal. If a timed-out
 * dig still comes back with a capsule, that capsule is handled anyway.
 *
 * `stop()` waits for in-flight work for at most `stopTimeoutMs`. Past that it
 * logs a warning and resolves, and a handler that is still running finishes on
 * its own.
 */
export class Digger<P = unknown> {
  private readonly config: ResolvedDiggerConfig
  private handler: CapsuleHandler<P> | null = null
  private isDigging = false
  private digTimer: NodeJS.Timeout | null = null
  private readonly inFlight = new Set<Promise<unknown>>()

  constructor(
    private readonly store: ICapsuleStore<P>,
    private readonly digIntervalMs: number,
    config: DiggerConfig = {}
  ) {
    if (!Number.isFinite(digIntervalMs) || digIntervalMs <= 0) {
      throw new ConfigurationError(`Dig interval must be a positive number of milliseconds, got ${digIntervalMs}`, {
        digIntervalMs,
      })
    }
    this.config = resolveDiggerConfig(config)
  }

  get options(): Readonly<ResolvedDiggerConfig> {
    return this.config
  }

  get isRunning(): boolean {
    return this.isDigging
  }

  setHandler(handler: CapsuleHandler<P>): void {
    if (this.handler) {
      throw new HandlerAlreadySetError()
    }
    this.handler = handler
  }

  async buryFor(payload: P, durationMs: number): Promise<Capsule<P>> {
    return this.store.buryFor(payload, durationMs)
  }

  async buryUntil(payload: P, dueAtMs: number): Promise<Capsule<P>> {
    return this.store.buryUntil(payload, dueAtMs)
  }

  start(): void {
    if (this.isDigging) return
    this.isDigging = true
    this.scheduleNextTick()
  }

  async stop(): Promise<void> {
    this.isDigging = false
    if (this.digTimer) {
      clearTimeout(this.digTimer)
      this.digTimer = null
    }
    if (this.inFlight.size === 0) return

    const { stopTimeoutMs } = this.config
    try {
      await withTimeout(
        this.drain(),
        stopTimeoutMs,
        () => new TimeoutError("in-flight work to finish", stopTimeoutMs)
      )
    } catch (error) {
      this.config.logger.warn(`[Digger] stopped without waiting for in-flight work: ${formatErrorMessage(error)}`)
    }
  }

  /**
   * Runs one tick's worth of work right away. Resolves to `true` when a capsule
   * was dug up and dispatched.
   */
  async digOnce(): Promise<boolean> {
    const capsule = await this.dig()
    if (!capsule) return false

    this.config.logger.debug(`[Digger] dug a capsule from store ${this.store.type()}`)

    await this.dispatch(capsule)
    return true
  }

  private scheduleNextTick(): void {
    if (!this.isDigging || this.digTimer) return

    this.digTimer = setTimeout(() => {
      this.digTimer = null
      void this.tick()
    }, this.digIntervalMs)
  }

  private async tick(): Promise<void> {
    if (!this.isDigging) return

    const execution = this.digOnce()
    this.track(execution)

    try {
      await execution
    } finally {
      this.scheduleNextTick()
    }
  }

  private track(work: Promise<unknown>): void {
    this.inFlight.add(work)
    const forget = () => this.inFlight.delete(work)
    void work.then(forget, forget)
  }

  private async drain(): Promise<void> {
    // late digs can add work while earlier work settles
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight])
    }
  }

  private async dig(): Promise<Capsule<P> | null> {
    const { digTimeoutMs } = this.config
    const controller = new AbortController()
    const digging = this.store.dig(controller.signal)

    try {
      return await withTimeout(digging, digTimeoutMs, () => {
        const timeout = new TimeoutError("dig", digTimeoutMs)
        controller.abort(timeout)
        return timeout
      })
    } catch (error) {
      if (controller.signal.aborted) {
        this.track(this.recoverLateDig(digging))
      }
      this.config.logger.error(
        `[Digger] failed to dig capsule from store ${this.store.type()}: ${formatErrorMessage(error)}`
      )
      this.config.onError?.(error)
      return null
    }
  }

  private async recoverLateDig(digging: Promise<Capsule<P> | null>): Promise<void> {
    let capsule: Capsule<P> | null
    try {
      capsule = await digging
    } catch (error) {
      this.config.logger.debug(`[Digger] timed-out dig failed afterwards: ${formatErrorMessage(error)}`)
      return
    }
    if (!capsule) return

    this.config.logger.warn(`[Digger] a timed-out dig returned a capsule from store ${this.store.type()} late`)
    await this.dispatch(capsule)
  }

  private async dispatch(capsule: Capsule<P>): Promise<void> {
    await this.handle(capsule)
    await this.destroy(capsule)
  }

  private async handle(capsule: Capsule<P>): Promise<void> {
    if (!this.handler) return

    try {
      await this.handler(this, capsule)
    } catch (error) {
      const handlerError = new HandlerError(error, capsule)
      this.config.logger.error(`[Digger] ${handlerError.message}`)
      this.config.onError?.(handlerError, capsule)
    }
  }

  private async destroy(capsule: Capsule<P>): Promise<void> {
    const { destroyTimeoutMs } = this.config
    const controller = new AbortController()
    const retry = { maxAttempts: this.config.retryLimit, delayMs: this.config.retryIntervalMs }

    try {
      await withTimeout(this.store.destroy(capsule, retry, controller.signal), destroyTimeoutMs, () => {
        const timeout = new TimeoutError("destroy", destroyTimeoutMs)
        controller.abort(timeout)
        return timeout
      })
      this.config.logger.debug(`[Digger] destroyed a capsule from store ${this.store.type()}`)
    } catch (error) {
      this.config.logger.warn(`[Digger] failed to destroy capsule: ${formatErrorMessage(error)}`)
      this.config.onError?.(error, capsule)
    }
  }
}
