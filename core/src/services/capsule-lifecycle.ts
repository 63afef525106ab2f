import { CapsuleCodec } from "../capsule/capsule-codec"
import type { Capsule } from "../capsule/capsule"
import {
  CapsuleError,
  DestroyExhaustedError,
  RequeueExhaustedError,
  StoreOperationError,
} from "../errors/errors"
import type { CapsuleLifecycleConfig, ICapsuleStore, SortedSetCommands } from "../types/interfaces"
import { DEFAULT_STORE_RETRY, type RetryPolicy, type ScoredMember } from "../types/types"
import { withRetry } from "../utils/retry"

/**
 * Bury / dig / destroy on top of a sorted set, shared by every store adapter.
 *
 * Dig is a check-then-pop: `hasDue` keeps idle polls from popping anything, and
 * `popMin` is the only atomic step. Because the two are separate commands the
 * popped entry may turn out not to be due yet; it is then put back at its
 * original score.
 *
 * An aborted `dig` pops nothing more, and `destroy` stops retrying once its
 * signal fires.
 *
 * Two diggers requeueing the same premature entry at once is not guarded
 * against beyond the retry itself.
 */
export class CapsuleLifecycle<P> implements ICapsuleStore<P> {
  private readonly storeType: string
  private readonly commands: SortedSetCommands
  private readonly codec: CapsuleCodec<P>
  private readonly requeueRetry: RetryPolicy
  private readonly destroyRetry: RetryPolicy
  private readonly now: () => number

  constructor(config: CapsuleLifecycleConfig<P>) {
    this.storeType = config.type
    this.commands = config.commands
    this.codec = config.codec ?? new CapsuleCodec<P>()
    this.requeueRetry = config.requeueRetry ?? DEFAULT_STORE_RETRY
    this.destroyRetry = config.destroyRetry ?? DEFAULT_STORE_RETRY
    this.now = config.now ?? Date.now
  }

  type(): string {
    return this.storeType
  }

  async buryFor(payload: P, durationMs: number): Promise<Capsule<P>> {
    return this.buryUntil(payload, this.now() + durationMs)
  }

  async buryUntil(payload: P, dueAtMs: number): Promise<Capsule<P>> {
    const capsule = this.codec.create(payload, this.now())
    const member = capsule.encode()
    await this.run("bury", () => this.commands.insert(dueAtMs, member))
    return capsule
  }

  async dig(signal?: AbortSignal): Promise<Capsule<P> | null> {
    const now = this.now()

    const hasDue = await this.run("check for due capsules", () => this.commands.hasDue(now))
    if (!hasDue || signal?.aborted) return null

    const head = await this.run("pop", () => this.commands.popMin())
    if (!head) return null

    // Nobody is waiting for an aborted dig, so its entry goes back as well.
    if (head.score > now || signal?.aborted) {
      await this.requeue(head)
      return null
    }

    // A malformed member is not put back; its content is the problem.
    const capsule = this.codec.decode(head.member)
    capsule.dugOutAt = now
    return capsule
  }

  async destroy(capsule: Capsule<P>, retry?: RetryPolicy, signal?: AbortSignal): Promise<void> {
    const policy = retry ?? this.destroyRetry
    const member = capsule.encode()

    try {
      await withRetry(() => this.commands.remove(member), policy, signal)
    } catch (error) {
      if (signal?.aborted) throw error
      throw new DestroyExhaustedError(error, capsule, policy.maxAttempts)
    }
  }

  async destroyAll(): Promise<void> {
    await this.run("destroy all capsules", () => this.commands.clear())
  }

  private async requeue(entry: ScoredMember): Promise<void> {
    try {
      await withRetry(() => this.commands.insert(entry.score, entry.member), this.requeueRetry)
    } catch (error) {
      throw new RequeueExhaustedError(error, entry.score, entry.member, this.requeueRetry.maxAttempts)
    }
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command()
    } catch (error) {
      if (error instanceof CapsuleError) throw error
      throw new StoreOperationError(operation, this.storeType, error)
    }
  }
}
