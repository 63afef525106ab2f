import type { Capsule } from "../../capsule/capsule"
import { CapsuleLifecycle } from "../../services/capsule-lifecycle"
import type { ICapsuleStore, StoreConfig } from "../../types/interfaces"
import type { RetryPolicy, ScoredMember } from "../../types/types"

function compareEntries(a: ScoredMember, b: ScoredMember): number {
  if (a.score !== b.score) return a.score - b.score
  if (a.member === b.member) return 0
  return a.member < b.member ? -1 : 1
}

/**
 * Keeps capsules in a process-local sorted set. Ordering matches Redis: by
 * score, then by member. Re-inserting a member only moves its score. Like the
 * Redis stores' `0..now` range query, the due check ignores negative scores.
 */
export class InMemoryStore<P = unknown> implements ICapsuleStore<P> {
  private readonly scores = new Map<string, number>()
  private readonly lifecycle: CapsuleLifecycle<P>

  constructor(config: StoreConfig<P> = {}) {
    this.lifecycle = new CapsuleLifecycle({
      ...config,
      type: "InMemory",
      commands: {
        insert: async (score, member) => {
          this.scores.set(member, score)
        },
        hasDue: async (maxScore) => this.entries().some((entry) => entry.score >= 0 && entry.score <= maxScore),
        popMin: async () => this.popMin(),
        remove: async (member) => {
          this.scores.delete(member)
        },
        clear: async () => {
          this.scores.clear()
        },
      },
    })
  }

  type(): string {
    return this.lifecycle.type()
  }

  buryFor(payload: P, durationMs: number): Promise<Capsule<P>> {
    return this.lifecycle.buryFor(payload, durationMs)
  }

  buryUntil(payload: P, dueAtMs: number): Promise<Capsule<P>> {
    return this.lifecycle.buryUntil(payload, dueAtMs)
  }

  dig(signal?: AbortSignal): Promise<Capsule<P> | null> {
    return this.lifecycle.dig(signal)
  }

  destroy(capsule: Capsule<P>, retry?: RetryPolicy, signal?: AbortSignal): Promise<void> {
    return this.lifecycle.destroy(capsule, retry, signal)
  }

  destroyAll(): Promise<void> {
    return this.lifecycle.destroyAll()
  }

  entries(): ScoredMember[] {
    return [...this.scores].map(([member, score]) => ({ score, member })).sort(compareEntries)
  }

  get size(): number {
    return this.scores.size
  }

  private popMin(): ScoredMember | null {
    const [head] = this.entries()
    if (!head) return null
    this.scores.delete(head.member)
    return head
  }
}
