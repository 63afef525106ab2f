import type { CapsuleCodec } from "./capsule-codec"

export interface CapsuleInit<P> {
  id: string
  payload: P
  buriedAt: number
  encoded?: string | undefined
}

/**
 * A buried payload together with its burial and dig-out timestamps.
 *
 * The encoded form is computed once and then reused: it is the member that
 * identifies this capsule inside the sorted set, so it must never change after
 * the capsule has been buried or decoded.
 */
export class Capsule<P> {
  readonly id: string
  readonly payload: P
  readonly buriedAt: number
  dugOutAt = 0

  private encoded: string | undefined

  constructor(
    private readonly codec: CapsuleCodec<P>,
    init: CapsuleInit<P>
  ) {
    this.id = init.id
    this.payload = init.payload
    this.buriedAt = init.buriedAt
    this.encoded = init.encoded
  }

  encode(): string {
    if (this.encoded === undefined) {
      this.encoded = this.codec.stringify(this)
    }
    return this.encoded
  }
}
