import { randomUUID } from "node:crypto"
import { DecodeError } from "../errors/errors"
import type { PayloadSerializer } from "../types/types"
import { Capsule } from "./capsule"

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

type CapsuleEnvelope = {
  id: string
  payload: string
  buriedAt: number
}

export function jsonPayloadSerializer<P>(): PayloadSerializer<P> {
  return {
    serialize: (payload) => JSON.stringify(payload),
    deserialize: (text) => JSON.parse(text),
  }
}

function isCapsuleEnvelope(value: unknown): value is CapsuleEnvelope {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string" &&
    "payload" in value &&
    typeof value.payload === "string" &&
    "buriedAt" in value &&
    typeof value.buriedAt === "number" &&
    Number.isFinite(value.buriedAt)
  )
}

/**
 * Turns capsules into store-safe strings and back.
 *
 * The envelope is `{ id, payload, buriedAt }` as JSON, wrapped in standard
 * base64. `dugOutAt` is not part of the envelope; it only exists on the capsule
 * a dig hands back.
 */
export class CapsuleCodec<P = unknown> {
  private readonly serializer: PayloadSerializer<P>

  constructor(serializer?: PayloadSerializer<P>) {
    this.serializer = serializer ?? jsonPayloadSerializer<P>()
  }

  create(payload: P, buriedAt: number): Capsule<P> {
    return new Capsule(this, { id: randomUUID(), payload, buriedAt })
  }

  encode(capsule: Capsule<P>): string {
    return capsule.encode()
  }

  /** Computes the encoding without consulting the capsule's cache. */
  stringify(capsule: Capsule<P>): string {
    const envelope: CapsuleEnvelope = {
      id: capsule.id,
      payload: this.serializer.serialize(capsule.payload),
      buriedAt: capsule.buriedAt,
    }
    return Buffer.from(JSON.stringify(envelope), "utf8").toString("base64")
  }

  decode(encoded: string): Capsule<P> {
    if (encoded.length === 0 || !BASE64_PATTERN.test(encoded)) {
      throw new DecodeError("not a base64 string", encoded)
    }

    let envelope: unknown
    try {
      envelope = JSON.parse(Buffer.from(encoded, "base64").toString("utf8"))
    } catch (error) {
      throw new DecodeError("envelope is not valid JSON", encoded, error)
    }

    if (!isCapsuleEnvelope(envelope)) {
      throw new DecodeError("envelope is missing id, payload or buriedAt", encoded)
    }

    let payload: P
    try {
      payload = this.serializer.deserialize(envelope.payload)
    } catch (error) {
      throw new DecodeError("payload could not be deserialized", encoded, error)
    }

    return new Capsule(this, {
      id: envelope.id,
      payload,
      buriedAt: envelope.buriedAt,
      encoded,
    })
  }
}
