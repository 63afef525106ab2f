import type { Capsule } from "../capsule/capsule"

export interface CapsuleErrorContext {
  capsule?: Capsule<unknown>
  cause?: unknown
  [key: string]: unknown
}

export abstract class CapsuleError<
  TContext extends CapsuleErrorContext = CapsuleErrorContext,
> extends Error {
  public context?: TContext | undefined

  constructor(message: string, name: string, context?: TContext) {
    super(message, { cause: context?.cause })
    this.name = name
    this.context = context

    if ("captureStackTrace" in Error) {
      Error.captureStackTrace(this, CapsuleError)
    }

    // Restore prototype chain for proper instanceof checks
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// === Configuration Errors ===

export class ConfigurationError<
  TContext extends CapsuleErrorContext = CapsuleErrorContext,
> extends CapsuleError<TContext> {
  constructor(message: string, context?: TContext) {
    super(message, "ConfigurationError", context)
  }
}

export class HandlerAlreadySetError extends ConfigurationError {
  constructor() {
    super("Digger already has a handler. A handler can only be set once per digger.")
    this.name = "HandlerAlreadySetError"
  }
}

// === Validation Errors ===

export class ValidationError<
  TContext extends CapsuleErrorContext = CapsuleErrorContext,
> extends CapsuleError<TContext> {
  constructor(message: string, context?: TContext) {
    super(message, "ValidationError", context)
  }
}

export class DecodeError extends ValidationError {
  constructor(reason: string, encoded: string, cause?: unknown) {
    super(`Failed to decode capsule: ${reason}`, { encoded, cause })
    this.name = "DecodeError"
  }
}

// === Operational Errors ===

export class OperationalError<
  TContext extends CapsuleErrorContext = CapsuleErrorContext,
> extends CapsuleError<TContext> {
  constructor(message: string, context?: TContext) {
    super(message, "OperationalError", context)
  }
}

export class StoreOperationError extends OperationalError {
  constructor(operation: string, storeType: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause)
    super(`${storeType} store failed to ${operation}: ${message}`, {
      operation,
      storeType,
      cause,
    })
    this.name = "StoreOperationError"
  }
}

export class TimeoutError extends OperationalError {
  constructor(operation: string, timeoutMs: number, context?: CapsuleErrorContext) {
    super(`Timed out waiting for ${operation} after ${timeoutMs}ms`, {
      operation,
      timeoutMs,
      ...context,
    })
    this.name = "TimeoutError"
  }
}

export class RequeueExhaustedError extends OperationalError {
  constructor(
    cause: unknown,
    public readonly score: number,
    public readonly member: string,
    public readonly attempts: number
  ) {
    super(`Failed to requeue prematurely popped capsule after ${attempts} attempts. Capsule is lost.`, {
      cause,
      score,
      member,
      attempts,
    })
    this.name = "RequeueExhaustedError"
  }
}

export class DestroyExhaustedError extends OperationalError {
  constructor(
    cause: unknown,
    public readonly capsule: Capsule<unknown>,
    public readonly attempts: number
  ) {
    super(`Failed to destroy capsule after ${attempts} attempts. It will be dug up again.`, {
      cause,
      capsule,
      attempts,
    })
    this.name = "DestroyExhaustedError"
  }
}

export class HandlerError<
  TContext extends CapsuleErrorContext = CapsuleErrorContext,
> extends CapsuleError<TContext> {
  constructor(
    cause: unknown,
    public readonly capsule: Capsule<unknown>,
    context?: TContext
  ) {
    const message = cause instanceof Error ? cause.message : String(cause)
    const fullContext = { cause, capsule, ...context } as unknown as TContext
    super(`Capsule handler failed: ${message}`, "HandlerError", fullContext)
  }
}
