/**
 * Reasons an edit can be refused.
 */
export type EditErrorCode =
  | "cannot-delete-root"
  | "not-found"
  | "not-container"
  | "out-of-range"
  | "missing-key"
  | "unexpected-key"
  | "duplicate-key"
  | "invalid-node"
  | "anchor-in-use"

export class EditCoreError extends Error {
  readonly code: EditErrorCode
  readonly context?: Record<string, unknown>

  constructor(code: EditErrorCode, msg: string, context?: Record<string, unknown>) {
    super(msg)
    this.name = "EditCoreError"
    this.code = code
    this.context = context

    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, EditCoreError.prototype)
  }
}

export function failure(
  code: EditErrorCode,
  message: string,
  context?: Record<string, unknown>
): never {
  throw new EditCoreError(code, message, context)
}

/**
 * Thrown for misuse of the API itself (bad options, disposed sessions, unresolvable aliases).
 * Unlike `EditCoreError` it is never turned into an `EditResult`.
 */
export class UsageError extends Error {
  constructor(msg: string) {
    super(msg)
    this.name = "UsageError"
    Object.setPrototypeOf(this, UsageError.prototype)
  }
}

export function usageFailure(message: string): never {
  throw new UsageError(message)
}

/**
 * Outcome of a structural edit. Edits either fully apply or leave the tree untouched.
 */
export type EditResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: EditCoreError }

export const OK: EditResult = Object.freeze({ ok: true })

/**
 * Runs `fn` and turns an `EditCoreError` thrown by it into a failed result.
 * Any other error propagates.
 */
export function attempt(fn: () => void): EditResult {
  try {
    fn()
    return OK
  } catch (error) {
    if (error instanceof EditCoreError) {
      return { ok: false, error }
    }
    throw error
  }
}
