/**
 * Mod Errors
 *
 * Every condition the mod host raises is a ModError carrying a code and a
 * context record. Lookup misses are not errors: registry and registrar
 * lookups return undefined instead.
 */

export type ModErrorCode =
  | 'DUPLICATE_DEFINITION'
  | 'ENTITY_ALREADY_REGISTERED'
  | 'PHASE_VIOLATION'
  | 'MALFORMED_DEFINITION'
  | 'SCRIPT_EXECUTION'
  | 'DATA_PHASE_FAILED'
  | 'INVALID_MOD_ID'
  | 'DUPLICATE_MOD'
  | 'MISSING_DEPENDENCY'
  | 'INVALID_MANIFEST'
  | 'INVALID_LIFECYCLE_TRANSITION'

export class ModError extends Error {
  readonly code: ModErrorCode
  readonly context: Readonly<Record<string, unknown>>

  constructor(
    code: ModErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ModError'
    this.code = code
    this.context = context
  }
}

export function isModError(error: unknown, code?: ModErrorCode): error is ModError {
  return error instanceof ModError && (code === undefined || error.code === code)
}

/**
 * Extract a message from anything a script may throw.
 *
 * Errors raised inside a vm context come from another realm, so
 * `instanceof Error` is false for them even though they carry a message.
 */
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error
    if (typeof message === 'string') return message
  }
  return String(error)
}
