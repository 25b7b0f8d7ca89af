/**
 * Lifecycle Hook Registry
 *
 * Per-mod `on_start` / `on_stop` callbacks installed by control scripts.
 * Each mod holds at most one handler per hook; installing again replaces it.
 *
 * Hooks fire in the order the caller passes (discovery order for start,
 * reverse for stop). A handler that throws is recorded as a failure and the
 * remaining mods still run.
 *
 * Hooks are synchronous. A handler that returns a promise is recorded as a
 * failure when it returns; a later rejection goes to `onRejection`.
 */

import { ModError, describeError } from '../errors'

// ============================================================================
// Types
// ============================================================================

export type LifecycleHookId = 'on_start' | 'on_stop'

export type LifecycleHandler = () => unknown

export interface LifecycleFailure {
  modId: string
  hook: LifecycleHookId
  message: string
  error: unknown
}

/** Calls one handler; lets the owner put a time limit on hook code */
export type HookInvoker = (handler: LifecycleHandler) => unknown

export interface LifecycleHooksOptions {
  invoke?: HookInvoker
  /** Receives rejections of promises that handlers returned */
  onRejection?: (failure: LifecycleFailure) => void
}

export function isLifecycleHandler(value: unknown): value is LifecycleHandler {
  return typeof value === 'function'
}

/** True for `async function` and `async () =>`, from any realm */
export function isAsyncFunction(value: unknown): boolean {
  const tag = Object.prototype.toString.call(value)
  return tag === '[object AsyncFunction]' || tag === '[object AsyncGeneratorFunction]'
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    typeof Reflect.get(value, 'then') === 'function'
  )
}

function logRejection(failure: LifecycleFailure): void {
  console.error(`[LifecycleHooks] ${failure.hook} of mod '${failure.modId}' rejected: ${failure.message}`)
}

// ============================================================================
// LifecycleHooks
// ============================================================================

export class LifecycleHooks {
  private _onStart = new Map<string, LifecycleHandler>()
  private _onStop = new Map<string, LifecycleHandler>()
  private readonly _invoke: HookInvoker
  private readonly _onRejection: (failure: LifecycleFailure) => void

  constructor(options: LifecycleHooksOptions = {}) {
    this._invoke = options.invoke ?? ((handler) => handler())
    this._onRejection = options.onRejection ?? logRejection
  }

  /** Install (or replace) a mod's handler for a hook */
  register(hook: LifecycleHookId, modId: string, handler: LifecycleHandler): void {
    this._getMap(hook).set(modId, handler)
  }

  /** Remove a mod's handler for one hook */
  remove(hook: LifecycleHookId, modId: string): void {
    this._getMap(hook).delete(modId)
  }

  /** Remove every handler a mod installed */
  unregister(modId: string): void {
    this._onStart.delete(modId)
    this._onStop.delete(modId)
  }

  clear(): void {
    this._onStart.clear()
    this._onStop.clear()
  }

  get(hook: LifecycleHookId, modId: string): LifecycleHandler | undefined {
    return this._getMap(hook).get(modId)
  }

  hasHandlers(hook: LifecycleHookId): boolean {
    return this._getMap(hook).size > 0
  }

  /**
   * Run a hook for each mod in `order` that installed one.
   * Returns the failures; never throws.
   */
  fire(hook: LifecycleHookId, order: readonly string[]): LifecycleFailure[] {
    const handlers = this._getMap(hook)
    const failures: LifecycleFailure[] = []
    for (const modId of order) {
      const handler = handlers.get(modId)
      if (!handler) continue
      try {
        const result = this._invoke(handler)
        if (isPromiseLike(result)) {
          result.then(undefined, (rejection: unknown) => {
            this._onRejection({ modId, hook, message: describeError(rejection), error: rejection })
          })
          const error = new ModError('MALFORMED_DEFINITION', `${hook} returned a promise; hooks must be synchronous`, {
            modId,
            hook,
          })
          failures.push({ modId, hook, message: error.message, error })
        }
      } catch (error) {
        failures.push({ modId, hook, message: describeError(error), error })
      }
    }
    return failures
  }

  private _getMap(hook: LifecycleHookId): Map<string, LifecycleHandler> {
    switch (hook) {
      case 'on_start': return this._onStart
      case 'on_stop': return this._onStop
    }
  }
}
