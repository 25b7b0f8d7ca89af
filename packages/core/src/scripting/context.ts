/**
 * Script Contexts
 *
 * Each mod runs in its own vm context, seeded with the globals its bridge
 * injects. Script source is read once through ScriptSource.load() and then
 * compiled and run with a timeout.
 *
 * Promise jobs a script queues drain before runInContext returns, so they
 * run under the same timeout and inside the same phase as the script.
 *
 * Errors thrown by host functions (ModError) pass through unchanged. Anything
 * else a script raises, including syntax errors, timeouts and read failures,
 * becomes SCRIPT_EXECUTION.
 */

import { Script, createContext, type Context } from 'node:vm'
import { ModError, describeError, isModError } from '../errors'

/** A named unit of script text, read on demand */
export interface ScriptSource {
  /** File name or label used in errors and stack traces */
  readonly name: string
  /** Open, read and release the source text */
  load(): string
}

export type ScriptContext = Context

/** Default wall-clock budget for one script run */
export const DEFAULT_SCRIPT_TIMEOUT_MS = 1000

export function createScriptContext(name: string, globals: Record<string, unknown>): ScriptContext {
  return createContext({ ...globals }, {
    name,
    codeGeneration: { strings: false, wasm: false },
    microtaskMode: 'afterEvaluate',
  })
}

/** Script source held in memory */
export function inlineScript(name: string, code: string): ScriptSource {
  return { name, load: () => code }
}

/**
 * Load and run one script in `context`.
 *
 * @throws ModError raised by a host function during the run
 * @throws SCRIPT_EXECUTION for every other failure
 */
export function runScript(
  context: ScriptContext,
  source: ScriptSource,
  timeoutMs = DEFAULT_SCRIPT_TIMEOUT_MS,
): void {
  try {
    const code = source.load()
    const script = new Script(code, { filename: source.name })
    script.runInContext(context, { timeout: timeoutMs, displayErrors: false })
  } catch (error) {
    if (isModError(error)) throw error
    throw new ModError(
      'SCRIPT_EXECUTION',
      `${source.name}: ${describeError(error)}`,
      { script: source.name },
      { cause: error },
    )
  }
}

const CALL_HANDLER = new Script('handler()', { filename: 'handler' })

/**
 * Call a script function under the same wall-clock budget as a script run.
 * Whatever the function throws, including the timeout, is rethrown as is.
 */
export function callWithTimeout(handler: () => unknown, timeoutMs = DEFAULT_SCRIPT_TIMEOUT_MS): unknown {
  const context = createContext({ handler }, { codeGeneration: { strings: false, wasm: false } })
  return CALL_HANDLER.runInContext(context, { timeout: timeoutMs, displayErrors: false })
}
