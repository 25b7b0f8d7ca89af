/**
 * Mod Lifecycle
 *
 * Drives a load set of mods through the two load phases and the start/stop
 * hooks, one mod at a time, in discovery order.
 *
 * - Data phase: each mod's data scripts run in a fresh context. Mods may
 *   extend the registry and register entity prototypes. Any failure aborts
 *   the whole load and undoes every insert made during the pass (unless
 *   dataErrorPolicy is 'skip-script'). A host error the script caught still
 *   counts as that script's failure.
 * - Control phase: registry and prototypes are sealed. Each mod's control
 *   scripts run in a fresh context and may read the registry and install
 *   on_start / on_stop. A failure skips the rest of that mod's control
 *   scripts; other mods continue.
 * - start(): on_start for every mod, in discovery order.
 * - stop(): on_stop for every mod, in reverse discovery order.
 *
 * Hooks run under the script timeout. Hook failures are reported and never
 * stop sibling mods.
 */

import { ModError, describeError, isModError } from '../errors'
import { DefinitionRegistry } from '../data/registry'
import { PrototypeRegistrar } from '../prototypes/registrar'
import { checkLoadOrder, type ModDescriptor } from '../mods/manifest'
import { createModGlobals, type ScriptExtension } from '../scripting/api'
import {
  DEFAULT_SCRIPT_TIMEOUT_MS,
  callWithTimeout,
  createScriptContext,
  runScript,
  type ScriptContext,
} from '../scripting/context'
import type { ModLog } from '../log'
import { LifecycleHooks, type LifecycleFailure } from './hooks'
import type { LifecyclePhase } from './phase'

// ============================================================================
// Types
// ============================================================================

/**
 * What a failing data script does to the load:
 * - 'abort-load': fail the whole data phase (default)
 * - 'skip-script': undo that script's inserts, report it, keep loading
 */
export type DataErrorPolicy = 'abort-load' | 'skip-script'

export interface ModLifecycleOptions {
  /** Global name of the engine table in scripts (default 'engine') */
  libName?: string
  /** Global name of the data registry table in scripts (default 'data') */
  dataName?: string
  /** Version string exposed to scripts */
  version?: string
  scriptTimeoutMs?: number
  dataErrorPolicy?: DataErrorPolicy
  /** Extra per-mod globals supplied by the game */
  extensions?: Readonly<Record<string, ScriptExtension>>
  log?: ModLog
}

export interface ScriptFailure {
  modId: string
  script: string
  phase: 'data' | 'control'
  message: string
  error: unknown
}

export interface LoadReport {
  /** Mod ids in load order */
  mods: string[]
  definitions: number
  prototypes: number
  /** Scripts that failed without aborting the load */
  failures: ScriptFailure[]
}

export const DEFAULT_LIB_NAME = 'engine'
export const DEFAULT_DATA_NAME = 'data'

// ============================================================================
// ModLifecycle
// ============================================================================

export class ModLifecycle {
  private _phase: LifecyclePhase = 'unloaded'
  private _registry = new DefinitionRegistry()
  private _prototypes = new PrototypeRegistrar()
  private readonly hooks: LifecycleHooks
  private order: string[] = []
  /** First host error raised by the data script now running */
  private hostError: ModError | undefined

  private readonly libName: string
  private readonly dataName: string
  private readonly version: string | undefined
  private readonly timeoutMs: number
  private readonly dataErrorPolicy: DataErrorPolicy
  private readonly extensions: Readonly<Record<string, ScriptExtension>>
  private readonly log: ModLog

  constructor(options: ModLifecycleOptions = {}) {
    this.libName = options.libName ?? DEFAULT_LIB_NAME
    this.dataName = options.dataName ?? DEFAULT_DATA_NAME
    this.version = options.version
    this.timeoutMs = options.scriptTimeoutMs ?? DEFAULT_SCRIPT_TIMEOUT_MS
    this.dataErrorPolicy = options.dataErrorPolicy ?? 'abort-load'
    this.extensions = options.extensions ?? {}
    this.log = options.log ?? console
    this.hooks = new LifecycleHooks({
      invoke: (handler) => callWithTimeout(handler, this.timeoutMs),
      onRejection: (failure) => {
        this.log.error(`[ModLifecycle] ${failure.hook} of mod '${failure.modId}' rejected: ${failure.message}`)
      },
    })

    // Nothing may be written before a load starts
    this._registry.seal()
    this._prototypes.seal()
  }

  get phase(): LifecyclePhase {
    return this._phase
  }

  /** Registry of the current load set (empty and sealed before load) */
  get registry(): DefinitionRegistry {
    return this._registry
  }

  /** Prototypes of the current load set; the world resolves keys here */
  get prototypes(): PrototypeRegistrar {
    return this._prototypes
  }

  /** Mod ids in discovery order */
  get mods(): readonly string[] {
    return this.order
  }

  /**
   * Run the data phase and then the control phase for `mods`.
   *
   * @throws INVALID_LIFECYCLE_TRANSITION unless unloaded
   * @throws INVALID_MOD_ID, DUPLICATE_MOD or MISSING_DEPENDENCY before any script runs
   * @throws DATA_PHASE_FAILED when a data script fails under 'abort-load';
   *   the lifecycle is back in 'unloaded' with nothing registered
   */
  load(mods: readonly ModDescriptor[]): LoadReport {
    this.requirePhase('unloaded', 'load')
    checkLoadOrder(mods)

    const registry = new DefinitionRegistry()
    const prototypes = new PrototypeRegistrar()
    this._registry = registry
    this._prototypes = prototypes
    this.hooks.clear()
    this.order = mods.map((mod) => mod.id)
    const failures: ScriptFailure[] = []

    // -- Data phase --
    this._phase = 'data'
    this.log.log(`[ModLifecycle] Data phase: ${mods.length} mods`)
    for (const mod of mods) {
      const context = this.createContext(mod.id, 'data')
      for (const script of mod.dataScripts) {
        const definitionMark = registry.checkpoint()
        const prototypeMark = prototypes.checkpoint()
        this.hostError = undefined
        try {
          runScript(context, script, this.timeoutMs)
          if (this.hostError) throw this.hostError
        } catch (error) {
          if (this.dataErrorPolicy === 'skip-script') {
            registry.rollback(definitionMark)
            prototypes.rollback(prototypeMark)
            failures.push(this.reportScriptFailure(mod.id, script.name, 'data', error))
            continue
          }
          registry.rollback(0)
          prototypes.rollback(0)
          registry.seal()
          prototypes.seal()
          this.order = []
          this._phase = 'unloaded'
          throw this.dataPhaseFailed(mod.id, script.name, error)
        }
      }
    }

    // -- Control phase --
    registry.seal()
    prototypes.seal()
    this._phase = 'control'
    this.log.log(`[ModLifecycle] Control phase: ${registry.size} definitions, ${prototypes.size} prototypes`)
    for (const mod of mods) {
      const context = this.createContext(mod.id, 'control')
      for (const script of mod.controlScripts) {
        try {
          runScript(context, script, this.timeoutMs)
        } catch (error) {
          failures.push(this.reportScriptFailure(mod.id, script.name, 'control', error))
          break
        }
      }
    }

    return {
      mods: [...this.order],
      definitions: registry.size,
      prototypes: prototypes.size,
      failures,
    }
  }

  /**
   * Enter 'running' and fire on_start in discovery order.
   *
   * @returns Hooks that threw
   */
  start(): LifecycleFailure[] {
    this.requirePhase('control', 'start')
    this._phase = 'running'
    this.log.log(`[ModLifecycle] Starting ${this.order.length} mods`)
    return this.reportHookFailures(this.hooks.fire('on_start', this.order))
  }

  /**
   * Fire on_stop in reverse discovery order and end in 'stopped'.
   *
   * @returns Hooks that threw
   */
  stop(): LifecycleFailure[] {
    this.requirePhase('running', 'stop')
    this._phase = 'stopping'
    this.log.log(`[ModLifecycle] Stopping ${this.order.length} mods`)
    const failures = this.hooks.fire('on_stop', [...this.order].reverse())
    this._phase = 'stopped'
    return this.reportHookFailures(failures)
  }

  // --- Internals ---

  private createContext(modId: string, phase: 'data' | 'control'): ScriptContext {
    const globals = createModGlobals({
      modId,
      registry: this._registry,
      prototypes: this._prototypes,
      hooks: this.hooks,
      phase: () => this._phase,
      log: this.log,
      libName: this.libName,
      dataName: this.dataName,
      version: this.version,
      extensions: this.extensions,
      onHostError: (error) => {
        if (this._phase === 'data') this.hostError ??= error
      },
    })
    return createScriptContext(`mod:${modId}:${phase}`, globals)
  }

  private requirePhase(expected: LifecyclePhase, action: string): void {
    if (this._phase !== expected) {
      throw new ModError(
        'INVALID_LIFECYCLE_TRANSITION',
        `Cannot ${action} mods in the ${this._phase} phase (expected ${expected})`,
        { phase: this._phase, expected },
      )
    }
  }

  private dataPhaseFailed(modId: string, script: string, error: unknown): ModError {
    const detail = isModError(error) ? { code: error.code, ...error.context } : {}
    const message = `Data phase failed in mod '${modId}' (${script}): ${describeError(error)}`
    this.log.error(`[ModLifecycle] ${message}`)
    return new ModError('DATA_PHASE_FAILED', message, { ...detail, modId, script }, { cause: error })
  }

  private reportScriptFailure(
    modId: string,
    script: string,
    phase: 'data' | 'control',
    error: unknown,
  ): ScriptFailure {
    const message = describeError(error)
    this.log.error(`[ModLifecycle] ${phase} script ${script} of mod '${modId}' failed: ${message}`)
    return { modId, script, phase, message, error }
  }

  private reportHookFailures(failures: LifecycleFailure[]): LifecycleFailure[] {
    for (const failure of failures) {
      this.log.error(`[ModLifecycle] ${failure.hook} of mod '${failure.modId}' failed: ${failure.message}`)
    }
    return failures
  }
}
