/**
 * Mod API (script host bridge)
 *
 * Builds the globals one mod's context receives. Every function closes over
 * the mod id it was built for, so a script cannot act as another mod: the
 * id is never read from script arguments.
 *
 *   <lib>.version                     engine version, read-only
 *   <lib>.register_entity(key, table) prototype registration (data phase)
 *   <lib>.deepcopy(value)             structural copy
 *   <lib>.on_start / <lib>.on_stop    lifecycle slots (control phase)
 *   <data>.extend(category, list)     definition registration (data phase)
 *   <data>.table()                    copy of the whole registry
 *   <data>.lookup(category, mod, name)
 *   print(...)                        log line tagged with the mod id
 */

import { ModError, isModError } from '../errors'
import { deepCopy } from '../data/deepCopy'
import type { DefinitionRegistry, RegistryTable } from '../data/registry'
import type { DefinitionValue } from '../data/value'
import type { PrototypeRegistrar } from '../prototypes/registrar'
import { parsePrototypeKey } from '../prototypes/registrar'
import { isAsyncFunction, isLifecycleHandler, type LifecycleHookId, type LifecycleHooks } from '../lifecycle/hooks'
import type { LifecyclePhase } from '../lifecycle/phase'
import type { ModLog } from '../log'
import { VERSION } from '../version'

/** Per-mod factory for game-specific globals */
export type ScriptExtension = (modId: string) => object

export interface ModApiOptions {
  modId: string
  registry: DefinitionRegistry
  prototypes: PrototypeRegistrar
  hooks: LifecycleHooks
  /** Current global phase; lifecycle slots are writable only in 'control' */
  phase: () => LifecyclePhase
  log: ModLog
  /** Global name of the engine table */
  libName: string
  /** Global name of the data registry table */
  dataName: string
  version?: string
  extensions?: Readonly<Record<string, ScriptExtension>>
  /** Sees every ModError a host function raises, even one the script catches */
  onHostError?: (error: ModError) => void
}

function requireString(value: unknown, what: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ModError('MALFORMED_DEFINITION', `${what} must be a non-empty string`)
  }
  return value
}

function reported<R>(options: ModApiOptions, call: () => R): R {
  try {
    return call()
  } catch (error) {
    if (isModError(error)) options.onHostError?.(error)
    throw error
  }
}

/**
 * Build the engine table for one mod.
 */
export function createHostTable(options: ModApiOptions): object {
  const { modId, prototypes, hooks, phase } = options

  const install = (hook: LifecycleHookId, handler: unknown): void => {
    const current = phase()
    if (current !== 'control') {
      throw new ModError('PHASE_VIOLATION', `Mod '${modId}' cannot set ${hook} during the ${current} phase`, {
        modId,
        hook,
        phase: current,
      })
    }
    if (handler === undefined || handler === null) {
      hooks.remove(hook, modId)
      return
    }
    if (!isLifecycleHandler(handler)) {
      throw new ModError('MALFORMED_DEFINITION', `${hook} must be a function`, { modId, hook })
    }
    if (isAsyncFunction(handler)) {
      throw new ModError('MALFORMED_DEFINITION', `${hook} must be a synchronous function`, { modId, hook })
    }
    hooks.register(hook, modId, handler)
  }

  const host = {
    version: options.version ?? VERSION,

    register_entity(key: unknown, payload: unknown): string {
      return reported(options, () => {
        const name = requireString(key, 'Entity key')
        let localName = name
        if (name.includes(':')) {
          const parsed = parsePrototypeKey(name)
          if (!parsed || parsed.modId !== modId) {
            throw new ModError('MALFORMED_DEFINITION', `Mod '${modId}' cannot register entity '${name}'`, {
              modId,
              key: name,
            })
          }
          localName = parsed.localName
        }
        return prototypes.register(modId, localName, payload)
      })
    },

    deepcopy<T>(value: T): T {
      return deepCopy(value)
    },

    get on_start(): unknown {
      return hooks.get('on_start', modId)
    },
    set on_start(handler: unknown) {
      reported(options, () => install('on_start', handler))
    },

    get on_stop(): unknown {
      return hooks.get('on_stop', modId)
    },
    set on_stop(handler: unknown) {
      reported(options, () => install('on_stop', handler))
    },
  }

  return Object.freeze(host)
}

/**
 * Build the data registry table for one mod.
 */
export function createDataTable(options: ModApiOptions): object {
  const { modId, registry } = options

  const data = {
    extend(category: unknown, definitions?: unknown): void {
      reported(options, () => {
        if (Array.isArray(category) && definitions === undefined) {
          throw new ModError(
            'MALFORMED_DEFINITION',
            'extend(definitions) without a category is not supported; call extend(category, definitions)',
            { modId },
          )
        }
        registry.extend(requireString(category, 'Definition category'), modId, definitions)
      })
    },

    table(): RegistryTable {
      return registry.table()
    },

    lookup(category: unknown, owner: unknown, name: unknown): DefinitionValue | undefined {
      return reported(options, () =>
        registry.lookup(
          requireString(category, 'Definition category'),
          requireString(owner, 'Mod id'),
          requireString(name, 'Definition name'),
        ),
      )
    },
  }

  return Object.freeze(data)
}

/**
 * Every global a mod's context starts with.
 */
export function createModGlobals(options: ModApiOptions): Record<string, unknown> {
  const { modId, log } = options
  const globals: Record<string, unknown> = {
    [options.libName]: createHostTable(options),
    [options.dataName]: createDataTable(options),
    print: (...values: unknown[]): void => {
      log.log(`[mod:${modId}]`, ...values)
    },
  }
  for (const [name, factory] of Object.entries(options.extensions ?? {})) {
    globals[name] = factory(modId)
  }
  return globals
}
