/**
 * @modhost/core
 *
 * Mod host core: the shared definition registry, entity prototypes, the
 * script bridge each mod runs against, and the lifecycle that loads mods
 * and dispatches their start/stop hooks.
 *
 * Runs in any Node process; nothing here touches the file system.
 */

export { VERSION } from './version'

export * from './errors'
export type { ModLog } from './log'

// Definitions (deep copy, values, registry)
export * from './data'

// Entity prototypes
export * from './prototypes'

// Script bridge
export * from './scripting'

// Mod manifests and descriptors
export * from './mods'

// Load phases and lifecycle hooks
export * from './lifecycle'

// Spawn world (bitecs)
export * from './world'
