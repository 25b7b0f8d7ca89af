/**
 * Global load state of the mod set.
 *
 *   unloaded → data → control → running → stopping → stopped
 *
 * A failed data phase returns to 'unloaded'.
 */
export type LifecyclePhase = 'unloaded' | 'data' | 'control' | 'running' | 'stopping' | 'stopped'
