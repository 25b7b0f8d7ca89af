/**
 * Spawn world module
 *
 * bitecs world, components and prototype spawning.
 */

export * from './components'
export * from './world'
export * from './spawn'
