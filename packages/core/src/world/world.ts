/**
 * Spawn World
 *
 * A bitecs world that materializes entities from registered prototypes.
 * The world only ever asks the mod host one thing: resolve(key).
 */

import { createWorld as bitCreateWorld, type IWorld } from 'bitecs'
import type { PrototypeResolver } from '../prototypes/registrar'

export interface ModWorld extends IWorld {
  /** Where prototype keys are resolved at spawn time */
  prototypes: PrototypeResolver
  /** Keys of every prototype spawned so far; Prototype.index points here */
  prototypeKeys: string[]
  /** Reverse of prototypeKeys */
  prototypeIndex: Map<string, number>
}

export function createModWorld(prototypes: PrototypeResolver): ModWorld {
  const baseWorld = bitCreateWorld()

  return {
    ...baseWorld,
    prototypes,
    prototypeKeys: [],
    prototypeIndex: new Map(),
  }
}
