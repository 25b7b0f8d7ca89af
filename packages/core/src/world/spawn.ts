/**
 * Prototype Spawning
 *
 * Turns a resolved prototype payload into an entity. The payload fields the
 * world understands:
 *
 *   position = { x = 1, y = 2, z = 3 }    (each axis optional, default 0)
 *   health   = 100 | { max = 100, current = 40 }
 *
 * Other fields are left for game systems to read through prototypeOf().
 */

import { addComponent, addEntity, hasComponent, removeEntity } from 'bitecs'
import { isReadonlyDefinitionMap, type ReadonlyDefinitionValue } from '../data/value'
import { Health, Position, Prototype } from './components'
import type { ModWorld } from './world'

export interface SpawnPoint {
  x: number
  y: number
  z?: number
}

function numberOr(value: ReadonlyDefinitionValue | undefined, fallback: number): number {
  return typeof value === 'number' ? value : fallback
}

function readPosition(value: ReadonlyDefinitionValue | undefined): SpawnPoint | undefined {
  if (!isReadonlyDefinitionMap(value)) return undefined
  return {
    x: numberOr(value.x, 0),
    y: numberOr(value.y, 0),
    z: numberOr(value.z, 0),
  }
}

function readHealth(value: ReadonlyDefinitionValue | undefined): { current: number; max: number } | undefined {
  if (typeof value === 'number') return { current: value, max: value }
  if (!isReadonlyDefinitionMap(value)) return undefined
  const max = value.max
  if (typeof max !== 'number') return undefined
  return { current: numberOr(value.current, max), max }
}

function keyIndex(world: ModWorld, key: string): number {
  let index = world.prototypeIndex.get(key)
  if (index === undefined) {
    index = world.prototypeKeys.length
    world.prototypeKeys.push(key)
    world.prototypeIndex.set(key, index)
  }
  return index
}

/**
 * Spawn an entity from a registered prototype.
 *
 * @param world - The spawn world
 * @param key - Prototype key ("<mod>:<name>")
 * @param at - Overrides the payload position
 * @returns The entity ID, or undefined if the key was never registered
 */
export function spawnPrototype(world: ModWorld, key: string, at?: SpawnPoint): number | undefined {
  const payload = world.prototypes.resolve(key)
  if (!isReadonlyDefinitionMap(payload)) return undefined

  const eid = addEntity(world)
  addComponent(world, Prototype, eid)
  Prototype.index[eid] = keyIndex(world, key)

  const position = at ?? readPosition(payload.position)
  if (position) {
    addComponent(world, Position, eid)
    Position.x[eid] = position.x
    Position.y[eid] = position.y
    Position.z[eid] = position.z ?? 0
  }

  const health = readHealth(payload.health)
  if (health) {
    addComponent(world, Health, eid)
    Health.current[eid] = health.current
    Health.max[eid] = health.max
  }

  return eid
}

/**
 * The prototype key an entity was spawned from, or undefined.
 */
export function prototypeOf(world: ModWorld, eid: number): string | undefined {
  if (!hasComponent(world, Prototype, eid)) return undefined
  const index = Prototype.index[eid]
  return index === undefined ? undefined : world.prototypeKeys[index]
}

export function despawn(world: ModWorld, eid: number): void {
  removeEntity(world, eid)
}

/** What mods see of the world */
export interface WorldScriptApi {
  spawn(key: unknown, x?: unknown, y?: unknown, z?: unknown): number | undefined
}

/**
 * Script global exposing spawning to mods (e.g. from on_start):
 *
 *   world.spawn('core:plant', 12, 12, 8)
 */
export function createWorldExtension(world: ModWorld): (modId: string) => WorldScriptApi {
  return () => Object.freeze({
    spawn(key: unknown, x?: unknown, y?: unknown, z?: unknown): number | undefined {
      if (typeof key !== 'string') return undefined
      const at = typeof x === 'number' && typeof y === 'number'
        ? { x, y, z: typeof z === 'number' ? z : 0 }
        : undefined
      return spawnPrototype(world, key, at)
    },
  })
}
