/**
 * Spawn World Components
 *
 * Structure-of-arrays stores indexed by entity ID, as bitecs expects.
 * Only the components a prototype payload can describe live here; games add
 * their own alongside.
 */

/** Maximum entities supported */
export const MAX_ENTITIES = 10000

/** Tags an entity with the prototype it was spawned from */
export const Prototype = {
  /** Index into ModWorld.prototypeKeys */
  index: new Uint32Array(MAX_ENTITIES),
}

/** Position in world space */
export const Position = {
  x: new Float32Array(MAX_ENTITIES),
  y: new Float32Array(MAX_ENTITIES),
  z: new Float32Array(MAX_ENTITIES),
}

export const Health = {
  current: new Float32Array(MAX_ENTITIES),
  max: new Float32Array(MAX_ENTITIES),
}
