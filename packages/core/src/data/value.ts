/**
 * Definition Values
 *
 * The data mods hand to the engine: strings, finite numbers, booleans,
 * sequences and string-keyed mappings, nested arbitrarily. Anything else a
 * script produces (functions, symbols, bigints, class instances, NaN) is
 * rejected at the boundary with MALFORMED_DEFINITION.
 */

import { ModError } from '../errors'
import { setOwn } from './deepCopy'

// ============================================================================
// Types
// ============================================================================

export type DefinitionScalar = string | number | boolean

export type DefinitionValue = DefinitionScalar | DefinitionValue[] | DefinitionMap

export interface DefinitionMap {
  [key: string]: DefinitionValue
}

/** Read-only view handed out for frozen values (prototype payloads) */
export type ReadonlyDefinitionValue =
  | DefinitionScalar
  | readonly ReadonlyDefinitionValue[]
  | ReadonlyDefinitionMap

export interface ReadonlyDefinitionMap {
  readonly [key: string]: ReadonlyDefinitionValue
}

export function isDefinitionMap(value: DefinitionValue): value is DefinitionMap {
  return typeof value === 'object' && !Array.isArray(value)
}

export function isReadonlyDefinitionMap(
  value: ReadonlyDefinitionValue | undefined,
): value is ReadonlyDefinitionMap {
  return typeof value === 'object' && !Array.isArray(value)
}

// ============================================================================
// Conversion
// ============================================================================

/**
 * True for objects created by an object literal or Object.create(null) in
 * any realm. Scripts run in their own vm context, so their plain objects do
 * not share the host's Object.prototype.
 */
function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === null || Object.getPrototypeOf(proto) === null
}

function malformed(path: string, reason: string): ModError {
  return new ModError('MALFORMED_DEFINITION', `${path} ${reason}`, { path })
}

function childPath(path: string, key: string | number): string {
  return typeof key === 'number' ? `${path}[${key}]` : `${path}.${key}`
}

/**
 * Convert a script value into a host-owned Definition Value.
 *
 * The result never aliases the input. Shared and cyclic substructure in the
 * input is preserved in the output. Mapping entries that are `undefined` or
 * `null` are dropped, matching an unset table field; inside sequences they
 * are holes and are rejected.
 */
export function toDefinitionValue(raw: unknown, path = 'value'): DefinitionValue {
  const converted = new Map<object, DefinitionValue>()

  const convert = (value: unknown, at: string): DefinitionValue => {
    switch (typeof value) {
      case 'string':
      case 'boolean':
        return value
      case 'number':
        if (!Number.isFinite(value)) throw malformed(at, `must be a finite number, got ${value}`)
        return value
      case 'object': {
        if (value === null) throw malformed(at, 'must not be null')
        const seen = converted.get(value)
        if (seen !== undefined) return seen

        if (Array.isArray(value)) {
          const list: DefinitionValue[] = []
          converted.set(value, list)
          for (let i = 0; i < value.length; i++) {
            const item: unknown = value[i]
            if (item === undefined || item === null) throw malformed(childPath(at, i), 'is a hole in a sequence')
            list.push(convert(item, childPath(at, i)))
          }
          return list
        }

        if (!isPlainObject(value)) throw malformed(at, 'must be a plain table, not a class instance')
        const map: DefinitionMap = {}
        converted.set(value, map)
        for (const key of Object.keys(value)) {
          const field: unknown = Reflect.get(value, key)
          if (field === undefined || field === null) continue
          setOwn(map, key, convert(field, childPath(at, key)))
        }
        return map
      }
      case 'undefined':
        throw malformed(at, 'is missing')
      default:
        throw malformed(at, `cannot hold a ${typeof value}`)
    }
  }

  return convert(raw, path)
}

/**
 * Freeze a Definition Value in place, all the way down.
 */
export function freezeDefinition(value: DefinitionValue): ReadonlyDefinitionValue {
  const stack: DefinitionValue[] = [value]
  const seen = new Set<object>()

  while (stack.length > 0) {
    const node = stack.pop()
    if (typeof node !== 'object' || seen.has(node)) continue
    seen.add(node)
    Object.freeze(node)
    stack.push(...(Array.isArray(node) ? node : Object.values(node)))
  }

  return value
}
