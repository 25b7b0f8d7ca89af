/**
 * Prototype Registrar
 *
 * Entity prototypes declared by mods, keyed "<modId>:<localName>".
 * Keys are unique across every mod and are only accepted during the data
 * phase. Payloads are frozen on the way in, so resolve() hands out the
 * stored value itself rather than a copy on every spawn.
 */

import { ModError } from '../errors'
import {
  freezeDefinition,
  isDefinitionMap,
  toDefinitionValue,
  type ReadonlyDefinitionValue,
} from '../data/value'

/** Separator between the owning mod and the local name */
export const PROTOTYPE_KEY_SEPARATOR = ':'

/** The lookup the ECS world needs to spawn from a prototype */
export interface PrototypeResolver {
  resolve(key: string): ReadonlyDefinitionValue | undefined
}

export function prototypeKey(modId: string, localName: string): string {
  return `${modId}${PROTOTYPE_KEY_SEPARATOR}${localName}`
}

/**
 * Split a key into its owning mod and local name.
 * Returns undefined for strings that are not "<mod>:<name>".
 */
export function parsePrototypeKey(key: string): { modId: string; localName: string } | undefined {
  const at = key.indexOf(PROTOTYPE_KEY_SEPARATOR)
  if (at <= 0 || at === key.length - 1) return undefined
  const localName = key.slice(at + 1)
  if (localName.includes(PROTOTYPE_KEY_SEPARATOR)) return undefined
  return { modId: key.slice(0, at), localName }
}

export class PrototypeRegistrar implements PrototypeResolver {
  private readonly prototypes = new Map<string, ReadonlyDefinitionValue>()
  private readonly journal: string[] = []
  private sealed = false

  get size(): number {
    return this.prototypes.size
  }

  get isSealed(): boolean {
    return this.sealed
  }

  /**
   * Register a prototype for `modId` and return its key.
   *
   * @throws PHASE_VIOLATION once sealed
   * @throws MALFORMED_DEFINITION for an empty or ':'-containing local name,
   *   or a payload that is not a table of Definition Values
   * @throws ENTITY_ALREADY_REGISTERED if the key exists
   */
  register(modId: string, localName: string, payload: unknown): string {
    const key = prototypeKey(modId, localName)
    if (this.sealed) {
      throw new ModError('PHASE_VIOLATION', `Cannot register entity '${key}': the data phase is closed`, { key, modId })
    }
    if (localName.length === 0 || localName.includes(PROTOTYPE_KEY_SEPARATOR)) {
      throw new ModError('MALFORMED_DEFINITION', `Invalid entity name '${localName}' in mod '${modId}'`, { key, modId })
    }
    if (this.prototypes.has(key)) {
      throw new ModError('ENTITY_ALREADY_REGISTERED', `Entity '${key}' is already registered`, { key, modId })
    }

    const value = toDefinitionValue(payload, key)
    if (!isDefinitionMap(value)) {
      throw new ModError('MALFORMED_DEFINITION', `Entity '${key}' payload must be a table`, { key, modId })
    }
    this.prototypes.set(key, freezeDefinition(value))
    this.journal.push(key)
    return key
  }

  resolve(key: string): ReadonlyDefinitionValue | undefined {
    return this.prototypes.get(key)
  }

  has(key: string): boolean {
    return this.prototypes.has(key)
  }

  /** Registered keys in registration order */
  keys(): string[] {
    return [...this.prototypes.keys()]
  }

  seal(): void {
    this.sealed = true
  }

  checkpoint(): number {
    return this.journal.length
  }

  rollback(mark: number): void {
    while (this.journal.length > mark) {
      const key = this.journal.pop()
      if (key !== undefined) this.prototypes.delete(key)
    }
  }
}
