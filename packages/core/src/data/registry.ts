/**
 * Definition Registry
 *
 * The shared table mods extend during the data phase:
 * category → mod id → definition name → value.
 *
 * A name is written once per (category, mod). Re-extending an existing name
 * is a DUPLICATE_DEFINITION, never an overwrite or a field merge; a mod that
 * wants a variant reads the original back, edits the copy and extends it
 * under a new name. Values go in and come out as copies, so no caller ever
 * holds a reference into the table.
 *
 * The mod id is an argument here but is never taken from a script: the
 * bridge passes the id of the mod whose context made the call.
 */

import { ModError } from '../errors'
import { deepCopy, setOwn } from './deepCopy'
import { isDefinitionMap, toDefinitionValue, type DefinitionValue } from './value'

export type RegistryTable = Record<string, Record<string, Record<string, DefinitionValue>>>

interface JournalEntry {
  category: string
  modId: string
  name: string
}

function requireNonEmpty(value: unknown, what: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ModError('MALFORMED_DEFINITION', `${what} must be a non-empty string`, { value: String(value) })
  }
  return value
}

export class DefinitionRegistry {
  private readonly categories = new Map<string, Map<string, Map<string, DefinitionValue>>>()
  private readonly journal: JournalEntry[] = []
  private sealed = false

  /** Number of stored definitions across all categories and mods */
  get size(): number {
    return this.journal.length
  }

  get isSealed(): boolean {
    return this.sealed
  }

  /**
   * Insert definitions under (category, modId).
   *
   * All-or-nothing: every definition is validated and converted before any
   * is stored.
   *
   * @throws PHASE_VIOLATION once sealed
   * @throws MALFORMED_DEFINITION for a bad category, a non-list argument,
   *   a definition that is not a table, or a missing/empty `name`
   * @throws DUPLICATE_DEFINITION if a name exists, or repeats within the call
   */
  extend(category: string, modId: string, definitions: unknown): void {
    if (this.sealed) {
      throw new ModError('PHASE_VIOLATION', `Cannot extend '${category}' from mod '${modId}': the data phase is closed`, {
        category,
        modId,
      })
    }
    requireNonEmpty(category, 'Definition category')
    if (!Array.isArray(definitions)) {
      throw new ModError('MALFORMED_DEFINITION', `extend('${category}', ...) expects a list of definitions`, {
        category,
        modId,
      })
    }

    const existing = this.categories.get(category)?.get(modId)
    const staged = new Map<string, DefinitionValue>()

    definitions.forEach((raw: unknown, index: number) => {
      const value = toDefinitionValue(raw, `${category}[${index}]`)
      if (!isDefinitionMap(value)) {
        throw new ModError('MALFORMED_DEFINITION', `${category}[${index}] must be a table`, { category, modId, index })
      }
      const name = value.name
      if (typeof name !== 'string' || name.length === 0) {
        throw new ModError('MALFORMED_DEFINITION', `${category}[${index}] requires a non-empty string 'name'`, {
          category,
          modId,
          index,
        })
      }
      if (existing?.has(name) || staged.has(name)) {
        throw new ModError('DUPLICATE_DEFINITION', `Definition '${category}.${modId}.${name}' already exists`, {
          category,
          modId,
          name,
        })
      }
      staged.set(name, value)
    })

    if (staged.size === 0) return

    let byMod = this.categories.get(category)
    if (!byMod) {
      byMod = new Map()
      this.categories.set(category, byMod)
    }
    let byName = byMod.get(modId)
    if (!byName) {
      byName = new Map()
      byMod.set(modId, byName)
    }
    for (const [name, value] of staged) {
      byName.set(name, value)
      this.journal.push({ category, modId, name })
    }
  }

  /**
   * Copy of the stored value, or undefined if nothing is stored there.
   */
  lookup(category: string, modId: string, name: string): DefinitionValue | undefined {
    const value = this.categories.get(category)?.get(modId)?.get(name)
    return value === undefined ? undefined : deepCopy(value)
  }

  has(category: string, modId: string, name: string): boolean {
    return this.categories.get(category)?.get(modId)?.has(name) ?? false
  }

  /**
   * Copy of the whole table as of this call.
   */
  table(): RegistryTable {
    const out: RegistryTable = {}
    for (const [category, byMod] of this.categories) {
      const mods: Record<string, Record<string, DefinitionValue>> = {}
      for (const [modId, byName] of byMod) {
        const names: Record<string, DefinitionValue> = {}
        for (const [name, value] of byName) {
          setOwn(names, name, value)
        }
        setOwn(mods, modId, names)
      }
      setOwn(out, category, mods)
    }
    // Copied in one pass so values shared between definitions stay shared
    return deepCopy(out)
  }

  /** Reject every later extend with PHASE_VIOLATION */
  seal(): void {
    this.sealed = true
  }

  /** Mark the current insert position for a later rollback */
  checkpoint(): number {
    return this.journal.length
  }

  /**
   * Remove every definition inserted after `mark`, newest first.
   */
  rollback(mark: number): void {
    while (this.journal.length > mark) {
      const entry = this.journal.pop()
      if (!entry) break
      const byMod = this.categories.get(entry.category)
      const byName = byMod?.get(entry.modId)
      byName?.delete(entry.name)
      if (byName && byName.size === 0) byMod?.delete(entry.modId)
      if (byMod && byMod.size === 0) this.categories.delete(entry.category)
    }
  }
}
