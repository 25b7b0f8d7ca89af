/**
 * Mod Manifests and Descriptors
 *
 * A mod directory carries a `mod.json` describing it. The directory name is
 * the mod id: it namespaces every definition and prototype the mod writes,
 * so it must be a plain identifier and unique in the load set.
 */

import { ModError } from '../errors'
import type { ScriptSource } from '../scripting/context'

// ============================================================================
// Types
// ============================================================================

export interface ModManifest {
  /** Human readable name */
  name: string
  version: string
  author: string
  email?: string
  website?: string
  /** Ids of mods that must load before this one */
  dependencies: string[]
}

/** One mod as handed to the lifecycle, in discovery order */
export interface ModDescriptor {
  readonly id: string
  readonly manifest?: ModManifest
  /** Run during the data phase, in order */
  readonly dataScripts: readonly ScriptSource[]
  /** Run during the control phase, in order */
  readonly controlScripts: readonly ScriptSource[]
}

/** File name of the manifest at the top of a mod directory */
export const MOD_MANIFEST_FILE = 'mod.json'

const MOD_ID_PATTERN = /^[a-zA-Z0-9_-]+$/

// ============================================================================
// Validation
// ============================================================================

export function isValidModId(id: string): boolean {
  return MOD_ID_PATTERN.test(id)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validate a parsed `mod.json`.
 *
 * @param raw - Parsed JSON
 * @param path - Label used in error messages (usually the file path)
 * @throws INVALID_MANIFEST listing every problem found
 */
export function parseModManifest(raw: unknown, path: string): ModManifest {
  if (!isRecord(raw)) {
    throw new ModError('INVALID_MANIFEST', `${path}: manifest must be an object`, { path })
  }

  const problems: string[] = []
  const requireString = (field: string): string => {
    const value = raw[field]
    if (typeof value !== 'string' || value.length === 0) {
      problems.push(`'${field}' must be a non-empty string`)
      return ''
    }
    return value
  }
  const optionalString = (field: string): string | undefined => {
    const value = raw[field]
    if (value === undefined) return undefined
    if (typeof value !== 'string') {
      problems.push(`'${field}' must be a string`)
      return undefined
    }
    return value
  }

  const name = requireString('name')
  const version = requireString('version')
  const author = requireString('author')
  const email = optionalString('email')
  const website = optionalString('website')

  const dependencies: string[] = []
  const rawDeps = raw.dependencies
  if (rawDeps !== undefined) {
    if (!Array.isArray(rawDeps)) {
      problems.push(`'dependencies' must be a list of mod ids`)
    } else {
      rawDeps.forEach((dep: unknown, i: number) => {
        if (typeof dep === 'string' && isValidModId(dep)) dependencies.push(dep)
        else problems.push(`'dependencies[${i}]' is not a valid mod id`)
      })
    }
  }

  if (problems.length > 0) {
    throw new ModError('INVALID_MANIFEST', `${path}: ${problems.join('; ')}`, { path, problems })
  }

  const manifest: ModManifest = { name, version, author, dependencies }
  if (email !== undefined) manifest.email = email
  if (website !== undefined) manifest.website = website
  return manifest
}

/**
 * Check a load set before anything runs: ids are valid and unique, and every
 * declared dependency appears earlier in the list.
 *
 * @throws INVALID_MOD_ID, DUPLICATE_MOD or MISSING_DEPENDENCY
 */
export function checkLoadOrder(mods: readonly ModDescriptor[]): void {
  const seen = new Set<string>()
  for (const mod of mods) {
    if (!isValidModId(mod.id)) {
      throw new ModError('INVALID_MOD_ID', `Mod id '${mod.id}' is invalid`, { modId: mod.id })
    }
    if (seen.has(mod.id)) {
      throw new ModError('DUPLICATE_MOD', `Mod '${mod.id}' already exists`, { modId: mod.id })
    }
    for (const dep of mod.manifest?.dependencies ?? []) {
      if (!seen.has(dep)) {
        throw new ModError('MISSING_DEPENDENCY', `Mod '${mod.id}' depends on '${dep}', which is not loaded before it`, {
          modId: mod.id,
          dependency: dep,
        })
      }
    }
    seen.add(mod.id)
  }
}
