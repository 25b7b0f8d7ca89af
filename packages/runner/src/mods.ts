/**
 * Mod Directories
 *
 * Reads mod directories into descriptors. A mod directory holds:
 *
 *   mod.json        manifest (name, version, author, dependencies, ...)
 *   data*.js        data phase scripts
 *   init*.js,
 *   control*.js     control phase scripts
 *
 * Scripts of each phase run in file name order. Only the top level of each
 * directory is read.
 */

import { readFileSync, readdirSync, statSync } from 'fs'
import path from 'path'
import {
  MOD_MANIFEST_FILE,
  ModError,
  describeError,
  parseModManifest,
  type ModDescriptor,
  type ScriptSource,
} from '@modhost/core'

const DATA_SCRIPT = /^data([._-][^/]*)?\.js$/
const CONTROL_SCRIPT = /^(init|control)([._-][^/]*)?\.js$/

/** Script read from disk each time it is loaded */
export function fileScript(file: string, name = file): ScriptSource {
  return { name, load: () => readFileSync(file, 'utf8') }
}

function readManifest(file: string): unknown {
  let text: string
  try {
    text = readFileSync(file, 'utf8')
  } catch (error) {
    throw new ModError('INVALID_MANIFEST', `${file}: cannot be read (${describeError(error)})`, { path: file }, { cause: error })
  }
  try {
    return JSON.parse(text)
  } catch (error) {
    throw new ModError('INVALID_MANIFEST', `${file}: invalid JSON (${describeError(error)})`, { path: file }, { cause: error })
  }
}

/**
 * Build the descriptor for one mod directory. The directory name is the mod id.
 *
 * @throws INVALID_MANIFEST if mod.json is missing or invalid
 */
export function readModDescriptor(dir: string): ModDescriptor {
  const id = path.basename(path.resolve(dir))
  const manifestFile = path.join(dir, MOD_MANIFEST_FILE)
  const manifest = parseModManifest(readManifest(manifestFile), manifestFile)

  const files = readdirSync(dir).sort()
  const script = (file: string) => fileScript(path.join(dir, file), `${id}/${file}`)

  return {
    id,
    manifest,
    dataScripts: files.filter((file) => DATA_SCRIPT.test(file)).map(script),
    controlScripts: files.filter((file) => CONTROL_SCRIPT.test(file)).map(script),
  }
}

/**
 * Mod ids under `modPath`: visible sub-directories that contain a manifest,
 * sorted by name.
 */
export function listModIds(modPath: string): string[] {
  return readdirSync(modPath)
    .filter((entry) => !entry.startsWith('.'))
    .filter((entry) => {
      const dir = path.join(modPath, entry)
      return statSync(dir).isDirectory() && statSync(path.join(dir, MOD_MANIFEST_FILE), { throwIfNoEntry: false }) !== undefined
    })
    .sort()
}

/**
 * Descriptors for the mods to load, in load order.
 *
 * @param modPath - Directory holding the mods
 * @param order - Mod ids to load; empty loads every mod in name order
 */
export function readMods(modPath: string, order: readonly string[] = []): ModDescriptor[] {
  const ids = order.length > 0 ? order : listModIds(modPath)
  return ids.map((id) => readModDescriptor(path.join(modPath, id)))
}
