/**
 * Runner configuration, read from the environment once at startup.
 *
 *   MOD_PATH                directory holding one sub-directory per mod (./mods)
 *   MOD_ORDER               comma-separated mod ids to load, in order
 *                           (default: every mod directory, sorted by name)
 *   MOD_LIB_NAME            script global for the engine table (engine)
 *   MOD_DATA_NAME           script global for the data registry (data)
 *   MOD_SCRIPT_TIMEOUT_MS   per-script time budget (1000)
 *   MOD_DATA_ERROR_POLICY   abort-load | skip-script (abort-load)
 *   MOD_KEEP_RUNNING        1/true: stay started until SIGINT or SIGTERM
 *                           (default: stop right after starting)
 */

import {
  DEFAULT_DATA_NAME,
  DEFAULT_LIB_NAME,
  DEFAULT_SCRIPT_TIMEOUT_MS,
  type DataErrorPolicy,
} from '@modhost/core'

export interface RunnerConfig {
  modPath: string
  /** Empty means every mod directory under modPath */
  modOrder: string[]
  libName: string
  dataName: string
  scriptTimeoutMs: number
  dataErrorPolicy: DataErrorPolicy
  keepRunning: boolean
}

export const DEFAULT_MOD_PATH = './mods'

function parsePolicy(value: string | undefined): DataErrorPolicy {
  return value === 'skip-script' ? 'skip-script' : 'abort-load'
}

function parseFlag(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true'
}

function parseList(value: string | undefined): string[] {
  if (!value) return []
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  return {
    modPath: env.MOD_PATH || DEFAULT_MOD_PATH,
    modOrder: parseList(env.MOD_ORDER),
    libName: env.MOD_LIB_NAME || DEFAULT_LIB_NAME,
    dataName: env.MOD_DATA_NAME || DEFAULT_DATA_NAME,
    scriptTimeoutMs: Number(env.MOD_SCRIPT_TIMEOUT_MS) || DEFAULT_SCRIPT_TIMEOUT_MS,
    dataErrorPolicy: parsePolicy(env.MOD_DATA_ERROR_POLICY),
    keepRunning: parseFlag(env.MOD_KEEP_RUNNING),
  }
}
