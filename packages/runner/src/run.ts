/**
 * Headless mod run
 *
 * Loads the configured mods and starts them against a spawn world, then
 * stops them and summarizes what happened. run() does both back to back,
 * which is how a mod set is smoke-tested outside the game.
 */

import { defineQuery } from 'bitecs'
import {
  ModLifecycle,
  Prototype,
  createModWorld,
  createWorldExtension,
  type LifecycleFailure,
  type LoadReport,
  type ModLog,
  type ModWorld,
} from '@modhost/core'
import type { RunnerConfig } from './config'
import { readMods } from './mods'

const prototypeQuery = defineQuery([Prototype])

/** A started mod set */
export interface ModSession {
  lifecycle: ModLifecycle
  world: ModWorld
  report: LoadReport
  startFailures: LifecycleFailure[]
}

export interface RunSummary {
  report: LoadReport
  /** Entities spawned by on_start hooks */
  entities: number
  hookFailures: LifecycleFailure[]
}

/** Number of problems a summary reports */
export function failureCount(summary: RunSummary): number {
  return summary.report.failures.length + summary.hookFailures.length
}

/**
 * Load and start the configured mods.
 *
 * @throws DATA_PHASE_FAILED (and mod set validation errors) from the load
 */
export function startMods(config: RunnerConfig, log: ModLog = console): ModSession {
  const mods = readMods(config.modPath, config.modOrder)

  // Resolve through the lifecycle: its prototype table is replaced on load
  const world = createModWorld({ resolve: (key) => lifecycle.prototypes.resolve(key) })

  const lifecycle = new ModLifecycle({
    libName: config.libName,
    dataName: config.dataName,
    scriptTimeoutMs: config.scriptTimeoutMs,
    dataErrorPolicy: config.dataErrorPolicy,
    log,
    extensions: { world: createWorldExtension(world) },
  })

  const report = lifecycle.load(mods)
  log.log(`[Runner] Loaded ${report.mods.length} mods (${report.definitions} definitions, ${report.prototypes} prototypes)`)

  const startFailures = lifecycle.start()
  log.log(`[Runner] Started; ${prototypeQuery(world).length} entities spawned`)

  return { lifecycle, world, report, startFailures }
}

export function stopMods(session: ModSession, log: ModLog = console): RunSummary {
  const entities = prototypeQuery(session.world).length
  const stopFailures = session.lifecycle.stop()
  log.log('[Runner] Stopped')

  return {
    report: session.report,
    entities,
    hookFailures: [...session.startFailures, ...stopFailures],
  }
}

export function run(config: RunnerConfig, log: ModLog = console): RunSummary {
  return stopMods(startMods(config, log), log)
}
