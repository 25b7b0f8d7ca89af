/**
 * Mod Lifecycle Tests
 *
 * Whole load sets driven through data, control, start and stop.
 */

import { describe, test, expect, vi } from 'vitest'
import { ModError } from '../errors'
import type { ModDescriptor, ModManifest } from '../mods/manifest'
import { inlineScript } from '../scripting/context'
import { ModLifecycle, type ModLifecycleOptions } from './lifecycle'

// ============================================================================
// Test Setup
// ============================================================================

function createLog() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

function mod(
  id: string,
  scripts: { data?: string[]; control?: string[] } = {},
  manifest?: ModManifest,
): ModDescriptor {
  return {
    id,
    manifest,
    dataScripts: (scripts.data ?? []).map((code, i) => inlineScript(`${id}/data${i}.js`, code)),
    controlScripts: (scripts.control ?? []).map((code, i) => inlineScript(`${id}/init${i}.js`, code)),
  }
}

function setup(options: ModLifecycleOptions = {}) {
  const log = createLog()
  const lifecycle = new ModLifecycle({ ...options, log })
  /** Lines printed by mod scripts, without the mod tag */
  const printed = (): unknown[] =>
    log.log.mock.calls
      .filter((call) => typeof call[0] === 'string' && call[0].startsWith('[mod:'))
      .map((call) => call[1])
  return { lifecycle, log, printed }
}

function thrownBy(fn: () => unknown): ModError {
  try {
    fn()
  } catch (error) {
    if (error instanceof ModError) return error
    throw error
  }
  throw new Error('expected a ModError')
}

// ============================================================================
// Phases
// ============================================================================

describe('ModLifecycle', () => {
  test('starts unloaded with an empty, sealed registry', () => {
    const { lifecycle } = setup()

    expect(lifecycle.phase).toBe('unloaded')
    expect(lifecycle.registry.table()).toEqual({})
    expect(lifecycle.registry.isSealed).toBe(true)
    expect(lifecycle.prototypes.isSealed).toBe(true)
  })

  test('walks unloaded → control → running → stopped', () => {
    const { lifecycle } = setup()

    const report = lifecycle.load([mod('core')])
    expect(report).toEqual({ mods: ['core'], definitions: 0, prototypes: 0, failures: [] })
    expect(lifecycle.phase).toBe('control')

    expect(lifecycle.start()).toEqual([])
    expect(lifecycle.phase).toBe('running')

    expect(lifecycle.stop()).toEqual([])
    expect(lifecycle.phase).toBe('stopped')
    expect(lifecycle.mods).toEqual(['core'])
  })

  test('rejects out-of-order transitions', () => {
    const { lifecycle } = setup()

    expect(thrownBy(() => lifecycle.start()).code).toBe('INVALID_LIFECYCLE_TRANSITION')
    expect(thrownBy(() => lifecycle.stop()).code).toBe('INVALID_LIFECYCLE_TRANSITION')

    lifecycle.load([mod('core')])
    const error = thrownBy(() => lifecycle.load([mod('core')]))
    expect(error.code).toBe('INVALID_LIFECYCLE_TRANSITION')
    expect(error.message).toBe('Cannot load mods in the control phase (expected unloaded)')
  })

  test('runs every data script before any control script', () => {
    const { lifecycle, printed } = setup()

    lifecycle.load([
      mod('a', { data: ["print('a data')"], control: ["print('a control')"] }),
      mod('b', { data: ["print('b data')"], control: ["print('b control')"] }),
    ])

    expect(printed()).toEqual(['a data', 'b data', 'a control', 'b control'])
  })

  test('runs the scripts of a mod in order within one context', () => {
    const { lifecycle, printed } = setup()

    lifecycle.load([mod('a', { data: ['var count = 1', 'count += 1; print(count)'] })])

    expect(printed()).toEqual([2])
  })

  test('gives the control phase a fresh context', () => {
    const { lifecycle, printed } = setup()

    lifecycle.load([mod('a', { data: ['var leftover = 1'], control: ['print(typeof leftover)'] })])

    expect(printed()).toEqual(['undefined'])
  })

  test('keeps mod contexts apart', () => {
    const { lifecycle, printed } = setup()

    lifecycle.load([
      mod('a', { data: ['var secret = 42'] }),
      mod('b', { data: ['print(typeof secret)'] }),
    ])

    expect(printed()).toEqual(['undefined'])
  })

  // ==========================================================================
  // Registry visibility
  // ==========================================================================

  test('control scripts see the definitions of every mod', () => {
    const { lifecycle, printed } = setup()

    lifecycle.load([
      mod('a', { data: ["data.extend('example', [{ name: 't1' }])"] }),
      mod('b', { control: ['print(JSON.stringify(data.table().example.a))'] }),
    ])

    expect(printed()).toEqual(['{"t1":{"name":"t1"}}'])
  })

  test('later data scripts see earlier mods', () => {
    const { lifecycle, printed } = setup()

    lifecycle.load([
      mod('a', { data: ["data.extend('example', [{ name: 't1', hp: 3 }])"] }),
      mod('b', { data: ["print(data.lookup('example', 'a', 't1').hp)"] }),
    ])

    expect(printed()).toEqual([3])
  })

  test('reports counts of what the load stored', () => {
    const { lifecycle } = setup()

    const report = lifecycle.load([
      mod('a', { data: ["data.extend('example', [{ name: 't1' }, { name: 't2' }]); engine.register_entity('plant', {})"] }),
      mod('b', { data: ["data.extend('example', [{ name: 't1' }])"] }),
    ])

    expect(report.definitions).toBe(3)
    expect(report.prototypes).toBe(1)
    expect(lifecycle.prototypes.has('a:plant')).toBe(true)
  })

  // ==========================================================================
  // Phase enforcement
  // ==========================================================================

  test('rejects writes after the data phase closes', () => {
    const { lifecycle } = setup()
    lifecycle.load([mod('a')])

    expect(thrownBy(() => lifecycle.prototypes.register('a', 'late', {})).code).toBe('PHASE_VIOLATION')
    expect(thrownBy(() => lifecycle.registry.extend('example', 'a', [{ name: 'late' }])).code).toBe(
      'PHASE_VIOLATION',
    )
  })

  test('a control script that registers skips only the rest of that mod', () => {
    const { lifecycle, printed } = setup()

    const report = lifecycle.load([
      mod('a', { control: ["engine.register_entity('late', {})", "print('a second')"] }),
      mod('b', { control: ["print('b control')"] }),
    ])

    expect(printed()).toEqual(['b control'])
    expect(report.failures).toHaveLength(1)
    expect(report.failures[0]).toMatchObject({
      modId: 'a',
      script: 'a/init0.js',
      phase: 'control',
      message: "Cannot register entity 'a:late': the data phase is closed",
    })
    expect(lifecycle.prototypes.has('a:late')).toBe(false)
    expect(lifecycle.phase).toBe('control')
  })

  test('hooks cannot be installed during the data phase', () => {
    const { lifecycle } = setup()

    const error = thrownBy(() => lifecycle.load([mod('a', { data: ['engine.on_start = function () {}'] })]))

    expect(error.code).toBe('DATA_PHASE_FAILED')
    expect(error.context.code).toBe('PHASE_VIOLATION')
  })

  // ==========================================================================
  // Data phase failures
  // ==========================================================================

  test('a data phase failure undoes the inserts of every mod', () => {
    const { lifecycle, printed } = setup()

    const error = thrownBy(() =>
      lifecycle.load([
        mod('b', {
          data: ["data.extend('example', [{ name: 'from b' }]); engine.register_entity('plant', {})"],
          control: ["print('b control')"],
        }),
        mod('a', { data: ["data.extend('example', [{}])"] }),
      ]),
    )

    expect(error.code).toBe('DATA_PHASE_FAILED')
    expect(error.message).toBe(
      "Data phase failed in mod 'a' (a/data0.js): example[0] requires a non-empty string 'name'",
    )
    expect(error.context).toMatchObject({ modId: 'a', script: 'a/data0.js', code: 'MALFORMED_DEFINITION' })
    expect(error.cause).toBeInstanceOf(ModError)

    expect(lifecycle.phase).toBe('unloaded')
    expect(lifecycle.mods).toEqual([])
    expect(lifecycle.registry.table()).toEqual({})
    expect(lifecycle.prototypes.size).toBe(0)
    expect(printed()).toEqual([])
    expect(thrownBy(() => lifecycle.start()).code).toBe('INVALID_LIFECYCLE_TRANSITION')
  })

  test('a duplicate prototype names its key', () => {
    const { lifecycle, log } = setup()

    const error = thrownBy(() =>
      lifecycle.load([mod('a', { data: ["engine.register_entity('plant', {}); engine.register_entity('plant', {})"] })]),
    )

    expect(error.message).toBe("Data phase failed in mod 'a' (a/data0.js): Entity 'a:plant' is already registered")
    expect(error.context).toMatchObject({ code: 'ENTITY_ALREADY_REGISTERED', key: 'a:plant' })
    expect(log.error).toHaveBeenCalledWith(`[ModLifecycle] ${error.message}`)
  })

  test('a failed load leaves the stores sealed', () => {
    const { lifecycle } = setup()
    thrownBy(() => lifecycle.load([mod('a', { data: ["throw new Error('bad')"] })]))

    expect(lifecycle.registry.isSealed).toBe(true)
    expect(lifecycle.prototypes.isSealed).toBe(true)
    expect(thrownBy(() => lifecycle.registry.extend('example', 'a', [{ name: 'late' }])).code).toBe(
      'PHASE_VIOLATION',
    )
    expect(thrownBy(() => lifecycle.prototypes.register('a', 'late', {})).code).toBe('PHASE_VIOLATION')
  })

  test('a host error the script catches still fails the load', () => {
    const { lifecycle, printed } = setup()

    const error = thrownBy(() =>
      lifecycle.load([
        mod('a', {
          data: [
            "data.extend('example', [{ name: 'x' }]); try { data.extend('example', [{ name: 'x' }]) } catch (e) { print('caught') }",
          ],
        }),
      ]),
    )

    expect(printed()).toEqual(['caught'])
    expect(error.code).toBe('DATA_PHASE_FAILED')
    expect(error.message).toBe("Data phase failed in mod 'a' (a/data0.js): Definition 'example.a.x' already exists")
    expect(error.context.code).toBe('DUPLICATE_DEFINITION')
    expect(lifecycle.phase).toBe('unloaded')
    expect(lifecycle.registry.table()).toEqual({})
  })

  test('skip-script drops a script whose host error was caught', () => {
    const { lifecycle } = setup({ dataErrorPolicy: 'skip-script' })

    const report = lifecycle.load([
      mod('a', {
        data: [
          "data.extend('example', [{ name: 'dropped' }]); try { data.extend('example', [{}]) } catch (e) {}",
          "data.extend('example', [{ name: 'after' }])",
        ],
      }),
    ])

    expect(report.failures).toHaveLength(1)
    expect(report.failures[0]).toMatchObject({
      script: 'a/data0.js',
      message: "example[0] requires a non-empty string 'name'",
    })
    expect(lifecycle.registry.has('example', 'a', 'dropped')).toBe(false)
    expect(lifecycle.registry.has('example', 'a', 'after')).toBe(true)
  })

  test('promise jobs of a data script finish inside the data phase', () => {
    const { lifecycle } = setup()

    const report = lifecycle.load([
      mod('a', { data: ["Promise.resolve().then(() => data.extend('example', [{ name: 'late' }]))"] }),
    ])

    expect(report.failures).toEqual([])
    expect(lifecycle.registry.has('example', 'a', 'late')).toBe(true)
  })

  test('can load again after a failed load', () => {
    const { lifecycle } = setup()
    thrownBy(() => lifecycle.load([mod('a', { data: ["throw new Error('bad')"] })]))

    const report = lifecycle.load([mod('a', { data: ["data.extend('example', [{ name: 't1' }])"] })])

    expect(report.definitions).toBe(1)
    expect(lifecycle.phase).toBe('control')
  })

  test('skip-script keeps loading and undoes only the failed script', () => {
    const { lifecycle } = setup({ dataErrorPolicy: 'skip-script' })

    const report = lifecycle.load([
      mod('a', {
        data: [
          "data.extend('example', [{ name: 'kept' }])",
          "data.extend('example', [{ name: 'dropped' }]); engine.register_entity('plant', {}); throw new Error('bad')",
          "data.extend('example', [{ name: 'after' }])",
        ],
      }),
    ])

    expect(report.failures).toHaveLength(1)
    expect(report.failures[0]).toMatchObject({ modId: 'a', script: 'a/data1.js', phase: 'data', message: 'a/data1.js: bad' })
    expect(lifecycle.registry.has('example', 'a', 'kept')).toBe(true)
    expect(lifecycle.registry.has('example', 'a', 'after')).toBe(true)
    expect(lifecycle.registry.has('example', 'a', 'dropped')).toBe(false)
    expect(lifecycle.prototypes.size).toBe(0)
    expect(lifecycle.phase).toBe('control')
  })

  test('checks the mod set before running anything', () => {
    const { lifecycle, printed } = setup()

    expect(thrownBy(() => lifecycle.load([mod('bad id', { data: ["print('ran')"] })])).code).toBe('INVALID_MOD_ID')
    expect(thrownBy(() => lifecycle.load([mod('a'), mod('a')])).code).toBe('DUPLICATE_MOD')

    const manifest: ModManifest = { name: 'B', version: '1.0.0', author: 'Test Author', dependencies: ['a'] }
    expect(thrownBy(() => lifecycle.load([mod('b', {}, manifest), mod('a')])).code).toBe('MISSING_DEPENDENCY')

    expect(printed()).toEqual([])
    expect(lifecycle.phase).toBe('unloaded')
  })

  // ==========================================================================
  // start / stop
  // ==========================================================================

  test('fires on_start in discovery order and on_stop in reverse', () => {
    const { lifecycle, printed } = setup()
    lifecycle.load([
      mod('a', { control: ["engine.on_start = () => print('start a'); engine.on_stop = () => print('stop a')"] }),
      mod('b', { control: ["engine.on_start = () => print('start b'); engine.on_stop = () => print('stop b')"] }),
    ])

    lifecycle.start()
    lifecycle.stop()

    expect(printed()).toEqual(['start a', 'start b', 'stop b', 'stop a'])
  })

  test('a failing hook is reported and siblings still run', () => {
    const { lifecycle, printed, log } = setup()
    lifecycle.load([
      mod('a', { control: ["engine.on_start = () => { throw new Error('boom') }"] }),
      mod('b', { control: ["engine.on_start = () => print('start b')"] }),
    ])

    const failures = lifecycle.start()

    expect(failures).toHaveLength(1)
    expect(failures[0]).toMatchObject({ modId: 'a', hook: 'on_start', message: 'boom' })
    expect(printed()).toEqual(['start b'])
    expect(log.error).toHaveBeenCalledWith("[ModLifecycle] on_start of mod 'a' failed: boom")
  })

  test('a hook that returns a promise is reported and siblings still run', () => {
    const { lifecycle, printed } = setup()
    lifecycle.load([
      mod('a', { control: ["engine.on_start = () => Promise.reject(new Error('boom'))"] }),
      mod('b', { control: ["engine.on_start = () => print('start b')"] }),
    ])

    const failures = lifecycle.start()

    expect(failures).toHaveLength(1)
    expect(failures[0]).toMatchObject({
      modId: 'a',
      hook: 'on_start',
      message: 'on_start returned a promise; hooks must be synchronous',
    })
    expect(printed()).toEqual(['start b'])
  })

  test('an async hook is refused when the control script installs it', () => {
    const { lifecycle } = setup()

    const report = lifecycle.load([mod('a', { control: ["engine.on_start = async () => { throw new Error('boom') }"] })])

    expect(report.failures).toHaveLength(1)
    expect(report.failures[0]).toMatchObject({
      modId: 'a',
      phase: 'control',
      message: 'on_start must be a synchronous function',
    })
    expect(lifecycle.start()).toEqual([])
  })

  test('a hook that runs past the timeout is stopped and reported', () => {
    const { lifecycle, printed } = setup({ scriptTimeoutMs: 50 })
    lifecycle.load([
      mod('a', { control: ['engine.on_start = () => { while (true) {} }'] }),
      mod('b', { control: ["engine.on_start = () => print('start b')"] }),
    ])

    const failures = lifecycle.start()

    expect(failures).toHaveLength(1)
    expect(failures[0]?.modId).toBe('a')
    expect(failures[0]?.message).toContain('timed out')
    expect(printed()).toEqual(['start b'])
    expect(lifecycle.phase).toBe('running')
  })

  test('a hook cannot install hooks while running', () => {
    const { lifecycle } = setup()
    lifecycle.load([mod('a', { control: ['engine.on_start = () => { engine.on_stop = () => {} }'] })])

    const [failure] = lifecycle.start()

    expect(failure?.message).toBe("Mod 'a' cannot set on_stop during the running phase")
  })

  test('a hook may read the registry', () => {
    const { lifecycle, printed } = setup()
    lifecycle.load([
      mod('a', {
        data: ["data.extend('example', [{ name: 't1', hp: 7 }])"],
        control: ["engine.on_start = () => print(data.lookup('example', 'a', 't1').hp)"],
      }),
    ])

    lifecycle.start()

    expect(printed()).toEqual([7])
  })

  test('passes extensions to every mod', () => {
    const seen: string[] = []
    const { lifecycle } = setup({
      extensions: {
        game: (modId) => ({ hello: () => seen.push(modId) }),
      },
    })

    lifecycle.load([mod('a', { control: ['game.hello()'] }), mod('b', { data: ['game.hello()'] })])

    expect(seen).toEqual(['b', 'a'])
  })

  test('exposes the configured version', () => {
    const { lifecycle, printed } = setup({ version: '9.9.9' })
    lifecycle.load([mod('a', { data: ['print(engine.version)'] })])
    expect(printed()).toEqual(['9.9.9'])
  })
})
