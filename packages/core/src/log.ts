/**
 * Log sink used by the mod host. Defaults to `console`; tests pass a
 * capturing stand-in.
 */
export type ModLog = Pick<Console, 'log' | 'warn' | 'error'>
