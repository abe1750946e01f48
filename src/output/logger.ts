/**
 * Progress output sink. `console` satisfies it; tests pass a silent one.
 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

/**
 * Keeps progress lines on stderr so stdout carries only the JSON result.
 */
export const stderrLogger: Logger = {
  log: (...args: unknown[]) => console.error(...args),
  warn: (...args: unknown[]) => console.warn(...args),
  error: (...args: unknown[]) => console.error(...args)
};
