/**
 * Logging contract for engine components.
 *
 * Components log through the subset of `Console` below, prefixing each
 * line with their bracketed tag (e.g. `[KlondikeGame]`). The global
 * `console` satisfies it; tests inject spies.
 */
export type GameLogger = Pick<Console, 'debug' | 'info' | 'warn'>;

/**
 * A logger that writes `[tag] message` lines, dropping debug and info
 * output unless `verbose` is set. Warnings always pass through.
 */
export function createTaggedLogger(
  tag: string,
  target: GameLogger = console,
  verbose: boolean = false,
): GameLogger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args: unknown[]) => {
      if (verbose) target.debug(prefix, ...args);
    },
    info: (...args: unknown[]) => {
      if (verbose) target.info(prefix, ...args);
    },
    warn: (...args: unknown[]) => target.warn(prefix, ...args),
  };
}
