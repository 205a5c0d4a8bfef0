/**
 * Structured logger interface.
 *
 * Compatible with pino, winston, console, and any logger that exposes
 * `debug`, `info`, `warn` and `error` methods taking printf-style arguments.
 */
export interface Logger {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

const noop = () => {}

/** Default logger: discards everything. */
export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
}
