import { LogEngine, LogMode } from '@wgtechlabs/log-engine';

// Local time only; the CLI sets the mode per invocation
LogEngine.configure({
  mode: LogMode.INFO,
  format: {
    includeIsoTimestamp: false,
    includeLocalTime: true,
  },
});

// ---------------------------------------------------------------------------
// Runtime log-mode switching
// ---------------------------------------------------------------------------

/** Human-readable log level names the CLI can use. */
export const LOG_MODES = {
  debug: LogMode.DEBUG,
  info: LogMode.INFO,
  warn: LogMode.WARN,
  error: LogMode.ERROR,
  silent: LogMode.SILENT,
  off: LogMode.OFF,
} as const;

export type LogModeName = keyof typeof LOG_MODES;

/**
 * Change the active log level at runtime.
 *
 * Accepts either a human-readable name ("debug", "info", …) or a
 * numeric `LogMode` value.
 */
export function setLogMode(level: LogModeName | LogMode): void {
  const mode = typeof level === 'string' ? LOG_MODES[level] : level;
  LogEngine.configure({ mode });
}

export const logger = LogEngine;
export { LogMode };
