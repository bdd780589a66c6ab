/**
 * TUI Theme
 *
 * Shared colors and styling constants for the init-secret CLI.
 * Uses picocolors for zero-dep, fast terminal color output.
 */

import pc from 'picocolors';

export const theme = {
  /** Brand color, used for the banner */
  brand: (text: string) => pc.cyan(text),
  /** Error messages */
  error: (text: string) => pc.red(text),
  /** Muted / secondary text */
  dim: (text: string) => pc.dim(text),
  /** Command references in help text */
  cmd: (text: string) => pc.bold(pc.cyan(text)),
  /** Section label */
  label: (text: string) => pc.bold(pc.white(text)),
} as const;
