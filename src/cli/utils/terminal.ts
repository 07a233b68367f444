/**
 * Terminal Utilities for CLI Output
 *
 * Command results go to stdout as JSON; diagnostics go to stderr, coloured
 * with ANSI escape codes. In non-TTY environments the codes pass through
 * harmlessly.
 *
 * Usage:
 * ```typescript
 * import { formatJson, red } from './terminal';
 *
 * console.log(formatJson({ itemId: 'mem_1' }));
 * console.error(red('Error: item not found'));
 * ```
 */

// =============================================================================
// Text Styles
// =============================================================================

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/** De-emphasised text such as hints and stack traces */
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

// =============================================================================
// Output Formatting
// =============================================================================

/**
 * Pretty-printed JSON. Dates serialise as ISO-8601 strings.
 */
export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
