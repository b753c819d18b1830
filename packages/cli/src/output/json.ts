/**
 * JSON output format — machine-readable run report.
 */

/**
 * Format data as pretty-printed JSON.
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2) + '\n';
}
