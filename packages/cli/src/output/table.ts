/**
 * Table output format — aligned columns for terminal output.
 */

export type TableRow = Record<string, string | number>;

/**
 * Render rows as a table. Columns come from the first row's keys.
 */
export function formatTable(rows: readonly TableRow[]): string {
  const [first] = rows;
  if (!first) return 'No results.\n';

  const keys = Object.keys(first);
  const widths = keys.map((k) =>
    Math.max(k.length, ...rows.map((r) => formatCellValue(r[k]).length)),
  );

  const lines: string[] = [];

  // Header
  lines.push(keys.map((k, i) => k.padEnd(widths[i] ?? 0)).join('  ').trimEnd());
  lines.push(widths.map((w) => '─'.repeat(w)).join('──'));

  for (const row of rows) {
    const line = keys
      .map((k, i) => formatCellValue(row[k]).padEnd(widths[i] ?? 0))
      .join('  ');
    lines.push(line.trimEnd());
  }

  return lines.join('\n') + '\n';
}

function formatCellValue(v: string | number | undefined): string {
  if (v === undefined) return '';
  return String(v);
}
