/**
 * Format tabular data as a bordered text table.
 *
 * Example output:
 * ```
 * ┌───────┬──────────┐
 * │ peak  │    score │
 * ├───────┼──────────┤
 * │ 0     │ 0.999800 │
 * └───────┴──────────┘
 * ```
 * @param headers - Column header labels.
 * @param rows - Array of row arrays (each row has the same length as headers).
 * @param alignRight - Indices of the columns to right-align, e.g. numbers.
 * @returns The formatted table as a multi-line string.
 */
export function formatTable(
  headers: string[],
  rows: string[][],
  alignRight: number[] = [],
): string {
  const widths = headers.map((h, col) =>
    Math.max(h.length, ...rows.map((row) => (row[col] ?? '').length)),
  );
  const rightAligned = new Set(alignRight);

  const pad = (text: string, col: number): string =>
    rightAligned.has(col)
      ? text.padStart(widths[col] ?? 0)
      : text.padEnd(widths[col] ?? 0);

  const border = (left: string, middle: string, right: string): string =>
    `${left}${widths.map((w) => '─'.repeat(w + 2)).join(middle)}${right}`;

  const formatRow = (cells: string[]): string =>
    `│ ${headers.map((_, col) => pad(cells[col] ?? '', col)).join(' │ ')} │`;

  return [
    border('┌', '┬', '┐'),
    formatRow(headers),
    border('├', '┼', '┤'),
    ...rows.map((row) => formatRow(row)),
    border('└', '┴', '┘'),
  ].join('\n');
}
