import PapaParse from 'papaparse';

import type { ScoreMatrix } from '../../../types.ts';

const { unparse } = PapaParse;

/**
 * Serialize rows as tab-separated values with a header line.
 * @param fields - Column names.
 * @param rows - Cell values, one array per row.
 */
export function toTsv(
  fields: string[],
  rows: Array<Array<string | number>>,
): string {
  return unparse({ fields, data: rows }, { delimiter: '\t', newline: '\n' });
}

/**
 * Serialize a score matrix, one line per predicted record.
 * @param matrix - Score matrix.
 * @param rowLabels - Label of each predicted record.
 * @param digits - Number of decimals.
 */
export function scoreMatrixToTsv(
  matrix: ScoreMatrix,
  rowLabels: string[],
  digits = 6,
): string {
  const columns = matrix[0]?.length ?? 0;
  const fields = [
    'predicted',
    ...Array.from({ length: columns }, (_, j) => `peak_${String(j)}`),
  ];
  const rows = matrix.map((row, i) => [
    rowLabels[i] ?? String(i),
    ...row.map((score) => score.toFixed(digits)),
  ]);
  return toTsv(fields, rows);
}
