/**
 * Assign predicted reaction products to the peaks of an LC-MS run.
 *
 * Reads a JSON file with predicted and observed records (see
 * `utils/loader/loadInput.ts`), matches them and writes to
 * `results/{input name}/`:
 * - `summary.txt` — one row per observed peak with its compound, the
 *   channel scores and the aggregate score, followed by the unmatched
 *   predicted products.
 * - `assignments.tsv` — the matched pairs.
 * - `matrix.tsv` — the full score matrix.
 *
 * Usage:
 *   npx tsx src/reconcile/script.ts [input.json]
 *
 * Without argument the bundled `data/methylSalicylate.json` is used.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import process from 'node:process';

import { getCompoundInfo } from '../compound/getCompoundInfo.ts';
import { matchCompounds } from '../matchCompounds.ts';
import { createScoringContext, scorePair } from '../matrix/buildScoreMatrix.ts';
import { annotatePeaks } from '../result/annotatePeaks.ts';
import {
  compareSpectra,
  createSpectrumComparator,
} from '../scoring/spectrumComparator.ts';
import type { Channel } from '../types.ts';

import {
  formatTable,
  loadInput,
  sanitize,
  scoreMatrixToTsv,
  toTsv,
} from './utils/index.ts';

// ── Timing helper ───────────────────────────────────────────────────────
const t0 = performance.now();
const elapsed = () => `${((performance.now() - t0) / 1000).toFixed(2)}s`;

const formatOptional = (value: number | null | undefined, digits: number) =>
  value === null || value === undefined ? '' : value.toFixed(digits);

// ── Load input ──────────────────────────────────────────────────────────
const inputPath =
  process.argv[2] ?? join(import.meta.dirname, 'data', 'methylSalicylate.json');
console.log(`Loading ${inputPath}…`);
const { predicted, observed, options } = await loadInput(inputPath);
console.log(
  `  ${String(predicted.length)} predicted, ${String(observed.length)} observed  [${elapsed()}]`,
);

const resultsDir = join(
  import.meta.dirname,
  'results',
  sanitize(basename(inputPath).replace(/\.json$/i, '')),
);
await mkdir(resultsDir, { recursive: true });

// ── Match ───────────────────────────────────────────────────────────────
const report = matchCompounds(predicted, observed, options);
const { assignment } = report;
console.log(
  `Solved with ${assignment.strategy}${assignment.degraded ? ' (degraded, not guaranteed optimal)' : ''}: ${String(report.matches.length)} matches, total ${report.totalScore.toFixed(4)}  [${elapsed()}]`,
);

// ── Per-channel audit of the matches ────────────────────────────────────
const context = createScoringContext(options);
const comparator = createSpectrumComparator({ tolerance: context.tolerance });

const labelInfo = new Map(
  predicted.map((record) => {
    try {
      return [record.label, getCompoundInfo(record.label).formula] as const;
    } catch (error) {
      console.warn(`  ${record.label}: ${String(error)}`);
      return [record.label, ''] as const;
    }
  }),
);

const summaryHeaders = [
  'peak',
  'rt',
  'lmax',
  'compound',
  'label',
  'formula',
  'ms',
  'common',
  'rtScore',
  'lmaxScore',
  'score',
];
const summaryRows = annotatePeaks(report).map((peak) => {
  const match = report.matches.find((m) => m.observedIndex === peak.index);
  const channels: Partial<Record<Channel, number>> = match
    ? scorePair(match.predicted, match.observed, context).channels
    : {};
  const predictedSpectrum = match?.predicted.spectrum;
  const observedSpectrum = match?.observed.spectrum;
  const comparison =
    predictedSpectrum?.x.length && observedSpectrum?.x.length
      ? compareSpectra(comparator, predictedSpectrum, observedSpectrum)
      : undefined;
  return [
    String(peak.index),
    formatOptional(peak.rt, 2),
    formatOptional(peak.lmax, 0),
    peak.compoundId === null ? '' : String(peak.compoundId),
    peak.label ?? '',
    peak.label === null ? '' : (labelInfo.get(peak.label) ?? ''),
    formatOptional(channels.ms, 4),
    comparison ? String(comparison.nbCommonPeaks) : '',
    formatOptional(channels.rt, 4),
    formatOptional(channels.lmax, 4),
    formatOptional(peak.score, 6),
  ];
});

const unmatchedRows = report.unmatchedPredicted.map(({ index, record }) => [
  String(index + 1),
  record.label,
  formatOptional(record.rt, 2),
  formatOptional(record.lmax, 0),
]);

const summaryContent = [
  `Input: ${inputPath}`,
  `Solver: ${assignment.strategy}${assignment.degraded ? ' (degraded)' : ''}`,
  `Total score: ${report.totalScore.toFixed(6)}`,
  '',
  formatTable(summaryHeaders, summaryRows, [0, 1, 2, 3, 6, 7, 8, 9, 10]),
  '',
  'Unmatched predicted products:',
  unmatchedRows.length > 0
    ? formatTable(['compound', 'label', 'rt', 'lmax'], unmatchedRows, [0, 2, 3])
    : '  none',
  '',
].join('\n');

const assignmentsContent = toTsv(
  ['compound', 'label', 'peak', 'score'],
  report.matches.map((m) => [
    m.predictedIndex + 1,
    m.predicted.label,
    m.observedIndex,
    m.score.toFixed(6),
  ]),
);
const matrixContent = scoreMatrixToTsv(
  assignment.matrix,
  predicted.map((record) => record.label),
);

await Promise.all([
  writeFile(join(resultsDir, 'summary.txt'), summaryContent, 'utf8'),
  writeFile(join(resultsDir, 'assignments.tsv'), assignmentsContent, 'utf8'),
  writeFile(join(resultsDir, 'matrix.tsv'), matrixContent, 'utf8'),
]);

console.log(`\n${summaryContent}`);
console.log(`All results written to ${resultsDir}  [${elapsed()}]`);
