import type { ObservedRecord } from '../types.ts';

import type { CompoundMatchReport } from './assembleResult.ts';

/** An observed peak with the compound it was assigned to, if any. */
export interface AnnotatedPeak extends ObservedRecord {
  index: number;
  /** 1-based position of the matched predicted record, `null` if unmatched. */
  compoundId: number | null;
  /** Label of the matched predicted record. */
  label: string | null;
  score: number | null;
}

/**
 * List every observed peak in input order, labelled with its compound.
 * Peaks without a partner keep `null` fields so that later processing can
 * ignore them.
 * @param report - Assembled match report.
 */
export function annotatePeaks(report: CompoundMatchReport): AnnotatedPeak[] {
  const peaks: AnnotatedPeak[] = [
    ...report.matches.map((match) => ({
      ...match.observed,
      index: match.observedIndex,
      compoundId: match.predictedIndex + 1,
      label: match.predicted.label,
      score: match.score,
    })),
    ...report.unmatchedObserved.map(({ index, record }) => ({
      ...record,
      index,
      compoundId: null,
      label: null,
      score: null,
    })),
  ];
  return peaks.toSorted((a, b) => a.index - b.index);
}
