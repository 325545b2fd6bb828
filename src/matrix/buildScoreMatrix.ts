/**
 * Aggregate score of every (predicted, observed) pair.
 *
 * A channel is evaluated for a pair only when both records carry its data.
 * The cell is the weighted mean over the evaluated channels, so the
 * denominator changes from cell to cell: a missing retention time removes
 * the `rt` weight from that cell instead of counting as a zero score.
 */

import type { RecordSide } from '../errors.ts';
import { MalformedRecordError } from '../errors.ts';
import type { ProximityScorer } from '../scoring/proximity.ts';
import { createProximityScorer } from '../scoring/proximity.ts';
import { cosineSimilarityAligned } from '../scoring/spectralSimilarity.ts';
import type {
  Channel,
  MassSpectrum,
  MassTolerance,
  ObservedRecord,
  PredictedRecord,
  ScoreMatrix,
} from '../types.ts';

import type { ScoringOptions } from './resolveScoringOptions.ts';
import { resolveScoringOptions } from './resolveScoringOptions.ts';

/** Everything needed to score one pair, built once per matrix. */
export interface ScoringContext {
  weights: Record<Channel, number>;
  tolerance: MassTolerance;
  rt: ProximityScorer;
  lmax: ProximityScorer;
}

/** Aggregate score of a pair and the channel scores it was built from. */
export interface PairScore {
  score: number;
  /** Only the channels that were evaluated for this pair. */
  channels: Partial<Record<Channel, number>>;
}

/**
 * Validate options and bind the channel scorers.
 * @param options - Scoring options.
 * @returns A context for {@link scorePair}.
 */
export function createScoringContext(options?: ScoringOptions): ScoringContext {
  const { weights, tolerance, rtSigma, lmaxSigma } =
    resolveScoringOptions(options);
  return {
    weights,
    tolerance,
    rt: createProximityScorer(rtSigma),
    lmax: createProximityScorer(lmaxSigma),
  };
}

function hasPeaks(spectrum: MassSpectrum | undefined): spectrum is MassSpectrum {
  return spectrum !== undefined && spectrum.x.length > 0;
}

/**
 * Score one pair of records.
 * @param predicted - Predicted record.
 * @param observed - Observed record.
 * @param context - Scoring context.
 */
export function scorePair(
  predicted: PredictedRecord,
  observed: ObservedRecord,
  context: ScoringContext,
): PairScore {
  const { weights } = context;
  const channels: Partial<Record<Channel, number>> = {};
  let weightedSum = 0;
  let weightTotal = 0;

  if (hasPeaks(predicted.spectrum) && hasPeaks(observed.spectrum)) {
    const ms = cosineSimilarityAligned(
      predicted.spectrum,
      observed.spectrum,
      context.tolerance,
    );
    channels.ms = ms;
    weightedSum += weights.ms * ms;
    weightTotal += weights.ms;
  }
  if (predicted.rt !== undefined && observed.rt !== undefined) {
    const rt = context.rt(predicted.rt, observed.rt);
    channels.rt = rt;
    weightedSum += weights.rt * rt;
    weightTotal += weights.rt;
  }
  if (predicted.lmax !== undefined && observed.lmax !== undefined) {
    const lmax = context.lmax(predicted.lmax, observed.lmax);
    channels.lmax = lmax;
    weightedSum += weights.lmax * lmax;
    weightTotal += weights.lmax;
  }

  const score =
    weightTotal > 0 ? Math.min(1, Math.max(0, weightedSum / weightTotal)) : 0;
  return { score, channels };
}

/**
 * Check the structure of a record before any scoring.
 * @param record - Predicted or observed record.
 * @param side - Which input list the record comes from.
 * @param index - Position of the record in its list.
 * @throws {MalformedRecordError} If the spectrum arrays differ in length or
 * a numeric field is not finite.
 */
export function validateRecord(
  record: PredictedRecord | ObservedRecord,
  side: RecordSide,
  index: number,
): void {
  const { spectrum, rt, lmax } = record;
  if (spectrum) {
    if (spectrum.x.length !== spectrum.y.length) {
      throw new MalformedRecordError(
        side,
        index,
        `spectrum has ${String(spectrum.x.length)} m/z values but ${String(spectrum.y.length)} intensities`,
      );
    }
    if (!spectrum.x.every((mass) => Number.isFinite(mass))) {
      throw new MalformedRecordError(side, index, 'spectrum has a non-finite m/z');
    }
    if (!spectrum.y.every((intensity) => Number.isFinite(intensity))) {
      throw new MalformedRecordError(
        side,
        index,
        'spectrum has a non-finite intensity',
      );
    }
  }
  if (rt !== undefined && !Number.isFinite(rt)) {
    throw new MalformedRecordError(side, index, `retention time ${String(rt)} is not finite`);
  }
  if (lmax !== undefined && !Number.isFinite(lmax)) {
    throw new MalformedRecordError(side, index, `absorption maximum ${String(lmax)} is not finite`);
  }
}

/**
 * Build the P×O aggregate score matrix.
 *
 * Options and records are all checked before the first cell is computed.
 * @param predicted - Predicted records (rows).
 * @param observed - Observed records (columns).
 * @param options - Weights, tolerance and kernel widths.
 * @returns The score matrix; every cell is in [0, 1].
 */
export function buildScoreMatrix(
  predicted: PredictedRecord[],
  observed: ObservedRecord[],
  options?: ScoringOptions,
): ScoreMatrix {
  const context = createScoringContext(options);
  for (const [index, record] of predicted.entries()) {
    validateRecord(record, 'predicted', index);
  }
  for (const [index, record] of observed.entries()) {
    validateRecord(record, 'observed', index);
  }

  return predicted.map((row) =>
    observed.map((column) => scorePair(row, column, context).score),
  );
}
