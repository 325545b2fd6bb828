import type {
  AssignmentResult,
  ObservedRecord,
  PredictedRecord,
} from '../types.ts';

/** A predicted record matched to an observed peak. */
export interface MatchedCompound {
  predictedIndex: number;
  observedIndex: number;
  score: number;
  predicted: PredictedRecord;
  observed: ObservedRecord;
}

/** A record for which no partner was identified. */
export interface UnmatchedRecord<T> {
  index: number;
  record: T;
}

export interface CompoundMatchReport {
  /** Matches in ascending predicted index. */
  matches: MatchedCompound[];
  unmatchedPredicted: Array<UnmatchedRecord<PredictedRecord>>;
  unmatchedObserved: Array<UnmatchedRecord<ObservedRecord>>;
  /** Sum of the scores of `matches`. */
  totalScore: number;
  /** The assignment the report was built from, with its score matrix. */
  assignment: AssignmentResult;
}

export interface AssembleOptions {
  /**
   * Pairs scoring below this value are reported as unmatched on both sides
   * (default 0, every pair is kept).
   */
  minScore?: number;
}

/**
 * Join an assignment back to the records it was computed from.
 * @param predicted - Predicted records, in matrix row order.
 * @param observed - Observed records, in matrix column order.
 * @param assignment - Result of the solver.
 * @param options - Assembly options.
 */
export function assembleResult(
  predicted: PredictedRecord[],
  observed: ObservedRecord[],
  assignment: AssignmentResult,
  options: AssembleOptions = {},
): CompoundMatchReport {
  const { minScore = 0 } = options;

  const matches = assignment.pairs
    .filter((pair) => pair.score >= minScore)
    .map(
      (pair): MatchedCompound => ({
        ...pair,
        predicted: predicted[pair.predictedIndex],
        observed: observed[pair.observedIndex],
      }),
    )
    .toSorted((a, b) => a.predictedIndex - b.predictedIndex);

  const matchedPredicted = new Set(matches.map((match) => match.predictedIndex));
  const matchedObserved = new Set(matches.map((match) => match.observedIndex));

  return {
    matches,
    unmatchedPredicted: predicted
      .map((record, index) => ({ index, record }))
      .filter(({ index }) => !matchedPredicted.has(index)),
    unmatchedObserved: observed
      .map((record, index) => ({ index, record }))
      .filter(({ index }) => !matchedObserved.has(index)),
    totalScore: matches.reduce((sum, match) => sum + match.score, 0),
    assignment,
  };
}
