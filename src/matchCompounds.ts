/**
 * Match predicted reaction products to observed chromatographic peaks.
 *
 * Scores every (predicted, observed) pair on the MS, retention time and
 * absorption maximum channels, solves the one-to-one assignment and joins
 * the result back to the records.
 */

import type { SolverName } from './assignment/solveAssignment.ts';
import {
  getAssignmentStrategy,
  solveAssignment,
} from './assignment/solveAssignment.ts';
import { InvalidConfigurationError } from './errors.ts';
import { buildScoreMatrix } from './matrix/buildScoreMatrix.ts';
import type { ScoringOptions } from './matrix/resolveScoringOptions.ts';
import type { CompoundMatchReport } from './result/assembleResult.ts';
import { assembleResult } from './result/assembleResult.ts';
import type { ObservedRecord, PredictedRecord } from './types.ts';

export interface MatchOptions extends ScoringOptions {
  /** Assignment solver (default `exact`). */
  solver?: SolverName;
  /** Matches below this score are reported as unmatched (default 0). */
  minScore?: number;
}

/**
 * Run the whole matching for one reaction.
 * @param predicted - Candidate products.
 * @param observed - Peaks of the LC-MS run.
 * @param options - Scoring and solver options.
 * @returns Matches, unmatched records, total score and the score matrix.
 */
export function matchCompounds(
  predicted: PredictedRecord[],
  observed: ObservedRecord[],
  options: MatchOptions = {},
): CompoundMatchReport {
  const { solver = 'exact', minScore = 0, ...scoringOptions } = options;

  const strategy = getAssignmentStrategy(solver);
  if (!Number.isFinite(minScore)) {
    throw new InvalidConfigurationError(
      'minScore',
      `minScore must be a finite number, got ${String(minScore)}`,
    );
  }

  const matrix = buildScoreMatrix(predicted, observed, scoringOptions);
  const assignment = solveAssignment(matrix, strategy);
  return assembleResult(predicted, observed, assignment, { minScore });
}
