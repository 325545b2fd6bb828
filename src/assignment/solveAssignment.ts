import { InvalidConfigurationError } from '../errors.ts';
import type { AssignmentResult, ScoreMatrix } from '../types.ts';

import type { AssignmentStrategy } from './AssignmentStrategy.ts';
import { greedyStrategy } from './greedyStrategy.ts';
import { hungarianStrategy } from './hungarianStrategy.ts';

/** `exact` is the Hungarian algorithm, `greedy` the degraded fallback. */
export type SolverName = 'exact' | 'greedy';

const strategies: Record<SolverName, AssignmentStrategy> = {
  exact: hungarianStrategy,
  greedy: greedyStrategy,
};

/**
 * Look up a strategy by solver name.
 * @param solver - Solver name.
 * @throws {InvalidConfigurationError} For an unknown name.
 */
export function getAssignmentStrategy(solver: SolverName): AssignmentStrategy {
  if (!Object.hasOwn(strategies, solver)) {
    throw new InvalidConfigurationError(
      'solver',
      `Unknown solver "${String(solver)}", expected "exact" or "greedy"`,
    );
  }
  return strategies[solver];
}

function assertRectangular(matrix: ScoreMatrix): void {
  const columns = matrix[0]?.length ?? 0;
  for (const [i, row] of matrix.entries()) {
    if (row.length !== columns) {
      throw new RangeError(
        `Score matrix row ${String(i)} has ${String(row.length)} columns, expected ${String(columns)}`,
      );
    }
    if (!row.every((value) => Number.isFinite(value))) {
      throw new RangeError(`Score matrix row ${String(i)} has a non-finite value`);
    }
  }
}

/**
 * Match rows to columns so that the sum of the matched scores is maximal
 * (or, with a degraded strategy, large).
 *
 * An empty matrix gives an empty result with a total of 0. When the matrix
 * is not square the records left over on the larger side have no partner.
 * @param matrix - Score matrix, rows are predicted records.
 * @param strategy - Strategy to use, Hungarian by default.
 */
export function solveAssignment(
  matrix: ScoreMatrix,
  strategy: AssignmentStrategy = hungarianStrategy,
): AssignmentResult {
  assertRectangular(matrix);
  const isEmpty = matrix.length === 0 || matrix[0].length === 0;
  const pairs = isEmpty ? [] : strategy.solve(matrix);
  const totalScore = pairs.reduce((sum, pair) => sum + pair.score, 0);

  return {
    pairs,
    totalScore,
    matrix,
    strategy: strategy.name,
    degraded: !strategy.optimal,
  };
}
