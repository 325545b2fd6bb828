import type { AssignedPair, ScoreMatrix } from '../types.ts';

/**
 * A way of turning a score matrix into a one-to-one matching.
 *
 * `solve` receives a non-empty rectangular matrix and returns pairs in
 * which no row and no column appears twice.
 */
export interface AssignmentStrategy {
  readonly name: string;
  /** `false` for heuristics whose total may be below the optimum. */
  readonly optimal: boolean;
  solve(matrix: ScoreMatrix): AssignedPair[];
}
