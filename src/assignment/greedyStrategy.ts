import type { AssignedPair, ScoreMatrix } from '../types.ts';

import type { AssignmentStrategy } from './AssignmentStrategy.ts';

/**
 * Degraded matching: repeatedly take the best remaining cell and retire its
 * row and column. Stops at the first best cell that is <= 0.
 *
 * Equal scores are taken in row-major order (lowest row, then lowest
 * column). Pairs are returned in the order they were picked. The total is
 * not guaranteed to be optimal.
 */
export const greedyStrategy: AssignmentStrategy = {
  name: 'greedy',
  optimal: false,
  solve(matrix: ScoreMatrix): AssignedPair[] {
    const rows = matrix.length;
    const columns = matrix[0].length;
    const rowOpen = new Array<boolean>(rows).fill(true);
    const columnOpen = new Array<boolean>(columns).fill(true);
    const limit = Math.min(rows, columns);

    const pairs: AssignedPair[] = [];
    while (pairs.length < limit) {
      let bestRow = -1;
      let bestColumn = -1;
      let best = Number.NEGATIVE_INFINITY;
      for (let i = 0; i < rows; i++) {
        if (!rowOpen[i]) continue;
        for (let j = 0; j < columns; j++) {
          if (columnOpen[j] && matrix[i][j] > best) {
            best = matrix[i][j];
            bestRow = i;
            bestColumn = j;
          }
        }
      }
      if (bestRow === -1 || best <= 0) break;

      pairs.push({ predictedIndex: bestRow, observedIndex: bestColumn, score: best });
      rowOpen[bestRow] = false;
      columnOpen[bestColumn] = false;
    }
    return pairs;
  },
};
