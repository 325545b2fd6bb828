/**
 * Kuhn–Munkres (Hungarian) assignment with row and column potentials,
 * O(n²·m) for an n×m cost matrix with n <= m.
 *
 * Scores are turned into costs with `1 - score`, so minimising the cost
 * maximises the total score. Every row of the smaller dimension gets a
 * partner: the result has `min(P, O)` pairs, including pairs whose score
 * is 0.
 */

import type { AssignedPair, ScoreMatrix } from '../types.ts';

import type { AssignmentStrategy } from './AssignmentStrategy.ts';

/**
 * Minimum cost assignment of every row to a distinct column.
 * @param cost - n×m cost matrix with n <= m.
 * @returns For each row, the index of its column.
 */
function minimumCostRows(cost: number[][]): number[] {
  const n = cost.length;
  const m = cost[0].length;
  const rowPotential = new Array<number>(n + 1).fill(0);
  const columnPotential = new Array<number>(m + 1).fill(0);
  // 1-based row owning each column, 0 when free; column 0 is a sentinel.
  const owner = new Array<number>(m + 1).fill(0);
  const previous = new Array<number>(m + 1).fill(0);

  for (let row = 1; row <= n; row++) {
    owner[0] = row;
    let column = 0;
    const slack = new Array<number>(m + 1).fill(Number.POSITIVE_INFINITY);
    const visited = new Array<boolean>(m + 1).fill(false);

    do {
      visited[column] = true;
      const currentRow = owner[column];
      let delta = Number.POSITIVE_INFINITY;
      let nextColumn = 0;
      for (let j = 1; j <= m; j++) {
        if (visited[j]) continue;
        const reduced =
          cost[currentRow - 1][j - 1] -
          rowPotential[currentRow] -
          columnPotential[j];
        if (reduced < slack[j]) {
          slack[j] = reduced;
          previous[j] = column;
        }
        if (slack[j] < delta) {
          delta = slack[j];
          nextColumn = j;
        }
      }
      for (let j = 0; j <= m; j++) {
        if (visited[j]) {
          rowPotential[owner[j]] += delta;
          columnPotential[j] -= delta;
        } else {
          slack[j] -= delta;
        }
      }
      column = nextColumn;
    } while (owner[column] !== 0);

    // Flip the augmenting path back to the sentinel.
    do {
      const before = previous[column];
      owner[column] = owner[before];
      column = before;
    } while (column !== 0);
  }

  const columnOfRow = new Array<number>(n).fill(-1);
  for (let j = 1; j <= m; j++) {
    if (owner[j] !== 0) columnOfRow[owner[j] - 1] = j - 1;
  }
  return columnOfRow;
}

function transpose(matrix: number[][]): number[][] {
  return matrix[0].map((_, j) => matrix.map((row) => row[j]));
}

/** Exact maximum-score assignment. */
export const hungarianStrategy: AssignmentStrategy = {
  name: 'hungarian',
  optimal: true,
  solve(matrix: ScoreMatrix): AssignedPair[] {
    const cost = matrix.map((row) => row.map((score) => 1 - score));
    const rows = matrix.length;
    const columns = matrix[0].length;

    const pairs: AssignedPair[] = [];
    if (rows <= columns) {
      for (const [i, j] of minimumCostRows(cost).entries()) {
        pairs.push({ predictedIndex: i, observedIndex: j, score: matrix[i][j] });
      }
    } else {
      for (const [j, i] of minimumCostRows(transpose(cost)).entries()) {
        pairs.push({ predictedIndex: i, observedIndex: j, score: matrix[i][j] });
      }
    }
    return pairs.toSorted((a, b) => a.predictedIndex - b.predictedIndex);
  },
};
