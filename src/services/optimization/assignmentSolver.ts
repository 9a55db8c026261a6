import { DistanceMatrix } from '../../interfaces/Route';

/**
 * Minimum-weight perfect matching on a square cost matrix
 * (Hungarian algorithm with row/column potentials, shortest augmenting paths)
 *
 * Time Complexity: O(n³)
 *
 * @returns assignment[row] = column, a bijection on [0, n)
 */
export function solveAssignment(cost: DistanceMatrix): number[] {
  const n = cost.length;

  // 1-indexed; index 0 is the virtual column used to start each augmentation
  const u = new Array<number>(n + 1).fill(0);
  const v = new Array<number>(n + 1).fill(0);
  const rowOfColumn = new Array<number>(n + 1).fill(0);
  const way = new Array<number>(n + 1).fill(0);

  for (let row = 1; row <= n; row++) {
    rowOfColumn[0] = row;
    let column = 0;
    const minSlack = new Array<number>(n + 1).fill(Infinity);
    const used = new Array<boolean>(n + 1).fill(false);

    do {
      used[column] = true;
      const currentRow = rowOfColumn[column];
      let delta = Infinity;
      let nextColumn = 0;

      for (let j = 1; j <= n; j++) {
        if (used[j]) continue;

        const reduced = cost[currentRow - 1][j - 1] - u[currentRow] - v[j];
        if (reduced < minSlack[j]) {
          minSlack[j] = reduced;
          way[j] = column;
        }
        if (minSlack[j] < delta) {
          delta = minSlack[j];
          nextColumn = j;
        }
      }

      for (let j = 0; j <= n; j++) {
        if (used[j]) {
          u[rowOfColumn[j]] += delta;
          v[j] -= delta;
        } else {
          minSlack[j] -= delta;
        }
      }

      column = nextColumn;
    } while (rowOfColumn[column] !== 0);

    // Flip the augmenting path
    do {
      const previous = way[column];
      rowOfColumn[column] = rowOfColumn[previous];
      column = previous;
    } while (column !== 0);
  }

  const assignment = new Array<number>(n).fill(-1);
  for (let j = 1; j <= n; j++) {
    assignment[rowOfColumn[j] - 1] = j - 1;
  }
  return assignment;
}

/**
 * Total cost of an assignment (row i → column assignment[i])
 */
export function assignmentCost(cost: DistanceMatrix, assignment: readonly number[]): number {
  return assignment.reduce((sum, column, row) => sum + cost[row][column], 0);
}
