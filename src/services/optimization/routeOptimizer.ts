import { DistanceMatrix, RouteOrder, RouteStrategy } from '../../interfaces/Route';
import { OptimizationError } from '../../errors/RouteErrors';
import { solveAssignment } from './assignmentSolver';
import { nearestNeighbor, twoOpt } from './tourSolver';

/**
 * Reject empty, non-square, and non-finite matrices
 */
export function validateMatrix(matrix: DistanceMatrix): void {
  const n = matrix.length;
  if (n === 0) {
    throw new OptimizationError('Distance matrix is empty');
  }

  matrix.forEach((row, i) => {
    if (row.length !== n) {
      throw new OptimizationError(
        `Distance matrix is not square: row ${i} has ${row.length} entries, expected ${n}`
      );
    }
    row.forEach((value, j) => {
      if (!Number.isFinite(value)) {
        throw new OptimizationError(`Distance matrix entry (${i}, ${j}) is not finite: ${value}`);
      }
    });
  });
}

/**
 * Visiting order over the matrix indices.
 *
 * 'assignment' solves the assignment problem and reads each row's column in
 * row order. The result is always a permutation, but it is not a tour: with a
 * zero diagonal and positive off-diagonal distances the optimum is the
 * identity, so the input order comes back unchanged.
 *
 * 'tour' builds an open path from index 0 with nearest neighbor + 2-opt.
 */
export function optimizeOrder(
  matrix: DistanceMatrix,
  strategy: RouteStrategy = 'assignment'
): RouteOrder {
  validateMatrix(matrix);

  if (strategy === 'tour') {
    return twoOpt(matrix, nearestNeighbor(matrix, 0));
  }

  return solveAssignment(matrix);
}
