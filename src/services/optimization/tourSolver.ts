import { DistanceMatrix, RouteOrder } from '../../interfaces/Route';

/**
 * Length of an open path visiting indices in order
 */
export function pathDistance(matrix: DistanceMatrix, order: readonly number[]): number {
  let total = 0;
  for (let i = 0; i < order.length - 1; i++) {
    total += matrix[order[i]][order[i + 1]];
  }
  return total;
}

/**
 * Nearest Neighbor - greedy construction from a start index
 * Time Complexity: O(n²)
 * Ties go to the lowest index.
 */
export function nearestNeighbor(matrix: DistanceMatrix, start: number = 0): RouteOrder {
  const n = matrix.length;
  if (n === 0) return [];

  const route: RouteOrder = [start];
  const unvisited = new Set<number>();
  for (let i = 0; i < n; i++) {
    if (i !== start) unvisited.add(i);
  }

  let current = start;
  while (unvisited.size > 0) {
    let nearest = -1;
    let minDistance = Infinity;

    for (const candidate of unvisited) {
      const distance = matrix[current][candidate];
      if (distance < minDistance || (distance === minDistance && candidate < nearest)) {
        minDistance = distance;
        nearest = candidate;
      }
    }

    route.push(nearest);
    unvisited.delete(nearest);
    current = nearest;
  }

  return route;
}

/**
 * 2-Opt Improvement - reverse segments while the open path gets shorter.
 * The first stop stays fixed. Whole-path lengths are compared, so
 * asymmetric matrices are handled.
 * Time Complexity: O(n³ × iterations)
 */
export function twoOpt(
  matrix: DistanceMatrix,
  initial: readonly number[],
  maxIterations: number = 50
): RouteOrder {
  let route = [...initial];
  if (route.length <= 2) return route; // First stop is fixed

  let bestDistance = pathDistance(matrix, route);
  let improved = true;
  let iteration = 0;

  while (improved && iteration < maxIterations) {
    improved = false;

    for (let i = 1; i < route.length - 1 && !improved; i++) {
      for (let j = i + 1; j < route.length; j++) {
        const candidate = [
          ...route.slice(0, i),
          ...route.slice(i, j + 1).reverse(),
          ...route.slice(j + 1),
        ];
        const distance = pathDistance(matrix, candidate);

        if (distance < bestDistance) {
          route = candidate;
          bestDistance = distance;
          improved = true;
          break;
        }
      }
    }

    iteration++;
  }

  return route;
}
