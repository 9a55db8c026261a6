import { z } from 'zod';
import { DistanceMatrix, RouteCoordinates } from '../../interfaces/Route';
import { MalformedResponseError } from '../../errors/RouteErrors';

// OSRM and Mapbox share these response shapes
const distanceTableSchema = z.object({
  distances: z.array(z.array(z.number().nullable())),
});

const routeResponseSchema = z.object({
  routes: z
    .array(
      z.object({
        geometry: z
          .object({
            coordinates: z.array(z.array(z.number()).min(2)),
          })
          .optional(),
      })
    )
    .optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Extract an N×N distance matrix; null (no route) entries become Infinity
 */
export function parseDistanceMatrix(body: unknown, size: number): DistanceMatrix {
  const parsed = distanceTableSchema.safeParse(body);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `Distance matrix response is malformed: ${describeIssues(parsed.error)}`
    );
  }

  const { distances } = parsed.data;
  if (distances.length !== size || distances.some((row) => row.length !== size)) {
    const rowLengths = distances.map((row) => row.length).join(', ');
    throw new MalformedResponseError(
      `Expected a ${size}x${size} distance matrix, got ${distances.length} rows (lengths: ${rowLengths || 'none'})`
    );
  }

  return distances.map((row) => row.map((value) => value ?? Number.POSITIVE_INFINITY));
}

/**
 * Extract routes[0].geometry.coordinates
 */
export function parseRouteGeometry(body: unknown): RouteCoordinates {
  const parsed = routeResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `Route response is malformed: ${describeIssues(parsed.error)}`
    );
  }

  const route = parsed.data.routes?.[0];
  if (!route) {
    throw new MalformedResponseError('Routing service returned no route');
  }
  if (!route.geometry || route.geometry.coordinates.length === 0) {
    throw new MalformedResponseError('Route has no geometry');
  }

  return route.geometry.coordinates;
}
