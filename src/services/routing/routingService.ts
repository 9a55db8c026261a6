import { Location } from '../../interfaces/Location';
import { DistanceMatrix, RouteCoordinates } from '../../interfaces/Route';
import { InvalidLocationsError, RoutingServiceError } from '../../errors/RouteErrors';

export interface RoutingRequestOptions {
  signal?: AbortSignal;
}

/**
 * Road-network capability used by the route pipeline.
 * Implementations issue exactly one logical request per call.
 */
export interface RoutingService {
  readonly name: string;

  /**
   * N×N road distances (meters) between the given coordinates, in order
   */
  getDistanceMatrix(
    locations: readonly Location[],
    options?: RoutingRequestOptions
  ): Promise<DistanceMatrix>;

  /**
   * Road-following geometry through the coordinates in the given order.
   * Positions come back as [lng, lat].
   */
  getRouteGeometry(
    orderedLocations: readonly Location[],
    options?: RoutingRequestOptions
  ): Promise<RouteCoordinates>;
}

/**
 * Network-level failures (no HTTP status) are worth another attempt;
 * HTTP error statuses and caller aborts are not.
 */
export function isTransientRoutingError(error: unknown): boolean {
  return error instanceof RoutingServiceError && error.status === undefined;
}

export function assertMinimumLocations(
  locations: readonly Location[],
  minimum: number,
  what: string
): void {
  if (locations.length < minimum) {
    throw new InvalidLocationsError(
      `At least ${minimum} location${minimum === 1 ? '' : 's'} required for ${what}, got ${locations.length}`
    );
  }
}
