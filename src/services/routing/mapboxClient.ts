import mbxDirections from '@mapbox/mapbox-sdk/services/directions';
import mbxMatrix from '@mapbox/mapbox-sdk/services/matrix';
import { Location } from '../../interfaces/Location';
import { DistanceMatrix, RouteCoordinates } from '../../interfaces/Route';
import { InvalidLocationsError, RoutingServiceError } from '../../errors/RouteErrors';
import { createDeadline, withRetry } from '../../utils/resilience';
import { parseDistanceMatrix, parseRouteGeometry } from './responseParsers';
import {
  RoutingRequestOptions,
  RoutingService,
  assertMinimumLocations,
  isTransientRoutingError,
} from './routingService';

/**
 * Profile types for Mapbox routing
 */
export type MapboxProfile = 'driving-traffic' | 'driving' | 'walking' | 'cycling';

const MAPBOX_PROFILES: readonly MapboxProfile[] = ['driving-traffic', 'driving', 'walking', 'cycling'];

/** Matrix and Directions both accept at most 25 coordinates */
export const MAPBOX_MAX_POINTS = 25;

export interface MapboxOptions {
  accessToken: string;
  profile: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

/** Subset of the SDK's MapiRequest used here */
interface SendableRequest {
  send(): Promise<{ body: unknown }>;
  abort(): void;
}

export function toMapboxProfile(profile: string): MapboxProfile {
  const match = MAPBOX_PROFILES.find((candidate) => candidate === profile);
  if (!match) {
    console.warn(`Mapbox does not support routing profile '${profile}', using 'driving'`);
    return 'driving';
  }
  return match;
}

/**
 * Routing through the Mapbox Matrix and Directions APIs
 */
export class MapboxRoutingService implements RoutingService {
  readonly name = 'mapbox';

  private readonly directionsClient: ReturnType<typeof mbxDirections>;
  private readonly matrixClient: ReturnType<typeof mbxMatrix>;
  private readonly profile: MapboxProfile;

  constructor(private readonly options: MapboxOptions) {
    if (!options.accessToken) {
      throw new RoutingServiceError('MAPBOX_ACCESS_TOKEN is required for the mapbox routing provider');
    }

    this.directionsClient = mbxDirections({ accessToken: options.accessToken });
    this.matrixClient = mbxMatrix({ accessToken: options.accessToken });
    this.profile = toMapboxProfile(options.profile);
  }

  /**
   * Calculate distance matrix between multiple locations using Mapbox Matrix API
   */
  async getDistanceMatrix(
    locations: readonly Location[],
    options: RoutingRequestOptions = {}
  ): Promise<DistanceMatrix> {
    assertMinimumLocations(locations, 1, 'a distance matrix');
    assertWithinLimit(locations);

    // The Matrix API needs two points; one point is its own zero-distance matrix
    if (locations.length === 1) {
      return [[0]];
    }

    const body = await this.send(
      () =>
        this.matrixClient.getMatrix({
          points: locations.map((loc) => ({ coordinates: [loc.lng, loc.lat] })),
          profile: this.profile,
          annotations: ['distance'],
        }),
      'distance matrix',
      options.signal
    );

    return parseDistanceMatrix(body, locations.length);
  }

  /**
   * Get route geometry through the locations using Mapbox Directions API
   */
  async getRouteGeometry(
    orderedLocations: readonly Location[],
    options: RoutingRequestOptions = {}
  ): Promise<RouteCoordinates> {
    assertMinimumLocations(orderedLocations, 2, 'route geometry');
    assertWithinLimit(orderedLocations);

    const body = await this.send(
      () =>
        this.directionsClient.getDirections({
          profile: this.profile,
          waypoints: orderedLocations.map((loc) => ({ coordinates: [loc.lng, loc.lat] })),
          geometries: 'geojson',
          overview: 'full',
        }),
      'route geometry',
      options.signal
    );

    return parseRouteGeometry(body);
  }

  private send(
    createRequest: () => SendableRequest,
    what: string,
    signal?: AbortSignal
  ): Promise<unknown> {
    return withRetry(
      () => this.sendOnce(createRequest(), what, signal),
      (error) => !signal?.aborted && isTransientRoutingError(error),
      {
        maxRetries: this.options.maxRetries,
        retryDelayMs: this.options.retryDelayMs,
        label: `Mapbox ${what} request`,
      }
    );
  }

  private async sendOnce(request: SendableRequest, what: string, signal?: AbortSignal): Promise<unknown> {
    const deadline = createDeadline(this.options.timeoutMs, signal);
    deadline.signal.addEventListener('abort', () => request.abort(), { once: true });

    try {
      const response = await request.send();
      return response.body;
    } catch (error) {
      if (signal?.aborted) throw error;
      if (deadline.timedOut()) {
        throw new RoutingServiceError(
          `Failed to obtain ${what} from Mapbox: timed out after ${this.options.timeoutMs}ms`
        );
      }
      console.error(`Mapbox ${what} API error:`, error);
      throw toRoutingServiceError(error, what);
    } finally {
      deadline.dispose();
    }
  }
}

function assertWithinLimit(locations: readonly Location[]): void {
  if (locations.length > MAPBOX_MAX_POINTS) {
    throw new InvalidLocationsError(
      `Maximum ${MAPBOX_MAX_POINTS} locations allowed for Mapbox routing, got ${locations.length}`
    );
  }
}

/**
 * MapiError carries statusCode for HTTP failures and none for network failures
 */
function toRoutingServiceError(error: unknown, what: string): RoutingServiceError {
  if (typeof error === 'object' && error !== null) {
    const status =
      'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : undefined;
    const message =
      'message' in error && typeof error.message === 'string' ? error.message : 'Unknown error';
    return new RoutingServiceError(`Failed to obtain ${what} from Mapbox: ${message}`, status);
  }
  return new RoutingServiceError(`Failed to obtain ${what} from Mapbox: ${String(error)}`);
}
