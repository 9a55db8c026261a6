/**
 * OSRM (Open Source Routing Machine) HTTP client.
 * Defaults to the public demo server: http://router.project-osrm.org
 * No API key required. For production consider self-hosting or rate limits.
 */

import { Location } from '../../interfaces/Location';
import { DistanceMatrix, RouteCoordinates } from '../../interfaces/Route';
import { MalformedResponseError, RoutingServiceError } from '../../errors/RouteErrors';
import { toCoordString } from '../../utils/coordinates';
import { createDeadline, withRetry } from '../../utils/resilience';
import { parseDistanceMatrix, parseRouteGeometry } from './responseParsers';
import {
  RoutingRequestOptions,
  RoutingService,
  assertMinimumLocations,
  isTransientRoutingError,
} from './routingService';

export interface OsrmOptions {
  baseUrl: string;
  profile: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export class OsrmRoutingService implements RoutingService {
  readonly name = 'osrm';

  constructor(private readonly options: OsrmOptions) {}

  async getDistanceMatrix(
    locations: readonly Location[],
    options: RoutingRequestOptions = {}
  ): Promise<DistanceMatrix> {
    assertMinimumLocations(locations, 1, 'a distance matrix');
    const url = `${this.serviceUrl('table')}/${toCoordString(locations)}?annotations=distance`;
    const body = await this.getJson(url, 'distance matrix', options.signal);
    return parseDistanceMatrix(body, locations.length);
  }

  async getRouteGeometry(
    orderedLocations: readonly Location[],
    options: RoutingRequestOptions = {}
  ): Promise<RouteCoordinates> {
    assertMinimumLocations(orderedLocations, 2, 'route geometry');
    const url = `${this.serviceUrl('route')}/${toCoordString(orderedLocations)}?overview=full&geometries=geojson`;
    const body = await this.getJson(url, 'route geometry', options.signal);
    return parseRouteGeometry(body);
  }

  private serviceUrl(service: 'table' | 'route'): string {
    const base = this.options.baseUrl.replace(/\/+$/, '');
    return `${base}/${service}/v1/${this.options.profile}`;
  }

  private getJson(url: string, what: string, signal?: AbortSignal): Promise<unknown> {
    return withRetry(
      () => this.fetchOnce(url, what, signal),
      (error) => !signal?.aborted && isTransientRoutingError(error),
      {
        maxRetries: this.options.maxRetries,
        retryDelayMs: this.options.retryDelayMs,
        label: `OSRM ${what} request`,
      }
    );
  }

  private async fetchOnce(url: string, what: string, signal?: AbortSignal): Promise<unknown> {
    const deadline = createDeadline(this.options.timeoutMs, signal);
    try {
      let response: Response;
      try {
        response = await fetch(url, {
          headers: { Accept: 'application/json' },
          signal: deadline.signal,
        });
      } catch (error) {
        if (signal?.aborted) throw error;
        const reason = deadline.timedOut()
          ? `timed out after ${this.options.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : 'Request failed';
        throw new RoutingServiceError(`Failed to obtain ${what} from OSRM: ${reason}`);
      }

      if (!response.ok) {
        const detail = await readErrorMessage(response);
        throw new RoutingServiceError(
          `Failed to obtain ${what} from OSRM: HTTP ${response.status}${detail ? ` (${detail})` : ''}`,
          response.status
        );
      }

      try {
        const body: unknown = await response.json();
        return body;
      } catch (error) {
        // The deadline also covers reading the body
        if (signal?.aborted) throw error;
        if (deadline.timedOut()) {
          throw new RoutingServiceError(
            `Failed to obtain ${what} from OSRM: timed out after ${this.options.timeoutMs}ms`
          );
        }
        throw new MalformedResponseError(
          `OSRM ${what} response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    } finally {
      deadline.dispose();
    }
  }
}

/** OSRM error bodies look like { code: 'InvalidQuery', message: '...' } */
async function readErrorMessage(response: Response): Promise<string | undefined> {
  try {
    const body: unknown = await response.json();
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
      return body.message;
    }
    return undefined;
  } catch (error) {
    console.warn(`OSRM error response has no JSON body: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
}
