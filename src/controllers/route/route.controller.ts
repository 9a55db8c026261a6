/**
 * Route Controller
 * Builds route maps on request without touching the filesystem
 */

import { FeatureCollection } from 'geojson';
import { RouteStrategy, RouteSummary } from '../../interfaces/Route';
import { RoutingService } from '../../services/routing/routingService';
import { RouteBuilder } from '../../services/route/routeBuilder';
import { parseBuildRouteRequest } from '../../dtos/route/build-route.request';

export interface RouteControllerDefaults {
  strategy: RouteStrategy;
  zoomStart: number;
}

export interface RouteMapResponse {
  summary: RouteSummary;
  map: FeatureCollection;
}

export class RouteController {
  constructor(
    private readonly routing: RoutingService,
    private readonly defaults: RouteControllerDefaults
  ) {}

  /**
   * Optimized route as a Leaflet HTML page
   */
  async buildHtml(body: unknown, signal?: AbortSignal): Promise<string> {
    const { map } = await this.createBuilder(body, signal).compute();
    return map.toHtml();
  }

  /**
   * Optimized route summary with the map as a GeoJSON FeatureCollection
   */
  async buildGeoJson(body: unknown, signal?: AbortSignal): Promise<RouteMapResponse> {
    const { summary, map } = await this.createBuilder(body, signal).compute();
    return { summary, map: map.toGeoJSON() };
  }

  private createBuilder(body: unknown, signal?: AbortSignal): RouteBuilder {
    const request = parseBuildRouteRequest(body);
    return new RouteBuilder(request.locations, {
      routing: this.routing,
      strategy: request.strategy ?? this.defaults.strategy,
      zoomStart: this.defaults.zoomStart,
      signal,
    });
  }
}
