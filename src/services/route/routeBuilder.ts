import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { LocationMap, WAREHOUSE } from '../../interfaces/Location';
import { RouteCoordinates, RouteStrategy, RouteSummary } from '../../interfaces/Route';
import { MissingWarehouseError } from '../../errors/RouteErrors';
import { assertValidLocations } from '../../dtos/route/build-route.request';
import { RoutingService } from '../routing/routingService';
import { optimizeOrder } from '../optimization/routeOptimizer';
import { pathDistance } from '../optimization/tourSolver';
import { render } from '../rendering/routeRenderer';
import { RouteMap } from '../rendering/routeMap';
import { toPosition } from '../../utils/coordinates';
import { formatDistance } from '../../utils/formatters';

export const DEFAULT_OUTPUT_FILE = 'optimized_route.html';
const TARGET_EXTENSION = '.html';

export interface RouteBuilderOptions {
  routing: RoutingService;
  strategy?: RouteStrategy;
  zoomStart?: number;
  signal?: AbortSignal;
}

export interface RouteComputation {
  summary: RouteSummary;
  map: RouteMap;
}

/**
 * Builds and saves an optimized delivery route for a fixed set of locations
 *
 * Pipeline:
 * 1. Distance matrix from the routing service
 * 2. Visiting order from the optimizer
 * 3. Road geometry through the ordered locations
 * 4. Map rendering, then a single file write
 */
export class RouteBuilder {
  constructor(
    private readonly locations: LocationMap,
    private readonly options: RouteBuilderOptions
  ) {}

  /**
   * Build the route and save the map. Nothing is written if any stage fails.
   */
  async build(filename: string = DEFAULT_OUTPUT_FILE): Promise<RouteSummary> {
    const ext = path.extname(filename);
    if (ext !== TARGET_EXTENSION) {
      console.warn(`The filename extension should be '${TARGET_EXTENSION}', provided '${ext}'.`);
    }

    const { summary, map } = await this.compute();
    await map.save(filename);

    console.log(`The route is saved to a file '${filename}'.`);
    return summary;
  }

  /**
   * Run the pipeline without touching the filesystem
   */
  async compute(): Promise<RouteComputation> {
    const { routing, strategy = 'assignment', zoomStart, signal } = this.options;

    assertValidLocations(this.locations);
    if (!this.locations.has(WAREHOUSE)) {
      throw new MissingWarehouseError(WAREHOUSE);
    }

    const buildId = uuidv4();
    const names = Array.from(this.locations.keys());
    const coordinates = Array.from(this.locations.values());

    console.log(
      `[${buildId}] Building route for ${names.length} locations (provider: ${routing.name}, strategy: ${strategy})`
    );

    const matrix = await routing.getDistanceMatrix(coordinates, { signal });
    const order = optimizeOrder(matrix, strategy);
    const orderedCoordinates = order.map((index) => coordinates[index]);

    // A single stop has no road to follow
    const routeCoordinates: RouteCoordinates =
      orderedCoordinates.length < 2
        ? orderedCoordinates.map(toPosition)
        : await routing.getRouteGeometry(orderedCoordinates, { signal });

    const map = render(this.locations, routeCoordinates, { zoomStart });

    const totalDistance = pathDistance(matrix, order);
    const summary: RouteSummary = {
      buildId,
      order,
      stops: order.map((index) => names[index]),
      totalDistance,
      totalDistanceFormatted: formatDistance(totalDistance),
      pathPointCount: routeCoordinates.length,
    };

    console.log(
      `[${buildId}] Route order: ${summary.stops.join(' → ')} (${summary.totalDistanceFormatted}, ${summary.pathPointCount} path points)`
    );

    return { summary, map };
  }
}
