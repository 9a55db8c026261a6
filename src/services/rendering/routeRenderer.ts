import { LocationMap, WAREHOUSE } from '../../interfaces/Location';
import { RouteCoordinates } from '../../interfaces/Route';
import { MissingWarehouseError } from '../../errors/RouteErrors';
import { positionToLatLng, toLatLng } from '../../utils/coordinates';
import { RouteMap } from './routeMap';

export interface RenderOptions {
  zoomStart?: number;
  color?: string;
  weight?: number;
}

/**
 * Compose the route map: centered on the warehouse, one polyline through
 * the route coordinates, one marker per location.
 */
export function render(
  locations: LocationMap,
  routeCoordinates: RouteCoordinates,
  options: RenderOptions = {}
): RouteMap {
  const warehouse = locations.get(WAREHOUSE);
  if (!warehouse) {
    throw new MissingWarehouseError(WAREHOUSE);
  }

  return new RouteMap({
    center: toLatLng(warehouse),
    zoom: options.zoomStart ?? 4,
    polylines: [
      {
        points: routeCoordinates.map(positionToLatLng),
        color: options.color ?? 'blue',
        weight: options.weight ?? 2.5,
      },
    ],
    markers: Array.from(locations, ([name, location]) => ({
      name,
      position: toLatLng(location),
    })),
  });
}
