import { Position } from 'geojson';
import { Location } from '../interfaces/Location';

/**
 * Axis-order conversions between the internal { lat, lng } model and the
 * [lng, lat] order used by routing services and GeoJSON.
 */

/** Build coordinate string for OSRM: lng,lat;lng,lat;... */
export function toCoordString(locations: readonly Location[]): string {
  return locations.map(({ lat, lng }) => `${lng},${lat}`).join(';');
}

/** GeoJSON position [lng, lat] */
export function toPosition(location: Location): Position {
  return [location.lng, location.lat];
}

/** Leaflet [lat, lng] pair from a GeoJSON position */
export function positionToLatLng(position: Position): [number, number] {
  const [lng, lat] = position;
  return [lat, lng];
}

export function toLatLng(location: Location): [number, number] {
  return [location.lat, location.lng];
}

/** GeoJSON position from a Leaflet [lat, lng] pair */
export function latLngToPosition([lat, lng]: readonly [number, number]): Position {
  return [lng, lat];
}
