/**
 * Geographic coordinate in degrees
 */
export interface Location {
  lat: number;
  lng: number;
}

/**
 * Insertion-ordered mapping from location name to coordinate.
 * Iteration order defines the row/column order of the distance matrix.
 */
export type LocationMap = ReadonlyMap<string, Location>;

/** Name of the mandatory anchor location */
export const WAREHOUSE = 'warehouse';
