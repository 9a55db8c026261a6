import { Position } from 'geojson';

/**
 * Pairwise road distances in meters, N×N in location order.
 * Unreachable pairs are Infinity.
 */
export type DistanceMatrix = number[][];

/**
 * Visiting sequence as indices into the location order
 */
export type RouteOrder = number[];

/**
 * Road-following polyline as returned by the routing service ([lng, lat])
 */
export type RouteCoordinates = Position[];

export type RouteStrategy = 'assignment' | 'tour';

export interface RouteSummary {
  buildId: string;
  order: RouteOrder;
  stops: string[];
  totalDistance: number; // meters, along the order using the matrix
  totalDistanceFormatted: string;
  pathPointCount: number;
}
