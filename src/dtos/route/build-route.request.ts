import { z } from 'zod';
import { Location, LocationMap } from '../../interfaces/Location';
import { RouteStrategy } from '../../interfaces/Route';
import { InvalidLocationsError } from '../../errors/RouteErrors';

const latitude = z.number().finite().min(-90).max(90);
const longitude = z.number().finite().min(-180).max(180);

export const locationSchema = z.object({ lat: latitude, lng: longitude });

const namedLocationSchema = locationSchema.extend({ name: z.string().min(1) });

/**
 * Locations as either
 * - an array: [{ "name": "warehouse", "lat": 52.52, "lng": 13.40 }, ...]
 * - an object: { "warehouse": [52.52, 13.40], ... } or { "warehouse": { "lat": 52.52, "lng": 13.40 } }
 *
 * Only the array form keeps the order of integer-like names.
 */
export const locationsInputSchema = z.union([
  z.array(namedLocationSchema).min(1),
  z.record(z.string().min(1), z.union([z.tuple([latitude, longitude]), locationSchema])),
]);

/**
 * Request body for building a route
 * @example {
 *   "locations": {
 *     "warehouse": [52.5200, 13.4050],
 *     "bakery": [52.5310, 13.3847]
 *   },
 *   "strategy": "assignment"
 * }
 */
export const buildRouteRequestSchema = z.object({
  locations: locationsInputSchema,
  strategy: z.enum(['assignment', 'tour']).optional(),
});

export interface BuildRouteRequest {
  locations: LocationMap;
  strategy?: RouteStrategy;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function toLocationMap(input: z.infer<typeof locationsInputSchema>): LocationMap {
  const locations = new Map<string, Location>();

  if (Array.isArray(input)) {
    for (const { name, lat, lng } of input) {
      if (locations.has(name)) {
        throw new InvalidLocationsError(`Duplicate location name '${name}'`);
      }
      locations.set(name, { lat, lng });
    }
    return locations;
  }

  for (const [name, value] of Object.entries(input)) {
    locations.set(name, Array.isArray(value) ? { lat: value[0], lng: value[1] } : value);
  }
  if (locations.size === 0) {
    throw new InvalidLocationsError('At least one location is required');
  }
  return locations;
}

/**
 * Validate untrusted location input (CLI file, HTTP body)
 */
export function parseLocations(input: unknown): LocationMap {
  const parsed = locationsInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidLocationsError('Invalid locations', formatIssues(parsed.error));
  }
  return toLocationMap(parsed.data);
}

export function parseBuildRouteRequest(body: unknown): BuildRouteRequest {
  const parsed = buildRouteRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidLocationsError('Invalid route request', formatIssues(parsed.error));
  }
  return {
    locations: toLocationMap(parsed.data.locations),
    strategy: parsed.data.strategy,
  };
}

/**
 * Range-check an already-built location map
 */
export function assertValidLocations(locations: LocationMap): void {
  if (locations.size === 0) {
    throw new InvalidLocationsError('At least one location is required');
  }

  const issues: string[] = [];
  for (const [name, location] of locations) {
    const result = locationSchema.safeParse(location);
    if (!result.success) {
      issues.push(...formatIssues(result.error).map((issue) => `${name}.${issue}`));
    }
  }
  if (issues.length > 0) {
    throw new InvalidLocationsError('Invalid locations', issues);
  }
}
