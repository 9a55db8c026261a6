import * as dotenv from 'dotenv';
import { RouteStrategy } from '../interfaces/Route';

dotenv.config();

export type RoutingProvider = 'osrm' | 'mapbox';

export interface RoutingConfig {
  provider: RoutingProvider;
  osrmBaseUrl: string;
  profile: string;
  mapboxAccessToken: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface AppConfig {
  port: number;
  routing: RoutingConfig;
  strategy: RouteStrategy;
  zoomStart: number;
  outputFile: string;
}

function parseNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value !== undefined && value !== '' && Number.isFinite(parsed) ? parsed : fallback;
}

function parseProvider(value: string | undefined): RoutingProvider {
  return value === 'mapbox' ? 'mapbox' : 'osrm';
}

function parseStrategy(value: string | undefined): RouteStrategy {
  return value === 'tour' ? 'tour' : 'assignment';
}

/**
 * Read configuration from an environment (process.env by default)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseNumber(env.PORT, 3000),
    routing: {
      provider: parseProvider(env.ROUTING_PROVIDER),
      osrmBaseUrl: env.OSRM_BASE_URL || 'http://router.project-osrm.org',
      profile: env.ROUTING_PROFILE || 'driving',
      mapboxAccessToken: env.MAPBOX_ACCESS_TOKEN || '',
      timeoutMs: parseNumber(env.ROUTING_TIMEOUT_MS, 10000),
      maxRetries: parseNumber(env.ROUTING_MAX_RETRIES, 2),
      retryDelayMs: parseNumber(env.ROUTING_RETRY_DELAY_MS, 250),
    },
    strategy: parseStrategy(env.ROUTE_STRATEGY),
    zoomStart: parseNumber(env.MAP_ZOOM_START, 4),
    outputFile: env.OUTPUT_FILE || 'optimized_route.html',
  };
}

export const config = loadConfig();
