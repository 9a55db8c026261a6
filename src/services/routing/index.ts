import { RoutingConfig } from '../../config/environment';
import { MapboxRoutingService } from './mapboxClient';
import { OsrmRoutingService } from './osrmClient';
import { RoutingService } from './routingService';

export type { RoutingService, RoutingRequestOptions } from './routingService';
export { OsrmRoutingService } from './osrmClient';
export { MapboxRoutingService } from './mapboxClient';

export function createRoutingService(routing: RoutingConfig): RoutingService {
  const { timeoutMs, maxRetries, retryDelayMs, profile } = routing;

  if (routing.provider === 'mapbox') {
    return new MapboxRoutingService({
      accessToken: routing.mapboxAccessToken,
      profile,
      timeoutMs,
      maxRetries,
      retryDelayMs,
    });
  }

  return new OsrmRoutingService({
    baseUrl: routing.osrmBaseUrl,
    profile,
    timeoutMs,
    maxRetries,
    retryDelayMs,
  });
}
