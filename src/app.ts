import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { AppConfig } from './config/environment';
import { RoutingService } from './services/routing/routingService';
import { RouteController } from './controllers/route/route.controller';
import { createRouteRouter } from './routes/route.routes';
import { errorHandler } from './middleware/errorHandler';

export function createApp(routing: RoutingService, appConfig: AppConfig): Express {
  const app = express();

  // Map pages inline their script and pull Leaflet and tiles from CDNs
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          'script-src': ["'self'", "'unsafe-inline'", 'https://unpkg.com'],
          'style-src': ["'self'", "'unsafe-inline'", 'https://unpkg.com'],
          'img-src': ["'self'", 'data:', 'https://unpkg.com', 'https://*.tile.openstreetmap.org'],
        },
      },
    })
  );
  app.use(cors());
  app.use(express.json());

  // Health check route
  app.get('/health', (_req, res) => {
    res.json({ status: 'OK', timestamp: new Date().toISOString() });
  });

  const controller = new RouteController(routing, {
    strategy: appConfig.strategy,
    zoomStart: appConfig.zoomStart,
  });
  app.use('/routes', createRouteRouter(controller));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });

  // Error handling middleware
  app.use(errorHandler);

  return app;
}
