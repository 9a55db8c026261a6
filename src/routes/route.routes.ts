import { NextFunction, Request, Response, Router } from 'express';
import { RouteController } from '../controllers/route/route.controller';

/**
 * Handler for POST /routes?format=html|geojson
 */
export function buildRouteHandler(controller: RouteController) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    // Abandon the upstream routing calls when the client goes away
    const abort = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) abort.abort();
    });

    try {
      if (req.query.format === 'geojson') {
        res.json(await controller.buildGeoJson(req.body, abort.signal));
        return;
      }
      res.type('html').send(await controller.buildHtml(req.body, abort.signal));
    } catch (error) {
      // Nobody is left to answer
      if (abort.signal.aborted) return;
      next(error);
    }
  };
}

export function createRouteRouter(controller: RouteController): Router {
  const router = Router();
  router.post('/', buildRouteHandler(controller));
  return router;
}
