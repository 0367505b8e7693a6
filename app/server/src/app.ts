import fs from 'fs';
import path from 'path';
import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import { createExpressHitRouter, toExpressHandler, type ExpressHitRouter } from './api/express';
import type { ServerConfig } from './core/config';
import { errorMessage } from './core/errors';
import { logger, sanitize } from './core/log';

export function createApp(config: ServerConfig): { app: express.Express; router: ExpressHitRouter } {
  const app = express();

  // Basic middleware
  app.use(express.json({ limit: '2mb' }));

  const corsOpts: cors.CorsOptions = {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true); // non-browser or same-origin
      cb(null, config.corsOrigins.includes(origin));
    },
    // Preflight gets its CORS headers here; the hit router answers it (and counts OPTIONS routes).
    preflightContinue: true,
  };
  app.use(cors(corsOpts));

  const router = createExpressHitRouter({
    redirectTrailingSlash: config.redirectTrailingSlash,
    handleOptions: config.handleOptions,
    strictInvariants: config.strictInvariants,
  });

  router.get('/readyz', (_req, res) => {
    res.json({ ok: true });
  });

  // Serve a static directory if present
  if (config.staticDir) {
    const root = path.resolve(config.staticDir);
    if (fs.existsSync(root)) {
      router.serveFiles('/static/*filepath', root);
    } else {
      logger.warn('static.missing', { dir: sanitize(root) });
    }
  }

  app.use(toExpressHandler(router));

  // Handler failures land here; the hit has already been counted.
  const onError: ErrorRequestHandler = (err, req, res, next) => {
    logger.error('server.handler_error', { method: req.method, url: sanitize(req.originalUrl), err: errorMessage(err) });
    if (res.headersSent) return next(err);
    res.status(500).json({ error: 'internal error' });
  };
  app.use(onError);

  return { app, router };
}
