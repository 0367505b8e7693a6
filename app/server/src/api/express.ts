import express, { type Request, type RequestHandler, type Response } from 'express';
import { createHitRouter, type HitRouter, type HitRouterOptions } from '../core/router';

export type ExpressHitRouter = HitRouter<Request, Response>;

export function createExpressHitRouter(
  opts: Omit<HitRouterOptions<Request, Response>, 'fileServer'> = {},
): ExpressHitRouter {
  return createHitRouter<Request, Response>({
    ...opts,
    fileServer: (root) => express.static(root, { fallthrough: true }),
  });
}

// Handler failures without a panic handler end up in Express's error middleware.
export function toExpressHandler(router: ExpressHitRouter): RequestHandler {
  return (req, res, next) => {
    router.dispatch(req, res).catch(next);
  };
}
