import type {
  Endpoint,
  FileServer,
  Handle,
  HttpMethod,
  MethodNotAllowedHandler,
  NotFoundHandler,
  PanicHandler,
  Params,
  RouteKey,
  RouteRequest,
  RouteResponse,
} from '../types/domain';
import { endpointsHandlers, type EndpointEncoder } from '../api/endpoints';
import { createMatcher } from './matcher';
import { createRegistry, ENDPOINTS_PATH, ENDPOINTS_UNHIT_PATH, type ListOptions } from './registry';
import { errorMessage, InvalidRouteError, RouterSealedError } from './errors';
import { logger, sanitize } from './log';

export interface HitRouterOptions<Req, Res> {
  notFound?: NotFoundHandler<Req, Res>;
  methodNotAllowed?: MethodNotAllowedHandler<Req, Res>;
  panicHandler?: PanicHandler<Req, Res>;
  /** Builds the handler serveFiles delegates to, e.g. express.static. */
  fileServer?: (root: string) => FileServer<Req, Res>;
  /** Redirect /a to /a/ (or back) when only the other form is registered. Default true. */
  redirectTrailingSlash?: boolean;
  /** Answer OPTIONS with an Allow header when no OPTIONS handler matches. Default true. */
  handleOptions?: boolean;
  strictInvariants?: boolean;
  encodeEndpoints?: EndpointEncoder;
}

export interface HitRouter<Req extends RouteRequest, Res extends RouteResponse> {
  // Read on every request, so they can be swapped after construction.
  notFound?: NotFoundHandler<Req, Res>;
  methodNotAllowed?: MethodNotAllowedHandler<Req, Res>;
  panicHandler?: PanicHandler<Req, Res>;

  handle(method: string, path: string, handler: Handle<Req, Res>): RouteKey;
  get(path: string, handler: Handle<Req, Res>): RouteKey;
  head(path: string, handler: Handle<Req, Res>): RouteKey;
  options(path: string, handler: Handle<Req, Res>): RouteKey;
  post(path: string, handler: Handle<Req, Res>): RouteKey;
  put(path: string, handler: Handle<Req, Res>): RouteKey;
  patch(path: string, handler: Handle<Req, Res>): RouteKey;
  delete(path: string, handler: Handle<Req, Res>): RouteKey;
  serveFiles(path: string, root: string): RouteKey;

  dispatch(req: Req, res: Res): Promise<void>;
  endpoints(opts?: ListOptions): Endpoint[];
}

function sendJson(res: RouteResponse, status: number, body: unknown) {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  res.end(JSON.stringify(body));
}

export function defaultNotFound(_req: RouteRequest, res: RouteResponse) {
  sendJson(res, 404, { error: 'not found' });
}

export function defaultMethodNotAllowed(_req: RouteRequest, res: RouteResponse, allowed: string[]) {
  sendJson(res, 405, { error: 'method not allowed', allowed });
}

function defaultPanic(req: RouteRequest, res: RouteResponse, error: unknown) {
  logger.error('router.unhandled_error', { method: req.method, url: sanitize(req.url), err: errorMessage(error) });
  if (res.headersSent) {
    res.end();
    return;
  }
  sendJson(res, 500, { error: 'internal error' });
}

function splitUrl(url: string): { path: string; query: string } {
  const q = url.indexOf('?');
  return q === -1 ? { path: url, query: '' } : { path: url.slice(0, q), query: url.slice(q) };
}

/**
 * A router that counts hits per registered route. `/endpoints` lists every route with its
 * count, `/endpoints/unhit` only those never dispatched to.
 *
 * All routes must be registered before the first dispatch; the route tree is read-only
 * while serving. Not meant for production traffic.
 */
export function createHitRouter<Req extends RouteRequest, Res extends RouteResponse>(
  opts: HitRouterOptions<Req, Res> = {},
): HitRouter<Req, Res> {
  const matcher = createMatcher<Handle<Req, Res>>();
  const registry = createRegistry({ strictInvariants: opts.strictInvariants });
  const redirectTrailingSlash = opts.redirectTrailingSlash ?? true;
  const handleOptions = opts.handleOptions ?? true;
  let nextKey: RouteKey = 1;
  let sealed = false;

  function allowHeader(allowed: string[]) {
    const methods = handleOptions && !allowed.includes('OPTIONS') ? [...allowed, 'OPTIONS'] : allowed;
    return [...methods].sort().join(', ');
  }

  async function invoke(req: Req, res: Res, key: RouteKey, handler: Handle<Req, Res>, params: Params) {
    try {
      await handler(req, res, params);
    } catch (err) {
      const panic = router.panicHandler;
      if (!panic) throw err;
      logger.warn('router.handler_failed', { key, method: req.method, url: sanitize(req.url), err: errorMessage(err) });
      panic(req, res, err);
    } finally {
      registry.hit(key);
    }
  }

  function redirect(req: Req, res: Res, location: string) {
    res.statusCode = req.method === 'GET' || req.method === 'HEAD' ? 301 : 308;
    res.setHeader('Location', location);
    res.end();
  }

  function register(method: string, path: string, handler: Handle<Req, Res>, internal: boolean) {
    if (sealed) throw new RouterSealedError(method, path);
    if (!method) throw new InvalidRouteError(`HTTP method must not be empty for path '${path}'`, path);
    const key = nextKey++;
    matcher.register(method, path, key, handler);
    registry.record(key, method, path, { internal });
    logger.debug('router.register', { key, method, path: sanitize(path), internal });
    return key;
  }

  function shortcut(method: HttpMethod) {
    return (path: string, handler: Handle<Req, Res>) => router.handle(method, path, handler);
  }

  const router: HitRouter<Req, Res> = {
    notFound: opts.notFound,
    methodNotAllowed: opts.methodNotAllowed,
    panicHandler: opts.panicHandler,

    handle(method, path, handler) {
      return register(method, path, handler, false);
    },
    get: shortcut('GET'),
    head: shortcut('HEAD'),
    options: shortcut('OPTIONS'),
    post: shortcut('POST'),
    put: shortcut('PUT'),
    patch: shortcut('PATCH'),
    delete: shortcut('DELETE'),

    serveFiles(path, root) {
      if (!path.endsWith('/*filepath')) {
        throw new InvalidRouteError(`Path must end with /*filepath in path '${path}'`, path);
      }
      if (!opts.fileServer) {
        throw new InvalidRouteError(`No file server configured for '${path}'`, path);
      }
      const serve = opts.fileServer(root);
      return router.get(path, (req, res, params) => {
        req.url = `/${encodeURI(params.filepath ?? '')}`;
        serve(req, res, (err) => {
          if (err) {
            (router.panicHandler ?? defaultPanic)(req, res, err);
            return;
          }
          (router.notFound ?? defaultNotFound)(req, res);
        });
      });
    },

    async dispatch(req, res) {
      sealed = true;
      const { path, query } = splitUrl(req.url);
      const result = matcher.resolve(req.method, path);

      switch (result.kind) {
        case 'found':
          await invoke(req, res, result.key, result.handler, result.params);
          return;
        case 'method-not-allowed':
          res.setHeader('Allow', allowHeader(result.allowed));
          if (handleOptions && req.method === 'OPTIONS') {
            res.statusCode = 200;
            res.end();
            return;
          }
          (router.methodNotAllowed ?? defaultMethodNotAllowed)(req, res, result.allowed);
          return;
        case 'not-found': {
          const alt = redirectTrailingSlash ? matcher.redirectPath(req.method, path) : undefined;
          if (alt) {
            redirect(req, res, alt + query);
            return;
          }
          (router.notFound ?? defaultNotFound)(req, res);
          return;
        }
      }
    },

    endpoints(listOpts) {
      return registry.list(listOpts);
    },
  };

  const introspection = endpointsHandlers<Req, Res>(registry, opts.encodeEndpoints);
  // Listed by key, so user routes on the same paths under other methods still show up.
  register('GET', ENDPOINTS_PATH, introspection.all, true);
  register('GET', ENDPOINTS_UNHIT_PATH, introspection.unhit, true);

  return router;
}
