import type { Endpoint, Handle, RouteRequest, RouteResponse } from '../types/domain';
import type { Registry } from '../core/registry';
import { errorMessage, SerializationError } from '../core/errors';
import { logger } from '../core/log';

export interface EndpointJson {
  Method: string;
  Path: string;
  Hits: number;
}

export type EndpointEncoder = (endpoints: Endpoint[]) => string;

// Two-space indent, and every line after the first carries a further two-space prefix.
export function encodeEndpoints(endpoints: Endpoint[]): string {
  const wire: EndpointJson[] = endpoints.map((e) => ({ Method: e.method, Path: e.path, Hits: e.hits }));
  return JSON.stringify(wire, null, 2).replace(/\n/g, '\n  ');
}

export function writeEndpoints(res: RouteResponse, endpoints: Endpoint[], encode: EndpointEncoder = encodeEndpoints) {
  let body: string;
  try {
    body = encode(endpoints);
  } catch (e) {
    const err = new SerializationError(errorMessage(e), e);
    logger.error('endpoints.encode_failed', { err: err.toLogString() });
    res.statusCode = 500;
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.end(err.message);
    return;
  }

  res.statusCode = 200;
  res.setHeader('Content-Type', 'application/json');
  // Status and headers are committed by now; a failed write can only be logged.
  res.write(body, (err) => {
    if (err) logger.warn('endpoints.write_failed', { err: String(err) });
  });
  res.end();
}

export function endpointsHandlers<Req extends RouteRequest, Res extends RouteResponse>(
  registry: Registry,
  encode: EndpointEncoder = encodeEndpoints,
): { all: Handle<Req, Res>; unhit: Handle<Req, Res> } {
  return {
    all: (_req, res) => writeEndpoints(res, registry.list(), encode),
    unhit: (_req, res) => writeEndpoints(res, registry.list({ unhitOnly: true }), encode),
  };
}
