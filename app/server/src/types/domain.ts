export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type Params = Record<string, string>;

// Issued once per registration; the registry counts hits against it.
export type RouteKey = number;

export interface Endpoint {
  method: string;
  path: string; // registration pattern, e.g. /users/:id
  hits: number;
}

export interface RouteRequest {
  method: string;
  url: string; // path + query, rewritten by serveFiles
}

export interface RouteResponse {
  statusCode: number;
  readonly headersSent: boolean;
  setHeader(name: string, value: string | number | readonly string[]): unknown;
  write(chunk: string, callback?: (error: Error | null | undefined) => void): boolean;
  end(chunk?: string): unknown;
}

export type Handle<Req extends RouteRequest, Res extends RouteResponse> =
  (req: Req, res: Res, params: Params) => unknown;

export type NotFoundHandler<Req, Res> = (req: Req, res: Res) => void;
export type MethodNotAllowedHandler<Req, Res> = (req: Req, res: Res, allowed: string[]) => void;
export type PanicHandler<Req, Res> = (req: Req, res: Res, error: unknown) => void;

export type FileServerNext = (err?: unknown) => void;
export type FileServer<Req, Res> = (req: Req, res: Res, next: FileServerNext) => void;
