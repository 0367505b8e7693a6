export const RouterErrorCode = {
  ROUTE_CONFLICT: 'ROUTE_CONFLICT',
  INVALID_ROUTE: 'INVALID_ROUTE',
  ROUTER_SEALED: 'ROUTER_SEALED',
  REGISTRY_INVARIANT: 'REGISTRY_INVARIANT',
  SERIALIZATION_FAILED: 'SERIALIZATION_FAILED',
} as const;

export type RouterErrorCodeType = typeof RouterErrorCode[keyof typeof RouterErrorCode];

export class RouterError extends Error {
  readonly code: RouterErrorCodeType;
  readonly context: Record<string, unknown>;

  constructor(message: string, code: RouterErrorCodeType, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'RouterError';
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }

  toLogString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Two patterns registered for the same method would match the same request ambiguously,
 * or the exact (method, pattern) pair is already taken.
 */
export class RouteConflictError extends RouterError {
  readonly method: string;
  readonly path: string;

  constructor(message: string, method: string, path: string, existing?: string) {
    super(message, RouterErrorCode.ROUTE_CONFLICT, { method, path, existing });
    this.name = 'RouteConflictError';
    this.method = method;
    this.path = path;
  }
}

export class InvalidRouteError extends RouterError {
  constructor(message: string, path: string) {
    super(message, RouterErrorCode.INVALID_ROUTE, { path });
    this.name = 'InvalidRouteError';
  }
}

export class RouterSealedError extends RouterError {
  constructor(method: string, path: string) {
    super(
      `Cannot register ${method} ${path}: the router has already started dispatching requests`,
      RouterErrorCode.ROUTER_SEALED,
      { method, path },
    );
    this.name = 'RouterSealedError';
  }
}

/** The registry was asked about a route key it never recorded. A programming defect. */
export class RegistryInvariantError extends RouterError {
  constructor(message: string, key: number) {
    super(message, RouterErrorCode.REGISTRY_INVARIANT, { key });
    this.name = 'RegistryInvariantError';
  }
}

export class SerializationError extends RouterError {
  readonly originalError: unknown;

  constructor(message: string, originalError?: unknown) {
    super(message, RouterErrorCode.SERIALIZATION_FAILED);
    this.name = 'SerializationError';
    this.originalError = originalError;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
