import type { Params, RouteKey } from '../types/domain';
import { InvalidRouteError, RouteConflictError } from './errors';

export type Resolution<H> =
  | { kind: 'found'; key: RouteKey; handler: H; params: Params; pattern: string }
  | { kind: 'method-not-allowed'; allowed: string[] }
  | { kind: 'not-found' };

export interface Matcher<H> {
  register(method: string, pattern: string, key: RouteKey, handler: H): void;
  resolve(method: string, path: string): Resolution<H>;
  redirectPath(method: string, path: string): string | undefined;
  methods(): string[];
}

type Segment =
  | { kind: 'static'; value: string }
  | { kind: 'param'; name: string }
  | { kind: 'wildcard'; name: string };

interface RouteEntry<H> {
  key: RouteKey;
  handler: H;
  pattern: string;
}

interface Node<H> {
  // First pattern that walked through this node, for conflict messages
  origin: string;
  name?: string;
  staticChildren: Map<string, Node<H>>;
  paramChild?: Node<H>;
  wildcardChild?: Node<H>;
  route?: RouteEntry<H>;
}

function createNode<H>(origin: string, name?: string): Node<H> {
  return { origin, name, staticChildren: new Map() };
}

// '/' is one empty segment, so '/a/' and '/a' differ by a trailing empty segment.
export function splitPath(path: string): string[] {
  return path.slice(1).split('/');
}

function firstChild<H>(node: Node<H>): Node<H> | undefined {
  for (const child of node.staticChildren.values()) return child;
  return node.paramChild;
}

export function parsePattern(pattern: string): Segment[] {
  if (!pattern.startsWith('/')) {
    throw new InvalidRouteError(`Route path must start with /: ${pattern}`, pattern);
  }
  const parts = splitPath(pattern);
  const seen = new Set<string>();
  return parts.map((part, i): Segment => {
    const marker = part.charAt(0);
    if (marker !== ':' && marker !== '*') return { kind: 'static', value: part };

    const name = part.slice(1);
    if (!name) {
      throw new InvalidRouteError(`Parameters must be named in path '${pattern}'`, pattern);
    }
    if (seen.has(name)) {
      throw new InvalidRouteError(`Parameter '${name}' appears more than once in path '${pattern}'`, pattern);
    }
    seen.add(name);
    if (marker === '*' && i !== parts.length - 1) {
      throw new InvalidRouteError(`Catch-all routes are only allowed at the end of the path '${pattern}'`, pattern);
    }
    return marker === ':' ? { kind: 'param', name } : { kind: 'wildcard', name };
  });
}

function decodeSegment(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

/**
 * Walks one method tree. Static children win over the parameter child, which wins over the
 * catch-all; a branch that dead-ends further down falls back to the next kind.
 */
function match<H>(node: Node<H>, segments: string[], i: number, params: Params): RouteEntry<H> | undefined {
  if (i === segments.length) return node.route;
  const seg = segments[i];

  const staticChild = node.staticChildren.get(seg);
  if (staticChild) {
    const found = match(staticChild, segments, i + 1, params);
    if (found) return found;
  }

  const param = node.paramChild;
  if (param?.name && seg !== '') {
    params[param.name] = decodeSegment(seg);
    const found = match(param, segments, i + 1, params);
    if (found) return found;
    delete params[param.name];
  }

  const wildcard = node.wildcardChild;
  if (wildcard?.name && wildcard.route) {
    params[wildcard.name] = decodeSegment(segments.slice(i).join('/'));
    return wildcard.route;
  }
  return undefined;
}

/**
 * Per-method segment tries. Registration happens before serving starts; after that the trees
 * are only read.
 */
export function createMatcher<H>(): Matcher<H> {
  const trees = new Map<string, Node<H>>();

  function conflict(method: string, pattern: string, segment: string, existing: Node<H>): never {
    throw new RouteConflictError(
      `'${segment}' in new path '${pattern}' conflicts with existing route '${existing.origin}' for ${method}`,
      method,
      pattern,
      existing.origin,
    );
  }

  // Checks the whole pattern against the tree before anything is inserted.
  function checkConflicts(method: string, pattern: string, segments: Segment[]) {
    let node = trees.get(method);
    for (const seg of segments) {
      if (!node) return;
      switch (seg.kind) {
        case 'static':
          if (node.wildcardChild) conflict(method, pattern, seg.value, node.wildcardChild);
          node = node.staticChildren.get(seg.value);
          break;
        case 'param':
          if (node.wildcardChild) conflict(method, pattern, `:${seg.name}`, node.wildcardChild);
          if (node.paramChild && node.paramChild.name !== seg.name) {
            conflict(method, pattern, `:${seg.name}`, node.paramChild);
          }
          node = node.paramChild;
          break;
        case 'wildcard': {
          const sibling = firstChild(node);
          if (sibling) conflict(method, pattern, `*${seg.name}`, sibling);
          if (node.wildcardChild && node.wildcardChild.name !== seg.name) {
            conflict(method, pattern, `*${seg.name}`, node.wildcardChild);
          }
          node = node.wildcardChild;
          break;
        }
      }
    }
    if (node?.route) {
      throw new RouteConflictError(
        `A handler is already registered for ${method} ${pattern}`,
        method,
        pattern,
        node.route.pattern,
      );
    }
  }

  function childFor(node: Node<H>, seg: Segment, pattern: string): Node<H> {
    if (seg.kind === 'param') return node.paramChild ??= createNode<H>(pattern, seg.name);
    if (seg.kind === 'wildcard') return node.wildcardChild ??= createNode<H>(pattern, seg.name);
    let next = node.staticChildren.get(seg.value);
    if (!next) {
      next = createNode<H>(pattern);
      node.staticChildren.set(seg.value, next);
    }
    return next;
  }

  function insert(method: string, pattern: string, segments: Segment[]): Node<H> {
    let node = trees.get(method);
    if (!node) {
      node = createNode<H>(pattern);
      trees.set(method, node);
    }
    for (const seg of segments) node = childFor(node, seg, pattern);
    return node;
  }

  function lookup(method: string, segments: string[]): { entry: RouteEntry<H>; params: Params } | undefined {
    const root = trees.get(method);
    if (!root) return undefined;
    const params: Params = Object.create(null);
    const entry = match(root, segments, 0, params);
    return entry ? { entry, params } : undefined;
  }

  return {
    register(method, pattern, key, handler) {
      const segments = parsePattern(pattern);
      checkConflicts(method, pattern, segments);
      const node = insert(method, pattern, segments);
      node.route = { key, handler, pattern };
    },
    resolve(method, path) {
      if (!path.startsWith('/')) return { kind: 'not-found' };
      const segments = splitPath(path);
      const hit = lookup(method, segments);
      if (hit) {
        return {
          kind: 'found',
          key: hit.entry.key,
          handler: hit.entry.handler,
          params: hit.params,
          pattern: hit.entry.pattern,
        };
      }
      const allowed = [...trees.keys()]
        .filter((m) => m !== method && lookup(m, segments) !== undefined)
        .sort();
      if (allowed.length) return { kind: 'method-not-allowed', allowed };
      return { kind: 'not-found' };
    },
    redirectPath(method, path) {
      if (!path.startsWith('/') || path === '/') return undefined;
      const alt = path.endsWith('/') ? path.slice(0, -1) : `${path}/`;
      return lookup(method, splitPath(alt)) ? alt : undefined;
    },
    methods() {
      return [...trees.keys()].sort();
    },
  };
}
