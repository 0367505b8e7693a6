export interface ServerConfig {
  port: number;
  corsOrigins: string[];
  staticDir?: string;
  redirectTrailingSlash: boolean;
  handleOptions: boolean;
  strictInvariants: boolean;
}

// Single-origin CORS with sensible localhost defaults.
export const DEFAULT_ORIGINS = [
  'http://localhost:5173', 'http://127.0.0.1:5173',
  'http://localhost:3000', 'http://127.0.0.1:3000',
  'http://localhost:3001', 'http://127.0.0.1:3001',
];

function flag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  const v = raw.trim().toLowerCase();
  if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true;
  if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false;
  return fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const envOrigins = (env.CORS_ORIGIN || '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  const port = Number(env.PORT || 3001);
  return {
    port: Number.isInteger(port) && port >= 0 ? port : 3001,
    corsOrigins: envOrigins.length ? envOrigins : DEFAULT_ORIGINS,
    staticDir: env.STATIC_DIR?.trim() || undefined,
    redirectTrailingSlash: flag(env.ROUTER_REDIRECT_TRAILING_SLASH, true),
    handleOptions: flag(env.ROUTER_HANDLE_OPTIONS, true),
    strictInvariants: flag(env.ROUTER_STRICT_INVARIANTS, env.NODE_ENV !== 'production'),
  };
}
