import 'dotenv/config';

export type ConnectPolicy = 'acknowledge' | 'reject';

export interface ServerConfig {
  port: number;
  host: string;
  debug: boolean;
  logLevel: string;
  bodyLimitBytes: number;
  credentials: {
    username: string;
    password: string;
  };
  connectPolicy: ConnectPolicy;
}

type Env = Record<string, string | undefined>;

const DEFAULT_BODY_LIMIT = 5 * 1024 * 1024; // 5 MiB

const truthy = (v?: string) => /^(1|true|yes|on)$/i.test(v || '');

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = parseInt(raw || '', 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function connectPolicy(raw: string | undefined): ConnectPolicy {
  return raw?.toLowerCase() === 'reject' ? 'reject' : 'acknowledge';
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const debug = truthy(env.DEBUG);
  return {
    port: positiveInt(env.PORT, 8000),
    host: env.HOST || '0.0.0.0',
    debug,
    logLevel: env.LOG_LEVEL || (debug ? 'debug' : 'info'),
    bodyLimitBytes: positiveInt(env.BODY_LIMIT_BYTES, DEFAULT_BODY_LIMIT),
    credentials: {
      username: env.MOCK_USERNAME || 'admin',
      password: env.MOCK_PASSWORD || 'password',
    },
    connectPolicy: connectPolicy(env.CONNECT_POLICY),
  };
}

export const config = loadConfig();
