/**
 * Server configuration — read once from the environment.
 */

/** Used only outside production so a fresh checkout starts without setup. */
const DEVELOPMENT_PROFILE_SECRET = 'esmp-development-profile-secret';

export interface ServerConfig {
  /** HTTP profile/group API port. */
  port: number;
  /** TCP envelope listener port. */
  esmpPort: number;
  host: string;
  dbPath: string;
  /** Server-held secret the profile address encryption keys derive from. */
  profileSecret: string;
  /** Longest accepted envelope line, in bytes. */
  maxLineBytes: number;
  /** Allowed distance between a signed request's X-Timestamp and server time. */
  maxClockSkewMs: number;
}

function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * Build the config from environment variables. Throws on values that cannot be used.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const profileSecret = env.PROFILE_SECRET?.trim() || null;
  if (!profileSecret && env.NODE_ENV === 'production') {
    throw new Error('PROFILE_SECRET is required in production');
  }

  return {
    port: intFromEnv(env, 'PORT', 8080),
    esmpPort: intFromEnv(env, 'ESMP_PORT', 5888),
    host: env.HOST ?? '0.0.0.0',
    dbPath: env.DB_PATH || './data/esmp.db',
    profileSecret: profileSecret ?? DEVELOPMENT_PROFILE_SECRET,
    maxLineBytes: intFromEnv(env, 'MAX_LINE_BYTES', 64 * 1024),
    maxClockSkewMs: intFromEnv(env, 'MAX_CLOCK_SKEW_MS', 5 * 60 * 1000),
  };
}
