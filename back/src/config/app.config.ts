import { ConfigError } from "../errors/app.errors.js";

export interface DatabaseConfig {
  user: string;
  password: string;
  database: string;
  host: string;
  port: number;
}

export interface AppConfig {
  port: number;
  database: DatabaseConfig;
}

export type Env = Record<string, string | undefined>;

const REQUIRED_DATABASE_VARS = [
  "POSTGRES_USER",
  "POSTGRES_PASSWORD",
  "POSTGRES_DB",
  "POSTGRES_HOST",
] as const;

const DEFAULT_PORT = 3001;
const DEFAULT_POSTGRES_PORT = 5432;

// How the dashboard reads sales_data. Not configurable from the environment.
export const SALES_DATA_LOAD_POLICY = {
  ttlMs: 60_000,
  maxAttempts: 5,
  retryDelayMs: 10_000,
} as const;

function parsePort(
  env: Env,
  name: string,
  fallback: number,
  problems: string[],
): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    problems.push(`${name} must be a port number, got "${raw}"`);
    return fallback;
  }
  return port;
}

/**
 * Builds the application config from environment variables, reporting every
 * missing or invalid value at once.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  const required: Record<string, string> = {};
  for (const name of REQUIRED_DATABASE_VARS) {
    const value = env[name]?.trim();
    if (!value) {
      problems.push(`${name} is required`);
    } else {
      required[name] = value;
    }
  }

  const port = parsePort(env, "PORT", DEFAULT_PORT, problems);
  const postgresPort = parsePort(
    env,
    "POSTGRES_PORT",
    DEFAULT_POSTGRES_PORT,
    problems,
  );

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return {
    port,
    database: {
      user: required.POSTGRES_USER,
      password: required.POSTGRES_PASSWORD,
      database: required.POSTGRES_DB,
      host: required.POSTGRES_HOST,
      port: postgresPort,
    },
  };
}
