import dotenv from 'dotenv';

dotenv.config();

type RequiredEnv = 'DATABASE_URL' | 'JWT_SECRET';
type EnvSource = Record<string, string | undefined>;

function requireEnv(source: EnvSource, key: RequiredEnv): string {
  const value = source[key];

  if (!value) {
    throw new Error(`Environment variable ${key} is required`);
  }

  return value;
}

export interface DatabaseEnv {
  DATABASE_URL: string;
}

export interface ServerEnv extends DatabaseEnv {
  JWT_SECRET: string;
  PORT: number;
  CORS_ORIGINS: string[];
}

/** What batch jobs need: a database and nothing else */
export function loadDatabaseEnv(source: EnvSource = process.env): DatabaseEnv {
  return { DATABASE_URL: requireEnv(source, 'DATABASE_URL') };
}

/**
 * Reads the server environment. Called once at startup so that importing
 * the config modules never throws.
 */
export function loadServerEnv(source: EnvSource = process.env): ServerEnv {
  return {
    ...loadDatabaseEnv(source),
    JWT_SECRET: requireEnv(source, 'JWT_SECRET'),
    PORT: parseInt(source.PORT || '3000', 10),
    CORS_ORIGINS: source.CORS_ORIGINS
      ? source.CORS_ORIGINS.split(',').map((o) => o.trim())
      : ['http://localhost:5173', 'http://localhost:3001'], // Dev defaults
  };
}
