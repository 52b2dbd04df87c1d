import { z } from 'zod';

export const REVIEWS_TABLE = 'REVIEWS_WITH_SENTIMENT';
export const DEFAULT_TOKEN_PATH = '/snowflake/session/token';

export class ConfigError extends Error {
  constructor(message: string, public readonly missing: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

const boolFlag = z
  .string()
  .optional()
  .transform(v => ['1', 'true', 'yes', 'on'].includes(String(v ?? '').trim().toLowerCase()));

const serverSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  WEB_ORIGIN: z.string().min(1).default('http://localhost:5173'),
  ALLOW_NO_DB: boolFlag,
  SNOWFLAKE_TOKEN_PATH: z.string().min(1).default(DEFAULT_TOKEN_PATH),
  CHAT_SESSION_IDLE_MINUTES: z.coerce.number().positive().default(120),
  CHAT_MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
});

export type ServerConfig = {
  port: number;
  webOrigin: string;
  allowNoDb: boolean;
  tokenPath: string;
  sessionIdleMs: number;
  maxSessions: number;
};

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = serverSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(i => i.path.join('.'));
    throw new ConfigError(`Invalid server configuration: ${fields.join(', ')}`);
  }
  return {
    port: parsed.data.PORT,
    webOrigin: parsed.data.WEB_ORIGIN,
    allowNoDb: parsed.data.ALLOW_NO_DB,
    tokenPath: parsed.data.SNOWFLAKE_TOKEN_PATH,
    sessionIdleMs: parsed.data.CHAT_SESSION_IDLE_MINUTES * 60_000,
    maxSessions: parsed.data.CHAT_MAX_SESSIONS,
  };
}

// Every key is required: the connection is refused by the warehouse otherwise
const required = z.string().trim().min(1);

const credentialsSchema = z.object({
  SNOWFLAKE_ACCOUNT: required,
  SNOWFLAKE_USER: required,
  SNOWFLAKE_PASSWORD: required,
  SNOWFLAKE_ROLE: required,
  SNOWFLAKE_WAREHOUSE: required,
  SNOWFLAKE_DATABASE: required,
  SNOWFLAKE_SCHEMA: required,
});

export type WarehouseCredentials = {
  account: string;
  user: string;
  password: string;
  role: string;
  warehouse: string;
  database: string;
  schema: string;
};

export function loadWarehouseCredentials(env: NodeJS.ProcessEnv = process.env): WarehouseCredentials {
  const parsed = credentialsSchema.safeParse(env);
  if (!parsed.success) {
    const missing = [...new Set(parsed.error.issues.map(i => String(i.path[0])))];
    throw new ConfigError(`Missing warehouse credentials: ${missing.join(', ')}`, missing);
  }
  const d = parsed.data;
  return {
    account: d.SNOWFLAKE_ACCOUNT,
    user: d.SNOWFLAKE_USER,
    password: d.SNOWFLAKE_PASSWORD,
    role: d.SNOWFLAKE_ROLE,
    warehouse: d.SNOWFLAKE_WAREHOUSE,
    database: d.SNOWFLAKE_DATABASE,
    schema: d.SNOWFLAKE_SCHEMA,
  };
}

const ambientSchema = z.object({
  SNOWFLAKE_HOST: required,
  SNOWFLAKE_ACCOUNT: required,
  SNOWFLAKE_DATABASE: required,
  SNOWFLAKE_SCHEMA: required,
  SNOWFLAKE_WAREHOUSE: z.string().trim().min(1).optional(),
});

export type AmbientSettings = {
  host: string;
  account: string;
  database: string;
  schema: string;
  warehouse?: string;
};

// Variables the container runtime injects next to the session token
export function loadAmbientSettings(env: NodeJS.ProcessEnv = process.env): AmbientSettings {
  const parsed = ambientSchema.safeParse(env);
  if (!parsed.success) {
    const missing = [...new Set(parsed.error.issues.map(i => String(i.path[0])))];
    throw new ConfigError(`Ambient session is missing: ${missing.join(', ')}`, missing);
  }
  const d = parsed.data;
  return {
    host: d.SNOWFLAKE_HOST,
    account: d.SNOWFLAKE_ACCOUNT,
    database: d.SNOWFLAKE_DATABASE,
    schema: d.SNOWFLAKE_SCHEMA,
    warehouse: d.SNOWFLAKE_WAREHOUSE,
  };
}
