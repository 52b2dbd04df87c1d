import fs from 'fs';
import snowflake from 'snowflake-sdk';
import {
  loadAmbientSettings,
  loadWarehouseCredentials,
  type AmbientSettings,
  type WarehouseCredentials,
} from './config';

export type StatementCallback = (err: Error | undefined, stmt: unknown, rows: unknown[] | undefined) => void;

// The slice of the driver connection the executor relies on
export interface WarehouseConnection {
  execute(options: { sqlText: string; complete: StatementCallback }): unknown;
  destroy(callback: (err: Error | undefined, conn: unknown) => void): unknown;
  isUp(): boolean;
}

interface PendingConnection extends WarehouseConnection {
  connect(callback: (err: Error | undefined, conn: unknown) => void): unknown;
}

export type SessionKind = 'ambient' | 'credentials';

export interface SessionProvider {
  readonly kind: SessionKind;
  connect(): Promise<WarehouseConnection>;
}

function open(connection: PendingConnection): Promise<WarehouseConnection> {
  return new Promise((resolve, reject) => {
    connection.connect(err => {
      if (err) reject(err);
      else resolve(connection);
    });
  });
}

/**
 * Session handed to processes running inside the warehouse's container
 * services: an OAuth token file plus host/account/database variables.
 */
export class AmbientSessionProvider implements SessionProvider {
  readonly kind = 'ambient' as const;
  private readonly settings: AmbientSettings;

  constructor(private readonly tokenPath: string, env: NodeJS.ProcessEnv = process.env) {
    this.settings = loadAmbientSettings(env);
  }

  async connect(): Promise<WarehouseConnection> {
    const token = fs.readFileSync(this.tokenPath, 'ascii').trim();
    const s = this.settings;
    return open(snowflake.createConnection({
      accessUrl: `https://${s.host}`,
      account: s.account,
      authenticator: 'OAUTH',
      token,
      database: s.database,
      schema: s.schema,
      ...(s.warehouse ? { warehouse: s.warehouse } : {}),
    }));
  }
}

export class CredentialsSessionProvider implements SessionProvider {
  readonly kind = 'credentials' as const;
  private readonly credentials: WarehouseCredentials;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.credentials = loadWarehouseCredentials(env);
  }

  async connect(): Promise<WarehouseConnection> {
    const c = this.credentials;
    return open(snowflake.createConnection({
      account: c.account,
      username: c.user,
      password: c.password,
      role: c.role,
      warehouse: c.warehouse,
      database: c.database,
      schema: c.schema,
    }));
  }
}

export function selectSessionProvider(
  tokenPath: string,
  env: NodeJS.ProcessEnv = process.env,
  fileExists: (path: string) => boolean = fs.existsSync
): SessionProvider {
  if (fileExists(tokenPath)) {
    return new AmbientSessionProvider(tokenPath, env);
  }
  return new CredentialsSessionProvider(env);
}
