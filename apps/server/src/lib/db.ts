import { normalizeRows, truncateSql } from './query-utils';
import { logEvent, logQueryError } from './logger';
import type { SessionKind, SessionProvider, WarehouseConnection } from './session-provider';
import type { ReviewTable } from '../types';

// Custom error class for database operations
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly sqlState?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export interface QueryExecutor {
  run(sql: string): Promise<ReviewTable>;
}

// What the health check may know about the session without issuing SQL
export interface SessionStatus {
  readonly sessionKind: SessionKind;
  isConnected(): Promise<boolean>;
}

const FRIENDLY_MESSAGES: Record<string, string> = {
  '002003': 'Table or view does not exist or is not authorized',
  '000904': 'Invalid identifier',
  '001003': 'SQL compilation error',
  '000606': 'No active warehouse selected for this session',
  '390100': 'Incorrect username or password',
  '390144': 'Session token is invalid or expired',
  '390318': 'OAuth access token expired',
};

function readField(err: unknown, key: 'code' | 'sqlState'): string | undefined {
  if (!err || typeof err !== 'object' || !(key in err)) return undefined;
  const v: unknown = Reflect.get(err, key);
  return v == null ? undefined : String(v);
}

export function toDatabaseError(err: unknown, sql: string): DatabaseError {
  if (err instanceof DatabaseError) return err;
  const code = readField(err, 'code');
  const sqlState = readField(err, 'sqlState');
  const original = err instanceof Error ? err.message : String(err);
  const message = (code && FRIENDLY_MESSAGES[code]) || 'Database query failed';
  return new DatabaseError(message, code, sqlState, {
    sql: truncateSql(sql),
    originalError: original,
  });
}

// Column order comes from statement metadata when the driver exposes it
function statementColumns(stmt: unknown): string[] | null {
  if (!stmt || typeof stmt !== 'object' || !('getColumns' in stmt)) return null;
  if (typeof stmt.getColumns !== 'function') return null;
  const cols: unknown = stmt.getColumns();
  if (!Array.isArray(cols)) return null;
  const names: string[] = [];
  for (const c of cols) {
    if (!c || typeof c !== 'object' || !('getName' in c) || typeof c.getName !== 'function') return null;
    names.push(String(c.getName()));
  }
  return names;
}

function execute(connection: WarehouseConnection, sql: string): Promise<ReviewTable> {
  return new Promise((resolve, reject) => {
    connection.execute({
      sqlText: sql,
      complete: (err, stmt, rows) => {
        if (err) {
          reject(err);
          return;
        }
        const normalized = normalizeRows(rows ?? []);
        const columns = statementColumns(stmt) ?? (normalized.length ? Object.keys(normalized[0]) : []);
        resolve({ columns, rows: normalized });
      },
    });
  });
}

/**
 * Runs literal SQL over one warehouse session. The session is opened on first
 * use and reused for the rest of the process; each call makes a single attempt.
 */
export class SnowflakeQueryExecutor implements QueryExecutor, SessionStatus {
  private connection: Promise<WarehouseConnection> | null = null;

  constructor(private readonly sessions: SessionProvider) {}

  get sessionKind(): SessionKind {
    return this.sessions.kind;
  }

  private session(): Promise<WarehouseConnection> {
    if (!this.connection) {
      const pending = this.sessions.connect();
      this.connection = pending;
      void pending.then(
        () => logEvent('Warehouse session opened', { provider: this.sessions.kind }),
        () => {
          // Forget the failed attempt so the next user action opens a fresh one
          if (this.connection === pending) this.connection = null;
        }
      );
    }
    return this.connection;
  }

  async run(sql: string): Promise<ReviewTable> {
    try {
      const connection = await this.session();
      console.log('Executing SQL:', truncateSql(sql));
      return await execute(connection, sql);
    } catch (err: unknown) {
      logQueryError('Database error in run', err, { sql: truncateSql(sql) });
      throw toDatabaseError(err, sql);
    }
  }

  async isConnected(): Promise<boolean> {
    if (!this.connection) return false;
    try {
      return (await this.connection).isUp();
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    if (!this.connection) return;
    const pending = this.connection;
    this.connection = null;
    let connection: WarehouseConnection;
    try {
      connection = await pending;
    } catch {
      // Never opened; nothing to release
      return;
    }
    await new Promise<void>((resolve, reject) => {
      connection.destroy(err => (err ? reject(new DatabaseError('Failed to close warehouse session', readField(err, 'code'))) : resolve()));
    });
    logEvent('Warehouse session closed');
  }
}
