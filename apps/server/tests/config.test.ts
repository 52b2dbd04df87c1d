import { describe, expect, it } from 'vitest';
import { ConfigError, DEFAULT_TOKEN_PATH, loadServerConfig, loadWarehouseCredentials } from '../src/lib/config';

describe('loadServerConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadServerConfig({})).toEqual({
      port: 3001,
      webOrigin: 'http://localhost:5173',
      allowNoDb: false,
      tokenPath: DEFAULT_TOKEN_PATH,
      sessionIdleMs: 7_200_000,
      maxSessions: 1000,
    });
  });

  it('reads overrides', () => {
    const config = loadServerConfig({ PORT: '8080', ALLOW_NO_DB: 'TRUE', SNOWFLAKE_TOKEN_PATH: '/tmp/token' });
    expect(config.port).toBe(8080);
    expect(config.allowNoDb).toBe(true);
    expect(config.tokenPath).toBe('/tmp/token');
  });

  it('reads the chat session limits', () => {
    const config = loadServerConfig({ CHAT_SESSION_IDLE_MINUTES: '15', CHAT_MAX_SESSIONS: '50' });
    expect(config.sessionIdleMs).toBe(900_000);
    expect(config.maxSessions).toBe(50);
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadServerConfig({ PORT: 'abc' })).toThrow('Invalid server configuration: PORT');
  });
});

describe('loadWarehouseCredentials', () => {
  const complete = {
    SNOWFLAKE_ACCOUNT: 'acct',
    SNOWFLAKE_USER: 'analyst',
    SNOWFLAKE_PASSWORD: 'test-secret',
    SNOWFLAKE_ROLE: 'ANALYST',
    SNOWFLAKE_WAREHOUSE: 'WH',
    SNOWFLAKE_DATABASE: 'DB',
    SNOWFLAKE_SCHEMA: 'PUBLIC',
  };

  it('maps every variable', () => {
    expect(loadWarehouseCredentials(complete)).toEqual({
      account: 'acct',
      user: 'analyst',
      password: 'test-secret',
      role: 'ANALYST',
      warehouse: 'WH',
      database: 'DB',
      schema: 'PUBLIC',
    });
  });

  it('names every missing or blank variable', () => {
    let caught: unknown;
    try {
      loadWarehouseCredentials({ ...complete, SNOWFLAKE_ROLE: '  ', SNOWFLAKE_SCHEMA: undefined });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      message: 'Missing warehouse credentials: SNOWFLAKE_ROLE, SNOWFLAKE_SCHEMA',
      missing: ['SNOWFLAKE_ROLE', 'SNOWFLAKE_SCHEMA'],
    });
  });
});
