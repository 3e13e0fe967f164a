import { Pool, types } from 'pg';

// timestamp without time zone
const TIMESTAMP_OID = 1114;

const POOL_MIN = 1;
const POOL_MAX = 5;
const COMMAND_TIMEOUT_MS = 10_000;
const CONNECT_TIMEOUT_MS = 10_000;

/**
 * oauth_connections stores naive timestamps in UTC. pg's default parser reads them in the
 * process's local zone.
 */
export function parseUtcTimestamp(value: string): Date {
  return new Date(`${value.replace(' ', 'T').replace(/(\.\d{3})\d+/, '$1')}Z`);
}

types.setTypeParser(TIMESTAMP_OID, parseUtcTimestamp);

/**
 * Lazily-created PostgreSQL pool for the shared oauth_connections store.
 * One pool per process; closed on shutdown. pool.query() checks a client out and
 * releases it for every statement, including failed ones.
 */
export class Database {
  private pool: Pool | null = null;

  constructor(private readonly connectionString: string) {}

  getPool(): Pool {
    if (!this.pool) {
      this.pool = new Pool({
        connectionString: this.connectionString,
        min: POOL_MIN,
        max: POOL_MAX,
        connectionTimeoutMillis: CONNECT_TIMEOUT_MS,
        statement_timeout: COMMAND_TIMEOUT_MS,
      });

      this.pool.on('error', (err) => {
        console.error('PostgreSQL pool error:', err.message);
      });
    }
    return this.pool;
  }

  async ping(): Promise<void> {
    await this.getPool().query('SELECT 1');
  }

  async close(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.end();
      console.log('PostgreSQL pool closed');
    }
  }
}
