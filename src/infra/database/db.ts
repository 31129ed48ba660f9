/**
 * PostgreSQL audit mirror.
 * Copies every committed audit entry into `audit_log` when DATABASE_URL is set.
 * The JSON state file stays the source of truth; this table serves replay and reporting.
 */

import pg from 'pg';
import { AppConfig } from '../../config.js';
import { AuditEntry } from '../../types.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { EventLogger } from '../logger.js';
import { AuditSink } from '../storage/recordStore.js';

const { Pool } = pg;

/** The subset of `pg.Pool` the mirror relies on. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<pg.QueryResult>;
  end(): Promise<void>;
}

export type PoolFactory = (options: pg.PoolConfig) => Queryable;

const defaultPoolFactory: PoolFactory = (options) => new Pool(options);

const CREATE_AUDIT_TABLE = `
  CREATE TABLE IF NOT EXISTS audit_log (
    seq BIGINT PRIMARY KEY,
    at TIMESTAMPTZ NOT NULL,
    entity TEXT NOT NULL,
    entity_key TEXT NOT NULL,
    action TEXT NOT NULL
  )
`;

export class Database implements AuditSink {
  private pool: Queryable | null = null;

  constructor(
    private readonly config: AppConfig['database'],
    private readonly logger: EventLogger,
    private readonly poolFactory: PoolFactory = defaultPoolFactory,
  ) {}

  /**
   * Initialize the connection pool and the audit table.
   * Returns false if DATABASE_URL is not configured (mirror disabled).
   */
  async init(): Promise<boolean> {
    if (!this.config.connectionString) {
      return false;
    }

    const pool = this.poolFactory({
      connectionString: this.config.connectionString,
      max: this.config.maxConnections,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    try {
      await retryWithBackoff(() => pool.query('SELECT 1'), {
        maxAttempts: 3,
        baseDelayMs: 200,
        onRetry: ({ attempt, nextDelayMs, error }) =>
          this.logger.log('warn', 'database.connect.retry', { attempt, nextDelayMs, error: String(error) }),
      });
      await pool.query(CREATE_AUDIT_TABLE);
      this.pool = pool;
      return true;
    } catch (err) {
      await this.logger.log('error', 'database.connect.failed', { error: String(err) });
      await pool.end();
      return false;
    }
  }

  isAvailable(): boolean {
    return this.pool !== null;
  }

  async append(entries: AuditEntry[]): Promise<void> {
    if (!this.pool || entries.length === 0) return;

    const values: unknown[] = [];
    const tuples = entries.map((entry, index) => {
      const base = index * 5;
      values.push(entry.seq, entry.at, entry.entity, entry.key, entry.action);
      return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5})`;
    });

    await this.pool.query(
      `INSERT INTO audit_log (seq, at, entity, entity_key, action)
       VALUES ${tuples.join(', ')}
       ON CONFLICT (seq) DO NOTHING`,
      values,
    );
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
