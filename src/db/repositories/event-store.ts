import * as fs from 'fs';
import * as path from 'path';
import { BaseRepository } from './base-repository';
import type { Queryable } from '../connection';
import { StoreError } from '../../errors';

/**
 * Persistent dedup ledger keyed by (repository, issue number)
 */
export interface EventStore {
  /** Whether a notification was already dispatched or attempted for this issue */
  hasSeen(repository: string, issueNumber: number): Promise<boolean>;
  /**
   * Record the issue. Re-recording an existing key is not an error.
   * Resolves true only for the call that created the record, so concurrent
   * deliveries of the same issue race on the unique key and exactly one wins.
   */
  markSeen(repository: string, issueNumber: number, notifiedAt: Date): Promise<boolean>;
  /** Lightweight round-trip used by the health check */
  ping(): Promise<boolean>;
}

export const DEFAULT_MIGRATIONS_DIR = path.join(process.cwd(), 'migrations');

/**
 * EventStore backed by the `notified_issues` table. The primary key on
 * (repository, issue_number) makes the insert the atomic check-then-insert.
 */
export class PostgresEventStore extends BaseRepository implements EventStore {
  constructor(
    db: Queryable,
    private readonly migrationsDir: string = DEFAULT_MIGRATIONS_DIR
  ) {
    super(db);
  }

  async hasSeen(repository: string, issueNumber: number): Promise<boolean> {
    try {
      const result = await this.query(
        `SELECT 1 FROM notified_issues
         WHERE repository = $1 AND issue_number = $2
         LIMIT 1`,
        [repository, issueNumber]
      );
      return result.rows.length > 0;
    } catch (error) {
      throw new StoreError(`Dedup lookup failed for ${repository}#${issueNumber}`, error);
    }
  }

  async markSeen(repository: string, issueNumber: number, notifiedAt: Date): Promise<boolean> {
    try {
      const result = await this.query(
        `INSERT INTO notified_issues (repository, issue_number, notified_at)
         VALUES ($1, $2, $3)
         ON CONFLICT (repository, issue_number) DO NOTHING`,
        [repository, issueNumber, notifiedAt]
      );
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      throw new StoreError(`Dedup insert failed for ${repository}#${issueNumber}`, error);
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Apply every .sql file in the migrations directory, in name order.
   * Migrations are written to be idempotent and run on every startup.
   */
  async migrate(): Promise<string[]> {
    if (!fs.existsSync(this.migrationsDir)) {
      throw new StoreError(`Migrations directory not found: ${this.migrationsDir}`);
    }

    const files = fs
      .readdirSync(this.migrationsDir)
      .filter((f) => f.endsWith('.sql'))
      .sort();

    for (const file of files) {
      const sql = fs.readFileSync(path.join(this.migrationsDir, file), 'utf-8');
      try {
        await this.query(sql);
      } catch (error) {
        throw new StoreError(`Migration ${file} failed`, error);
      }
    }

    return files;
  }
}
