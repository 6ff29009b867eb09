import type { Queryable } from '../connection';

export abstract class BaseRepository {
  constructor(protected readonly db: Queryable) {}

  protected async query(text: string, params?: unknown[]) {
    return this.db.query(text, params);
  }
}
