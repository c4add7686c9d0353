import { getLogger, type Logger } from '@batchpay/logger';
import type { Kysely } from '@batchpay/sqlite';

import type { EngineDatabase } from '../schema.js';

export type EngineDB = Kysely<EngineDatabase>;

export abstract class BaseRepository {
  protected readonly db: EngineDB;
  protected readonly logger: Logger;

  constructor(db: EngineDB, repositoryName: string) {
    this.db = db;
    this.logger = getLogger(repositoryName);
  }

  protected getCurrentDateTimeForDB(): string {
    return new Date().toISOString();
  }
}
