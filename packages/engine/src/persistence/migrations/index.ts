import type { Migration } from '@batchpay/sqlite';

import * as initialSchema from './001_initial_schema.js';

export const engineMigrations: Record<string, Migration> = {
  '001_initial_schema': initialSchema,
};
