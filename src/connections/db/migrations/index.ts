import type { MigrationInfo } from './types';

import * as migration001 from './20260301_000001_create_categories_table';
import * as migration002 from './20260301_000002_create_attributes_table';
import * as migration003 from './20260301_000003_create_category_attributes_table';

export const migrations: MigrationInfo[] = [
  { name: '20260301_000001_create_categories_table', migration: migration001.migration },
  { name: '20260301_000002_create_attributes_table', migration: migration002.migration },
  { name: '20260301_000003_create_category_attributes_table', migration: migration003.migration },
];
