import type { Queryable } from '../connection';
import type { Migration } from './types';
import { ATTRIBUTE_TYPES } from '../models/attribute.model';

const TYPE_LIST = ATTRIBUTE_TYPES.map((type) => `'${type}'`).join(', ');

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS attributes (
        id SERIAL PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        display_name VARCHAR(100) NOT NULL,
        description TEXT,
        type VARCHAR(20) NOT NULL CHECK (type IN (${TYPE_LIST})),
        unit VARCHAR(20),
        is_required BOOLEAN DEFAULT FALSE,
        default_value TEXT,
        -- [{ value, label, color?, description? }]
        options JSONB NOT NULL DEFAULT '[]'::jsonb,
        -- { min_length?, max_length?, min?, max?, pattern?, required? }
        validation JSONB NOT NULL DEFAULT '{}'::jsonb,
        sort INTEGER DEFAULT 0,
        is_active BOOLEAN DEFAULT TRUE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        deleted_at TIMESTAMP
      )
    `);

    // Names are unique among live attributes only
    await db.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS uq_attributes_name_live ON attributes(name) WHERE deleted_at IS NULL
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS uq_attributes_name_live');
    await db.query('DROP TABLE IF EXISTS attributes CASCADE');
  },
};
