import type { Queryable } from '../connection';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS categories (
        id SERIAL PRIMARY KEY,
        -- NULL = root category
        parent_id INTEGER REFERENCES categories(id) ON DELETE SET NULL,
        name VARCHAR(255) NOT NULL,
        -- root = 1, child = parent.level + 1
        level INTEGER NOT NULL DEFAULT 1 CHECK (level >= 1),
        sort INTEGER DEFAULT 0,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        deleted_at TIMESTAMP,
        CHECK (parent_id IS NULL OR parent_id <> id)
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_categories_parent ON categories(parent_id) WHERE deleted_at IS NULL
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_categories_level ON categories(level, sort) WHERE deleted_at IS NULL
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_categories_level');
    await db.query('DROP INDEX IF EXISTS idx_categories_parent');
    await db.query('DROP TABLE IF EXISTS categories CASCADE');
  },
};
