import type { Queryable } from '../connection';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS category_attributes (
        id SERIAL PRIMARY KEY,
        category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE CASCADE,
        attribute_id INTEGER NOT NULL REFERENCES attributes(id) ON DELETE CASCADE,
        is_required BOOLEAN NOT NULL DEFAULT FALSE,
        sort INTEGER NOT NULL DEFAULT 0,
        -- NULL = direct binding, otherwise the ancestor this row was copied from
        inherited_from_category_id INTEGER REFERENCES categories(id) ON DELETE SET NULL,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        deleted_at TIMESTAMP
      )
    `);

    // One live binding per pair; soft-deleted rows may repeat
    await db.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS uq_category_attributes_live
      ON category_attributes(category_id, attribute_id) WHERE deleted_at IS NULL
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_category_attributes_attribute
      ON category_attributes(attribute_id) WHERE deleted_at IS NULL
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_category_attributes_source
      ON category_attributes(inherited_from_category_id) WHERE deleted_at IS NULL
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_category_attributes_source');
    await db.query('DROP INDEX IF EXISTS idx_category_attributes_attribute');
    await db.query('DROP INDEX IF EXISTS uq_category_attributes_live');
    await db.query('DROP TABLE IF EXISTS category_attributes CASCADE');
  },
};
