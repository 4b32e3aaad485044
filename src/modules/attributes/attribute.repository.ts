import type { Queryable } from '../../connections/db/connection';
import type { Attribute } from '../../connections/db/models/attribute.model';

/**
 * What the engine consumes from the attribute definition store.
 */
export interface AttributeRepository {
  attributeExists(id: number): Promise<boolean>;
  getAttribute(id: number): Promise<Attribute | null>;
}

const ATTRIBUTE_COLUMNS = `id, name, display_name, description, type, unit, is_required, default_value,
  options, validation, sort, is_active, created_at, updated_at, deleted_at`;

export class PgAttributeRepository implements AttributeRepository {
  constructor(private readonly db: Queryable) {}

  async attributeExists(id: number): Promise<boolean> {
    const result = await this.db.query<{ id: number }>(
      'SELECT id FROM attributes WHERE id = $1 AND deleted_at IS NULL',
      [id]
    );
    return result.rows.length > 0;
  }

  async getAttribute(id: number): Promise<Attribute | null> {
    const result = await this.db.query<Attribute>(
      `SELECT ${ATTRIBUTE_COLUMNS} FROM attributes WHERE id = $1 AND deleted_at IS NULL`,
      [id]
    );
    return result.rows[0] ?? null;
  }
}
