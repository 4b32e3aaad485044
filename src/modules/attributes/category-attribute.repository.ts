import type { Queryable } from '../../connections/db/connection';
import type {
  CategoryAttribute,
  CreateCategoryAttributeInput,
  UpdateCategoryAttributeInput,
} from '../../connections/db/models/category-attribute.model';
import { NotFoundError } from '../../utils/errors';

/**
 * Row-level access to `category_attributes`. Only live rows are ever returned.
 */
export interface CategoryAttributeRepository {
  findLive(categoryId: number, attributeId: number): Promise<CategoryAttribute | null>;
  listLiveByCategory(categoryId: number): Promise<CategoryAttribute[]>;
  /** Live rows of several categories, optionally narrowed to one attribute. */
  listLiveForCategories(categoryIds: number[], attributeId?: number): Promise<CategoryAttribute[]>;
  insert(input: CreateCategoryAttributeInput): Promise<CategoryAttribute>;
  update(id: number, patch: UpdateCategoryAttributeInput): Promise<CategoryAttribute>;
  softDelete(id: number): Promise<CategoryAttribute>;
}

const BINDING_COLUMNS = `id, category_id, attribute_id, is_required, sort, inherited_from_category_id,
  created_at, updated_at, deleted_at`;

// Rows come back in the order a category lists its attributes
const BINDING_ORDER = 'ORDER BY sort ASC, created_at ASC, id ASC';

export class PgCategoryAttributeRepository implements CategoryAttributeRepository {
  constructor(private readonly db: Queryable) {}

  async findLive(categoryId: number, attributeId: number): Promise<CategoryAttribute | null> {
    const result = await this.db.query<CategoryAttribute>(
      `SELECT ${BINDING_COLUMNS} FROM category_attributes
       WHERE category_id = $1 AND attribute_id = $2 AND deleted_at IS NULL`,
      [categoryId, attributeId]
    );
    return result.rows[0] ?? null;
  }

  async listLiveByCategory(categoryId: number): Promise<CategoryAttribute[]> {
    const result = await this.db.query<CategoryAttribute>(
      `SELECT ${BINDING_COLUMNS} FROM category_attributes
       WHERE category_id = $1 AND deleted_at IS NULL
       ${BINDING_ORDER}`,
      [categoryId]
    );
    return result.rows;
  }

  async listLiveForCategories(categoryIds: number[], attributeId?: number): Promise<CategoryAttribute[]> {
    if (categoryIds.length === 0) {
      return [];
    }

    let query = `
      SELECT ${BINDING_COLUMNS} FROM category_attributes
      WHERE category_id = ANY($1::int[]) AND deleted_at IS NULL
    `;
    const params: unknown[] = [categoryIds];

    if (attributeId !== undefined) {
      query += ' AND attribute_id = $2';
      params.push(attributeId);
    }

    query += ` ${BINDING_ORDER}`;

    const result = await this.db.query<CategoryAttribute>(query, params);
    return result.rows;
  }

  async insert(input: CreateCategoryAttributeInput): Promise<CategoryAttribute> {
    const result = await this.db.query<CategoryAttribute>(
      `INSERT INTO category_attributes (category_id, attribute_id, is_required, sort, inherited_from_category_id)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${BINDING_COLUMNS}`,
      [
        input.category_id,
        input.attribute_id,
        input.is_required,
        input.sort,
        input.inherited_from_category_id ?? null,
      ]
    );
    return result.rows[0];
  }

  async update(id: number, patch: UpdateCategoryAttributeInput): Promise<CategoryAttribute> {
    const sets: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (patch.is_required !== undefined) {
      sets.push(`is_required = $${paramIndex++}`);
      params.push(patch.is_required);
    }
    if (patch.sort !== undefined) {
      sets.push(`sort = $${paramIndex++}`);
      params.push(patch.sort);
    }
    if (patch.inherited_from_category_id !== undefined) {
      sets.push(`inherited_from_category_id = $${paramIndex++}`);
      params.push(patch.inherited_from_category_id);
    }

    sets.push('updated_at = CURRENT_TIMESTAMP');
    params.push(id);

    const result = await this.db.query<CategoryAttribute>(
      `UPDATE category_attributes SET ${sets.join(', ')}
       WHERE id = $${paramIndex} AND deleted_at IS NULL
       RETURNING ${BINDING_COLUMNS}`,
      params
    );

    if (result.rows.length === 0) {
      throw new NotFoundError(`Category attribute binding ${id} not found`, 'category_attribute', id);
    }
    return result.rows[0];
  }

  async softDelete(id: number): Promise<CategoryAttribute> {
    const result = await this.db.query<CategoryAttribute>(
      `UPDATE category_attributes SET deleted_at = CURRENT_TIMESTAMP, updated_at = CURRENT_TIMESTAMP
       WHERE id = $1 AND deleted_at IS NULL
       RETURNING ${BINDING_COLUMNS}`,
      [id]
    );

    if (result.rows.length === 0) {
      throw new NotFoundError(`Category attribute binding ${id} not found`, 'category_attribute', id);
    }
    return result.rows[0];
  }
}
