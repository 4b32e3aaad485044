import type { Queryable } from '../../connections/db/connection';
import type { CategoryNode } from '../../connections/db/models/category.model';
import { cascadeConfig } from '../../connections/config/app.config';
import { CategoryCycleError, CategoryDepthError } from '../../utils/errors';

/**
 * Read-only access to the persisted parent-pointer tree.
 * Missing categories come back as null / empty, never as errors.
 */
export interface CategoryTreeRepository {
  findById(id: number): Promise<CategoryNode | null>;
  findChildren(id: number): Promise<CategoryNode[]>;
  /** Every live descendant, level by level, excluding `id` itself. */
  findDescendantIds(id: number): Promise<number[]>;
  /** Root first, `id` last; empty when `id` does not exist. */
  findAncestorPath(id: number): Promise<CategoryNode[]>;
  /** Every live category, parents before children. */
  listIds(): Promise<number[]>;
}

interface PathRow extends CategoryNode {
  depth: number;
  is_cycle: boolean;
}

interface DescendantRow {
  id: number;
  depth: number;
  is_cycle: boolean;
}

// Both walks fetch one level past the limit so that hitting it is an error, not a silent cut
const checkWalk = (rows: { id: number; depth: number; is_cycle: boolean }[], maxDepth: number) => {
  const cycle = rows.find(row => row.is_cycle);
  if (cycle) {
    throw new CategoryCycleError(cycle.id);
  }
  const tooDeep = rows.find(row => row.depth > maxDepth);
  if (tooDeep) {
    throw new CategoryDepthError(tooDeep.id, maxDepth);
  }
};

export class PgCategoryTreeRepository implements CategoryTreeRepository {
  constructor(
    private readonly db: Queryable,
    private readonly maxDepth: number = cascadeConfig.maxDepth
  ) {}

  async findById(id: number): Promise<CategoryNode | null> {
    const result = await this.db.query<CategoryNode>(
      'SELECT id, parent_id, level FROM categories WHERE id = $1 AND deleted_at IS NULL',
      [id]
    );
    return result.rows[0] ?? null;
  }

  async findChildren(id: number): Promise<CategoryNode[]> {
    const result = await this.db.query<CategoryNode>(
      `SELECT id, parent_id, level FROM categories
       WHERE parent_id = $1 AND deleted_at IS NULL
       ORDER BY id`,
      [id]
    );
    return result.rows;
  }

  async findDescendantIds(id: number): Promise<number[]> {
    const result = await this.db.query<DescendantRow>(
      `WITH RECURSIVE category_tree AS (
         SELECT c.id, 1 AS depth, ARRAY[$1::int, c.id] AS visited, c.id = $1 AS is_cycle
         FROM categories c
         WHERE c.parent_id = $1 AND c.deleted_at IS NULL

         UNION ALL

         SELECT c.id, ct.depth + 1, ct.visited || c.id, c.id = ANY(ct.visited)
         FROM categories c
         INNER JOIN category_tree ct ON c.parent_id = ct.id
         WHERE c.deleted_at IS NULL AND NOT ct.is_cycle AND ct.depth <= $2
       )
       SELECT id, depth, is_cycle FROM category_tree ORDER BY depth, id`,
      [id, this.maxDepth]
    );

    checkWalk(result.rows, this.maxDepth);
    return result.rows.map(row => row.id);
  }

  async findAncestorPath(id: number): Promise<CategoryNode[]> {
    const result = await this.db.query<PathRow>(
      `WITH RECURSIVE category_path AS (
         SELECT id, parent_id, level, 0 AS depth, ARRAY[id] AS visited, FALSE AS is_cycle
         FROM categories
         WHERE id = $1 AND deleted_at IS NULL

         UNION ALL

         SELECT c.id, c.parent_id, c.level, cp.depth + 1, cp.visited || c.id, c.id = ANY(cp.visited)
         FROM categories c
         INNER JOIN category_path cp ON c.id = cp.parent_id
         WHERE c.deleted_at IS NULL AND NOT cp.is_cycle AND cp.depth <= $2
       )
       SELECT id, parent_id, level, depth, is_cycle FROM category_path ORDER BY depth DESC`,
      [id, this.maxDepth]
    );

    checkWalk(result.rows, this.maxDepth);
    return result.rows.map(({ id: nodeId, parent_id, level }) => ({ id: nodeId, parent_id, level }));
  }

  async listIds(): Promise<number[]> {
    const result = await this.db.query<{ id: number }>(
      'SELECT id FROM categories WHERE deleted_at IS NULL ORDER BY level, sort, id'
    );
    return result.rows.map(row => row.id);
  }
}
