// Category Model - the engine only reads categories

export interface Category {
  id: number;
  parent_id: number | null; // NULL = root category
  name: string;
  level: number; // root = 1, child = parent.level + 1
  sort: number;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null; // Soft delete
}

/**
 * The tree-shaped part of a category row that traversal needs.
 */
export type CategoryNode = Pick<Category, 'id' | 'parent_id' | 'level'>;
