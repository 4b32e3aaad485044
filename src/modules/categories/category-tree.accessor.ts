import type { CategoryNode } from '../../connections/db/models/category.model';
import { NotFoundError } from '../../utils/errors';
import type { CategoryTreeRepository } from './category-tree.repository';

/**
 * Traversal over the category tree used by every resolve and cascade.
 * Unlike the repository it treats a missing category as an error.
 */
export class CategoryTreeAccessor {
  constructor(private readonly categories: CategoryTreeRepository) {}

  async getCategory(categoryId: number): Promise<CategoryNode> {
    const category = await this.categories.findById(categoryId);
    if (!category) {
      throw new NotFoundError(`Category ${categoryId} not found`, 'category', categoryId);
    }
    return category;
  }

  async getChildren(categoryId: number): Promise<CategoryNode[]> {
    await this.getCategory(categoryId);
    return this.categories.findChildren(categoryId);
  }

  async getAllDescendants(categoryId: number): Promise<number[]> {
    await this.getCategory(categoryId);
    return this.categories.findDescendantIds(categoryId);
  }

  // Root first, target last
  async getAncestorPath(categoryId: number): Promise<CategoryNode[]> {
    const path = await this.categories.findAncestorPath(categoryId);
    if (path.length === 0) {
      throw new NotFoundError(`Category ${categoryId} not found`, 'category', categoryId);
    }
    return path;
  }

  async listCategoryIds(): Promise<number[]> {
    return this.categories.listIds();
  }
}
