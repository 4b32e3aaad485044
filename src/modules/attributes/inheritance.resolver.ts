import type { Repositories } from '../../connections/db/database';
import {
  type CategoryAttribute,
  isDirectBinding,
} from '../../connections/db/models/category-attribute.model';
import { CategoryTreeAccessor } from '../categories/category-tree.accessor';
import {
  type InheritanceSummary,
  type ResolvedBinding,
  toResolvedBinding,
} from './category-attributes.types';

/**
 * Computes effective attribute sets by walking the ancestor path live.
 *
 * Only direct bindings take part in the walk. Materialized copies repeat what an
 * ancestor already says, so reads never depend on cascades having run.
 */
export class InheritanceResolver {
  constructor(private readonly repositories: Repositories) {}

  /**
   * Closest-wins merge of the direct bindings from the root down to `categoryId`.
   * Entries keep the order in which their attribute first appears on the path.
   */
  async resolveEffectiveAttributes(
    categoryId: number,
    scope: Repositories = this.repositories
  ): Promise<ResolvedBinding[]> {
    const { path, bindingsByCategory } = await this.loadPath(categoryId, scope);

    const merged = new Map<number, { owner: number; binding: CategoryAttribute }>();
    for (const category of path) {
      for (const binding of bindingsByCategory.get(category.id) ?? []) {
        merged.set(binding.attribute_id, { owner: category.id, binding });
      }
    }

    return [...merged.values()].map(({ owner, binding }) => toResolvedBinding(binding, owner, categoryId));
  }

  /**
   * Every direct binding of one attribute along the path, root first.
   * The last entry is the one that wins.
   */
  async resolveInheritancePath(
    categoryId: number,
    attributeId: number,
    scope: Repositories = this.repositories
  ): Promise<ResolvedBinding[]> {
    const { path, bindingsByCategory } = await this.loadPath(categoryId, scope, attributeId);

    return path.flatMap((category) =>
      (bindingsByCategory.get(category.id) ?? []).map((binding) =>
        toResolvedBinding(binding, category.id, categoryId)
      )
    );
  }

  async summarize(categoryId: number, scope: Repositories = this.repositories): Promise<InheritanceSummary> {
    const effective = await this.resolveEffectiveAttributes(categoryId, scope);
    const inherited = effective.filter((entry) => entry.is_inherited).length;
    return {
      category_id: categoryId,
      total_attributes: effective.length,
      own_attributes: effective.length - inherited,
      inherited_attributes: inherited,
    };
  }

  private async loadPath(categoryId: number, scope: Repositories, attributeId?: number) {
    const path = await new CategoryTreeAccessor(scope.categories).getAncestorPath(categoryId);
    const bindings = await scope.categoryAttributes.listLiveForCategories(
      path.map((category) => category.id),
      attributeId
    );

    const bindingsByCategory = new Map<number, CategoryAttribute[]>();
    for (const binding of bindings.filter(isDirectBinding)) {
      const list = bindingsByCategory.get(binding.category_id) ?? [];
      list.push(binding);
      bindingsByCategory.set(binding.category_id, list);
    }

    return { path, bindingsByCategory };
  }
}
