import type { Database, Repositories } from '../../connections/db/database';
import {
  type CategoryAttribute,
  isDirectBinding,
} from '../../connections/db/models/category-attribute.model';
import {
  DuplicateBindingError,
  NotFoundError,
  ValidationError,
  PG_UNIQUE_VIOLATION,
  getPgErrorCode,
} from '../../utils/errors';
import type { BindAttributeInput, BindingPatch } from './category-attributes.types';

const bindingNotFound = (categoryId: number, attributeId: number) =>
  new NotFoundError(
    `Attribute ${attributeId} is not directly bound to category ${categoryId}`,
    'category_attribute',
    attributeId
  );

/**
 * Direct (category, attribute) bindings.
 *
 * A live row whose `inherited_from_category_id` is set is a materialized copy of an
 * ancestor's binding: binding the pair explicitly promotes it to a direct binding,
 * while unbind and update only ever address direct rows.
 */
export class CategoryAttributeStore {
  constructor(private readonly db: Database) {}

  async bind(categoryId: number, attributeId: number, isRequired: boolean, sort: number): Promise<CategoryAttribute> {
    try {
      return await this.db.transaction((tx) =>
        this.bindWithin(tx, categoryId, { attribute_id: attributeId, is_required: isRequired, sort })
      );
    } catch (error) {
      throw this.translateUniqueViolation(error, categoryId, attributeId);
    }
  }

  async unbind(categoryId: number, attributeId: number): Promise<CategoryAttribute> {
    return this.db.transaction(async (tx) => {
      const existing = await tx.categoryAttributes.findLive(categoryId, attributeId);
      if (!existing || !isDirectBinding(existing)) {
        throw bindingNotFound(categoryId, attributeId);
      }
      return tx.categoryAttributes.softDelete(existing.id);
    });
  }

  async updateBinding(categoryId: number, attributeId: number, patch: BindingPatch): Promise<CategoryAttribute> {
    return this.db.transaction(async (tx) => {
      const existing = await tx.categoryAttributes.findLive(categoryId, attributeId);
      if (!existing || !isDirectBinding(existing)) {
        throw bindingNotFound(categoryId, attributeId);
      }
      if (patch.is_required === undefined && patch.sort === undefined) {
        return existing;
      }
      return tx.categoryAttributes.update(existing.id, patch);
    });
  }

  async exists(categoryId: number, attributeId: number): Promise<boolean> {
    const binding = await this.db.categoryAttributes.findLive(categoryId, attributeId);
    return binding !== null;
  }

  async getDirectBinding(categoryId: number, attributeId: number): Promise<CategoryAttribute> {
    const binding = await this.db.categoryAttributes.findLive(categoryId, attributeId);
    if (!binding || !isDirectBinding(binding)) {
      throw bindingNotFound(categoryId, attributeId);
    }
    return binding;
  }

  async listDirectByCategory(categoryId: number): Promise<CategoryAttribute[]> {
    const bindings = await this.db.categoryAttributes.listLiveByCategory(categoryId);
    return bindings.filter(isDirectBinding);
  }

  /**
   * All-or-nothing: every item is checked and written inside one transaction.
   */
  async batchBind(categoryId: number, items: BindAttributeInput[]): Promise<CategoryAttribute[]> {
    if (items.length === 0) {
      throw new ValidationError('Batch must contain at least one attribute');
    }

    const seen = new Set<number>();
    items.forEach((item, index) => {
      if (seen.has(item.attribute_id)) {
        throw new ValidationError(
          `Attribute ${item.attribute_id} appears more than once in the batch (item ${index + 1})`,
          { attribute_id: item.attribute_id, position: index + 1 }
        );
      }
      seen.add(item.attribute_id);
    });

    try {
      return await this.db.transaction(async (tx) => {
        const bindings: CategoryAttribute[] = [];
        for (const [index, item] of items.entries()) {
          if (!(await tx.attributes.attributeExists(item.attribute_id))) {
            throw new ValidationError(
              `Attribute ${item.attribute_id} (item ${index + 1}) does not exist`,
              { attribute_id: item.attribute_id, position: index + 1 }
            );
          }
          bindings.push(await this.bindWithin(tx, categoryId, item));
        }
        return bindings;
      });
    } catch (error) {
      throw this.translateUniqueViolation(error, categoryId, null);
    }
  }

  private async bindWithin(tx: Repositories, categoryId: number, item: BindAttributeInput): Promise<CategoryAttribute> {
    const existing = await tx.categoryAttributes.findLive(categoryId, item.attribute_id);

    if (existing && isDirectBinding(existing)) {
      throw new DuplicateBindingError(categoryId, item.attribute_id);
    }

    if (existing) {
      // explicit bind over an inherited copy becomes this category's own override
      return tx.categoryAttributes.update(existing.id, {
        is_required: item.is_required,
        sort: item.sort,
        inherited_from_category_id: null,
      });
    }

    return tx.categoryAttributes.insert({
      category_id: categoryId,
      attribute_id: item.attribute_id,
      is_required: item.is_required,
      sort: item.sort,
      inherited_from_category_id: null,
    });
  }

  // Two concurrent binds can both pass the existence check; the partial unique index catches the loser
  private translateUniqueViolation(error: unknown, categoryId: number, attributeId: number | null): unknown {
    if (getPgErrorCode(error) !== PG_UNIQUE_VIOLATION) {
      return error;
    }
    return new DuplicateBindingError(categoryId, attributeId);
  }
}
