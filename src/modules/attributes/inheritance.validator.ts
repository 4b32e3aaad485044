import type { Database, Repositories } from '../../connections/db/database';
import { type EngineLogger, errorMessage, getModuleLogger } from '../../utils/logging';
import { CategoryTreeAccessor } from '../categories/category-tree.accessor';
import type { InheritanceResolver } from './inheritance.resolver';
import type {
  ConsistencyReport,
  RebuildAllResult,
  RebuildResult,
  ResolvedBinding,
} from './category-attributes.types';

/**
 * Compares the resolver's live view with the materialized rows and repairs drift.
 * Repair only ever inserts; rows the resolver does not account for are left in place.
 */
export class InheritanceValidator {
  constructor(
    private readonly db: Database,
    private readonly resolver: InheritanceResolver,
    private readonly log: EngineLogger = getModuleLogger('inheritance')
  ) {}

  async validateInheritanceConsistency(categoryId: number): Promise<ConsistencyReport> {
    const effective = await this.resolver.resolveEffectiveAttributes(categoryId, this.db);
    const live = new Map(
      (await this.db.categoryAttributes.listLiveByCategory(categoryId)).map((binding) => [binding.attribute_id, binding])
    );
    const issues: string[] = [];

    for (const entry of effective) {
      if (!entry.is_inherited) {
        continue;
      }
      const row = live.get(entry.attribute_id);
      if (!row) {
        issues.push(
          `inherited attribute ${entry.attribute_id} from category ${entry.inherited_from} has no materialized binding`
        );
      } else if (row.inherited_from_category_id !== null && row.inherited_from_category_id !== entry.inherited_from) {
        issues.push(
          `inherited attribute ${entry.attribute_id} is materialized from category ${row.inherited_from_category_id} but resolves from category ${entry.inherited_from}`
        );
      }
    }

    return {
      category_id: categoryId,
      is_consistent: issues.length === 0,
      issues,
    };
  }

  async rebuildInheritanceForCategory(categoryId: number): Promise<RebuildResult> {
    const inserted = await this.db.transaction(async (tx) => {
      const missing = await this.findMissing(categoryId, tx);
      const attributeIds: number[] = [];

      for (const entry of missing) {
        await tx.categoryAttributes.insert({
          category_id: categoryId,
          attribute_id: entry.attribute_id,
          is_required: entry.is_required,
          sort: entry.sort,
          inherited_from_category_id: entry.inherited_from,
        });
        attributeIds.push(entry.attribute_id);
      }

      return attributeIds;
    });

    if (inserted.length > 0) {
      this.log.info(`[Inheritance] Rebuilt category ${categoryId}`, { inserted });
    }

    return { category_id: categoryId, inserted };
  }

  // Maintenance sweep over every category; one failing category does not stop the rest
  async rebuildAll(): Promise<RebuildAllResult> {
    const categoryIds = await new CategoryTreeAccessor(this.db.categories).listCategoryIds();
    const result: RebuildAllResult = { categories: categoryIds.length, inserted: 0, failed: [] };

    for (const categoryId of categoryIds) {
      try {
        const rebuilt = await this.rebuildInheritanceForCategory(categoryId);
        result.inserted += rebuilt.inserted.length;
      } catch (error) {
        result.failed.push(categoryId);
        this.log.error(`[Inheritance] Rebuild failed for category ${categoryId}`, { error: errorMessage(error) });
      }
    }

    this.log.info('[Inheritance] Full rebuild finished', { ...result });
    return result;
  }

  private async findMissing(categoryId: number, scope: Repositories): Promise<ResolvedBinding[]> {
    const effective = await this.resolver.resolveEffectiveAttributes(categoryId, scope);
    const live = await scope.categoryAttributes.listLiveByCategory(categoryId);
    const materialized = new Set(live.map((binding) => binding.attribute_id));

    return effective.filter((entry) => entry.is_inherited && !materialized.has(entry.attribute_id));
  }
}
