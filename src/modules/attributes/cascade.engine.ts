import type { Database, Repositories, TransactionContext } from '../../connections/db/database';
import { type CategoryAttribute, isDirectBinding } from '../../connections/db/models/category-attribute.model';
import { type EngineLogger, errorMessage, getModuleLogger } from '../../utils/logging';
import { CategoryTreeAccessor } from '../categories/category-tree.accessor';
import {
  type BindingPatch,
  type CascadeOperation,
  type CascadeReport,
  CascadeWarning,
} from './category-attributes.types';

type StepOutcome = 'applied' | 'skipped';

type CascadeStep = (tx: TransactionContext, descendantId: number) => Promise<StepOutcome>;

const emptyReport = (operation: CascadeOperation, sourceCategoryId: number, attributeId: number): CascadeReport => ({
  operation,
  source_category_id: sourceCategoryId,
  attribute_id: attributeId,
  total_descendants: 0,
  applied: 0,
  skipped: 0,
  failed: 0,
  warnings: [],
  aborted: false,
});

/**
 * Propagates a direct bind / unbind / update on a category to its descendants.
 *
 * Each cascade is one transaction and each descendant runs under its own savepoint.
 * A failing descendant is rolled back alone and recorded as a warning.
 */
export class CascadeEngine {
  constructor(
    private readonly db: Database,
    private readonly log: EngineLogger = getModuleLogger('cascade')
  ) {}

  /**
   * Copies the binding to every descendant that has no live row for the attribute.
   * A copy taken from an ancestor of the source is re-pointed at the source when
   * nothing between them overrides it. Any other live row is left alone.
   */
  async cascadeBind(
    sourceCategoryId: number,
    attributeId: number,
    isRequired: boolean,
    sort: number
  ): Promise<CascadeReport> {
    return this.run('bind', sourceCategoryId, attributeId, async (tx, descendantId) => {
      const existing = await tx.categoryAttributes.findLive(descendantId, attributeId);
      if (!existing) {
        await tx.categoryAttributes.insert({
          category_id: descendantId,
          attribute_id: attributeId,
          is_required: isRequired,
          sort,
          inherited_from_category_id: sourceCategoryId,
        });
        return 'applied';
      }
      if (!(await this.isShadowedCopy(tx, existing, sourceCategoryId))) {
        return 'skipped';
      }
      await tx.categoryAttributes.update(existing.id, {
        is_required: isRequired,
        sort,
        inherited_from_category_id: sourceCategoryId,
      });
      return 'applied';
    });
  }

  /**
   * Removes the copies that provably came from `sourceCategoryId`. It does not
   * re-materialize from the next ancestor up; reads resolve that live.
   */
  async cascadeUnbind(sourceCategoryId: number, attributeId: number): Promise<CascadeReport> {
    return this.run('unbind', sourceCategoryId, attributeId, async (tx, descendantId) => {
      if (!(await this.isAttributeInheritedFromParent(descendantId, attributeId, sourceCategoryId, tx))) {
        return 'skipped';
      }
      const binding = await tx.categoryAttributes.findLive(descendantId, attributeId);
      if (!binding) {
        return 'skipped';
      }
      await tx.categoryAttributes.softDelete(binding.id);
      return 'applied';
    });
  }

  async cascadeUpdate(sourceCategoryId: number, attributeId: number, patch: BindingPatch): Promise<CascadeReport> {
    if (patch.is_required === undefined && patch.sort === undefined) {
      return emptyReport('update', sourceCategoryId, attributeId);
    }

    return this.run('update', sourceCategoryId, attributeId, async (tx, descendantId) => {
      if (!(await this.isAttributeInheritedFromParent(descendantId, attributeId, sourceCategoryId, tx))) {
        return 'skipped';
      }
      const binding = await tx.categoryAttributes.findLive(descendantId, attributeId);
      if (!binding) {
        return 'skipped';
      }
      await tx.categoryAttributes.update(binding.id, patch);
      return 'applied';
    });
  }

  /**
   * True when the descendant's live row for the attribute is a copy of the
   * source category's binding and nothing between them overrides it.
   */
  async isAttributeInheritedFromParent(
    categoryId: number,
    attributeId: number,
    sourceCategoryId: number,
    scope: Repositories = this.db
  ): Promise<boolean> {
    const binding = await scope.categoryAttributes.findLive(categoryId, attributeId);
    if (!binding || binding.inherited_from_category_id !== sourceCategoryId) {
      return false;
    }

    const path = await new CategoryTreeAccessor(scope.categories).getAncestorPath(categoryId);
    const sourceIndex = path.findIndex((category) => category.id === sourceCategoryId);
    // source must be a strict ancestor
    if (sourceIndex === -1 || sourceIndex === path.length - 1) {
      return false;
    }

    const between = path.slice(sourceIndex + 1, -1).map((category) => category.id);
    if (between.length === 0) {
      return true;
    }

    const competing = await scope.categoryAttributes.listLiveForCategories(between, attributeId);
    return !competing.some(isDirectBinding);
  }

  // The copy's owner sits above the source on the copy's path, with no direct binding between source and copy
  private async isShadowedCopy(
    tx: TransactionContext,
    copy: CategoryAttribute,
    sourceCategoryId: number
  ): Promise<boolean> {
    const ownerId = copy.inherited_from_category_id;
    if (ownerId === null) {
      return false;
    }

    const path = (await new CategoryTreeAccessor(tx.categories).getAncestorPath(copy.category_id)).map(
      (category) => category.id
    );
    const ownerIndex = path.indexOf(ownerId);
    const sourceIndex = path.indexOf(sourceCategoryId);
    if (ownerIndex === -1 || sourceIndex === -1 || ownerIndex >= sourceIndex) {
      return false;
    }

    const between = path.slice(sourceIndex + 1, -1);
    if (between.length === 0) {
      return true;
    }
    const competing = await tx.categoryAttributes.listLiveForCategories(between, copy.attribute_id);
    return !competing.some(isDirectBinding);
  }

  private async run(
    operation: CascadeOperation,
    sourceCategoryId: number,
    attributeId: number,
    step: CascadeStep
  ): Promise<CascadeReport> {
    const report = emptyReport(operation, sourceCategoryId, attributeId);

    try {
      await this.db.transaction(async (tx) => {
        const descendants = await new CategoryTreeAccessor(tx.categories).getAllDescendants(sourceCategoryId);
        report.total_descendants = descendants.length;

        for (const descendantId of descendants) {
          try {
            const outcome = await tx.savepoint(() => step(tx, descendantId));
            report[outcome] += 1;
          } catch (error) {
            this.recordFailure(report, descendantId, error);
          }
        }
      });
    } catch (error) {
      // rolled back as a whole
      report.applied = 0;
      report.skipped = 0;
      report.aborted = true;
      this.recordFailure(report, null, error);
    }

    if (report.applied > 0 || report.failed > 0) {
      this.log.info(`[Cascade] ${operation} of attribute ${attributeId} from category ${sourceCategoryId}`, {
        total: report.total_descendants,
        applied: report.applied,
        skipped: report.skipped,
        failed: report.failed,
        aborted: report.aborted,
      });
    }

    return report;
  }

  private recordFailure(report: CascadeReport, categoryId: number | null, error: unknown) {
    const warning = new CascadeWarning({
      operation: report.operation,
      sourceCategoryId: report.source_category_id,
      attributeId: report.attribute_id,
      categoryId,
      message: errorMessage(error),
    });

    if (categoryId !== null) {
      report.failed += 1;
    }
    report.warnings.push(warning);

    this.log.warn(`[Cascade] ${report.operation} step failed`, {
      operation: warning.operation,
      categoryId: warning.category_id,
      attributeId: warning.attribute_id,
      sourceCategoryId: warning.source_category_id,
      error: warning.message,
    });
  }
}
