import type { Database } from '../../connections/db/database';
import type { CategoryAttribute } from '../../connections/db/models/category-attribute.model';
import { NotFoundError } from '../../utils/errors';
import { type EngineLogger, auditLog, getModuleLogger } from '../../utils/logging';
import { CategoryTreeAccessor } from '../categories/category-tree.accessor';
import {
  type AttributeValueKind,
  type JsonValue,
  toAttributeValue,
  validateAttributeValue,
} from './attribute-value.validator';
import { CascadeEngine } from './cascade.engine';
import { CategoryAttributeStore } from './category-attribute.store';
import {
  type BatchBindResult,
  type BindAttributeInput,
  type BindResult,
  type BindingPatch,
  type CascadeReport,
  type ConsistencyReport,
  type InheritanceSummary,
  type RebuildAllResult,
  type RebuildResult,
  type ResolvedBinding,
  type UnbindResult,
  toResolvedBinding,
} from './category-attributes.types';
import { InheritanceResolver } from './inheritance.resolver';
import { InheritanceValidator } from './inheritance.validator';

export interface CategoryAttributeServiceOptions {
  logger?: EngineLogger;
}

export interface UpdateResult {
  binding: ResolvedBinding;
  cascade: CascadeReport;
}

export interface ValueCheckResult {
  attribute_id: number;
  kind: AttributeValueKind | null;
  valid: true;
}

/**
 * Category attribute operations: each direct write is followed by its cascade,
 * and reads resolve the effective set live.
 */
export class CategoryAttributeService {
  private readonly tree: CategoryTreeAccessor;
  private readonly store: CategoryAttributeStore;
  private readonly resolver: InheritanceResolver;
  private readonly cascade: CascadeEngine;
  private readonly validator: InheritanceValidator;

  constructor(
    private readonly db: Database,
    options: CategoryAttributeServiceOptions = {}
  ) {
    this.tree = new CategoryTreeAccessor(db.categories);
    this.store = new CategoryAttributeStore(db);
    this.resolver = new InheritanceResolver(db);
    this.cascade = new CascadeEngine(db, options.logger ?? getModuleLogger('cascade'));
    this.validator = new InheritanceValidator(db, this.resolver, options.logger ?? getModuleLogger('inheritance'));
  }

  async bindAttributeToCategory(
    categoryId: number,
    attributeId: number,
    isRequired: boolean,
    sort: number
  ): Promise<BindResult> {
    await this.ensureCategoryAndAttribute(categoryId, attributeId);

    const binding = await this.store.bind(categoryId, attributeId, isRequired, sort);
    auditLog('Attribute bound to category', { categoryId, attributeId, isRequired, sort });

    const cascade = await this.cascade.cascadeBind(categoryId, attributeId, binding.is_required, binding.sort);
    return { binding: toResolvedBinding(binding, categoryId, categoryId), cascade };
  }

  async unbindAttributeFromCategory(categoryId: number, attributeId: number): Promise<UnbindResult> {
    await this.ensureCategoryAndAttribute(categoryId, attributeId);

    const binding = await this.store.unbind(categoryId, attributeId);
    auditLog('Attribute unbound from category', { categoryId, attributeId });

    const cascade = await this.cascade.cascadeUnbind(categoryId, attributeId);
    return { binding, cascade };
  }

  async updateCategoryAttribute(categoryId: number, attributeId: number, patch: BindingPatch): Promise<UpdateResult> {
    await this.ensureCategoryAndAttribute(categoryId, attributeId);

    const binding = await this.store.updateBinding(categoryId, attributeId, patch);
    auditLog('Category attribute updated', { categoryId, attributeId, ...patch });

    const cascade = await this.cascade.cascadeUpdate(categoryId, attributeId, patch);
    return { binding: toResolvedBinding(binding, categoryId, categoryId), cascade };
  }

  /**
   * The batch itself is atomic; the cascades that follow run one per attribute
   * and report independently.
   */
  async batchBindAttributesToCategory(categoryId: number, items: BindAttributeInput[]): Promise<BatchBindResult> {
    await this.tree.getCategory(categoryId);

    const bindings = await this.store.batchBind(categoryId, items);
    auditLog('Attributes batch-bound to category', {
      categoryId,
      attributeIds: bindings.map((binding) => binding.attribute_id),
    });

    const cascades: CascadeReport[] = [];
    for (const binding of bindings) {
      cascades.push(
        await this.cascade.cascadeBind(categoryId, binding.attribute_id, binding.is_required, binding.sort)
      );
    }

    return {
      bindings: bindings.map((binding) => toResolvedBinding(binding, categoryId, categoryId)),
      cascades,
    };
  }

  async getCategoryAttributes(categoryId: number): Promise<CategoryAttribute[]> {
    await this.tree.getCategory(categoryId);
    return this.store.listDirectByCategory(categoryId);
  }

  async getCategoryAttributesWithInheritance(categoryId: number): Promise<ResolvedBinding[]> {
    return this.resolver.resolveEffectiveAttributes(categoryId);
  }

  async getAttributeInheritancePath(categoryId: number, attributeId: number): Promise<ResolvedBinding[]> {
    await this.ensureAttribute(attributeId);
    return this.resolver.resolveInheritancePath(categoryId, attributeId);
  }

  async getInheritanceSummary(categoryId: number): Promise<InheritanceSummary> {
    return this.resolver.summarize(categoryId);
  }

  async validateInheritanceConsistency(categoryId: number): Promise<ConsistencyReport> {
    return this.validator.validateInheritanceConsistency(categoryId);
  }

  async rebuildCategoryInheritance(categoryId: number): Promise<RebuildResult> {
    const result = await this.validator.rebuildInheritanceForCategory(categoryId);
    auditLog('Category inheritance rebuilt', { categoryId, inserted: result.inserted });
    return result;
  }

  async rebuildAllCategoryInheritance(): Promise<RebuildAllResult> {
    const result = await this.validator.rebuildAll();
    auditLog('All category inheritance rebuilt', { ...result });
    return result;
  }

  /**
   * Validates a raw value against an attribute definition; throws `ValidationError` when it does not fit.
   */
  async checkAttributeValue(attributeId: number, raw: JsonValue): Promise<ValueCheckResult> {
    const attribute = await this.db.attributes.getAttribute(attributeId);
    if (!attribute) {
      throw attributeNotFound(attributeId);
    }

    const value = raw === null ? null : toAttributeValue(attribute.type, raw);
    validateAttributeValue(attribute, value);

    return { attribute_id: attributeId, kind: value?.kind ?? null, valid: true };
  }

  private async ensureCategoryAndAttribute(categoryId: number, attributeId: number) {
    await this.tree.getCategory(categoryId);
    await this.ensureAttribute(attributeId);
  }

  private async ensureAttribute(attributeId: number) {
    if (!(await this.db.attributes.attributeExists(attributeId))) {
      throw attributeNotFound(attributeId);
    }
  }
}

const attributeNotFound = (attributeId: number) =>
  new NotFoundError(`Attribute ${attributeId} not found`, 'attribute', attributeId);
