import type { CategoryAttribute } from '../../connections/db/models/category-attribute.model';

/**
 * One entry of a category's effective attribute set.
 */
export interface ResolvedBinding {
  binding_id: number;
  category_id: number; // the category the set was resolved for
  attribute_id: number;
  is_required: boolean;
  sort: number;
  is_inherited: boolean;
  inherited_from: number | null; // owning ancestor when inherited
  created_at: Date;
  updated_at: Date;
}

export interface BindAttributeInput {
  attribute_id: number;
  is_required: boolean;
  sort: number;
}

export interface BindingPatch {
  is_required?: boolean;
  sort?: number;
}

export type CascadeOperation = 'bind' | 'unbind' | 'update';

/**
 * A cascade step that failed. Recorded and logged, never thrown.
 */
export class CascadeWarning {
  readonly operation: CascadeOperation;
  readonly source_category_id: number;
  readonly attribute_id: number;
  // null when the walk itself failed before reaching a descendant
  readonly category_id: number | null;
  readonly message: string;

  constructor(fields: {
    operation: CascadeOperation;
    sourceCategoryId: number;
    attributeId: number;
    categoryId: number | null;
    message: string;
  }) {
    this.operation = fields.operation;
    this.source_category_id = fields.sourceCategoryId;
    this.attribute_id = fields.attributeId;
    this.category_id = fields.categoryId;
    this.message = fields.message;
  }
}

export interface CascadeReport {
  operation: CascadeOperation;
  source_category_id: number;
  attribute_id: number;
  total_descendants: number;
  applied: number;
  skipped: number;
  failed: number;
  warnings: CascadeWarning[];
  // true when the walk could not run or commit; nothing from it persisted
  aborted: boolean;
}

export interface BindResult {
  binding: ResolvedBinding;
  cascade: CascadeReport;
}

export interface UnbindResult {
  binding: CategoryAttribute;
  cascade: CascadeReport;
}

export interface BatchBindResult {
  bindings: ResolvedBinding[];
  cascades: CascadeReport[];
}

export interface ConsistencyReport {
  category_id: number;
  is_consistent: boolean;
  issues: string[];
}

export interface RebuildResult {
  category_id: number;
  inserted: number[]; // attribute ids that received a materialized row
}

export interface RebuildAllResult {
  categories: number;
  inserted: number;
  failed: number[];
}

export interface InheritanceSummary {
  category_id: number;
  total_attributes: number;
  own_attributes: number;
  inherited_attributes: number;
}

export const toResolvedBinding = (
  binding: CategoryAttribute,
  ownerCategoryId: number,
  targetCategoryId: number
): ResolvedBinding => {
  const isInherited = ownerCategoryId !== targetCategoryId;
  return {
    binding_id: binding.id,
    category_id: targetCategoryId,
    attribute_id: binding.attribute_id,
    is_required: binding.is_required,
    sort: binding.sort,
    is_inherited: isInherited,
    inherited_from: isInherited ? ownerCategoryId : null,
    created_at: binding.created_at,
    updated_at: binding.updated_at,
  };
};
