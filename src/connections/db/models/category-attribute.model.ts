// CategoryAttribute Model - (category, attribute) binding rows

export interface CategoryAttribute {
  id: number;
  category_id: number;
  attribute_id: number;
  is_required: boolean; // per-category override of the attribute default
  sort: number;
  // NULL = direct binding; otherwise the ancestor whose binding this row copies
  inherited_from_category_id: number | null;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null; // Soft delete
}

export interface CreateCategoryAttributeInput {
  category_id: number;
  attribute_id: number;
  is_required: boolean;
  sort: number;
  inherited_from_category_id?: number | null; // default: NULL
}

export interface UpdateCategoryAttributeInput {
  is_required?: boolean;
  sort?: number;
  inherited_from_category_id?: number | null;
}

export const isDirectBinding = (binding: CategoryAttribute): boolean =>
  binding.inherited_from_category_id === null;
