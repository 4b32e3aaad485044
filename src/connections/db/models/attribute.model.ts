// Attribute Model - attribute definitions are owned by the attribute catalog

export const ATTRIBUTE_TYPES = [
  'text',
  'number',
  'select',
  'multi_select',
  'boolean',
  'date',
  'datetime',
  'url',
  'email',
  'color',
  'currency',
] as const;

export type AttributeType = (typeof ATTRIBUTE_TYPES)[number];

export interface AttributeOption {
  value: string;
  label: string;
  color?: string;
  description?: string;
}

export interface AttributeValidationRule {
  min_length?: number;
  max_length?: number;
  min?: number;
  max?: number;
  pattern?: string;
  required?: boolean;
}

export interface Attribute {
  id: number;
  name: string;
  display_name: string;
  description: string | null;
  type: AttributeType;
  unit: string | null; // kg, cm, ...
  is_required: boolean; // default for new bindings
  default_value: string | null;
  options: AttributeOption[]; // JSONB, select / multi_select only
  validation: AttributeValidationRule; // JSONB
  sort: number;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
}
