import { z } from 'zod';
import type { JsonValue } from './attribute-value.validator';

const id = (label: string) =>
  z.coerce.number().int(`${label} must be an integer`).positive(`${label} must be positive`);

export const categoryParamsSchema = z.object({
  categoryId: id('categoryId'),
});

export const categoryAttributeParamsSchema = z.object({
  categoryId: id('categoryId'),
  attributeId: id('attributeId'),
});

export const attributeParamsSchema = z.object({
  attributeId: id('attributeId'),
});

const sortSchema = z.number().int('sort must be an integer').min(0, 'sort cannot be negative');

// Schema for binding a single attribute
export const bindAttributeSchema = z.object({
  attribute_id: z.number().int().positive(),
  is_required: z.boolean().default(false),
  sort: sortSchema.default(0),
});

export const batchBindSchema = z.object({
  attributes: z.array(bindAttributeSchema).min(1, 'attributes must contain at least one item'),
});

export const updateCategoryAttributeSchema = z
  .object({
    is_required: z.boolean().optional(),
    sort: sortSchema.optional(),
  })
  .strict();

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const attributeValueSchema = z.object({
  value: jsonValueSchema,
});
