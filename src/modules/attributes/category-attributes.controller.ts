import { NextFunction, Request, Response } from 'express';
import { ResponseHandler } from '../../utils/response';
import type { CategoryAttributeService } from './category-attributes.service';
import {
  attributeParamsSchema,
  attributeValueSchema,
  batchBindSchema,
  bindAttributeSchema,
  categoryAttributeParamsSchema,
  categoryParamsSchema,
  updateCategoryAttributeSchema,
} from './category-attributes.validation';

type Handler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

// Errors go to the error middleware, which maps them onto the envelope
const handle =
  (work: (req: Request, res: Response) => Promise<unknown>): Handler =>
  async (req, res, next) => {
    try {
      await work(req, res);
    } catch (error) {
      next(error);
    }
  };

export const createCategoryAttributesController = (service: CategoryAttributeService) => ({
  // Direct bindings of the category only
  getCategoryAttributes: handle(async (req, res) => {
    const { categoryId } = categoryParamsSchema.parse(req.params);
    const bindings = await service.getCategoryAttributes(categoryId);
    return ResponseHandler.success(res, bindings);
  }),

  // Effective set, closest ancestor wins
  getInheritedAttributes: handle(async (req, res) => {
    const { categoryId } = categoryParamsSchema.parse(req.params);
    const attributes = await service.getCategoryAttributesWithInheritance(categoryId);
    return ResponseHandler.success(res, attributes);
  }),

  getInheritanceSummary: handle(async (req, res) => {
    const { categoryId } = categoryParamsSchema.parse(req.params);
    const summary = await service.getInheritanceSummary(categoryId);
    return ResponseHandler.success(res, summary);
  }),

  getInheritancePath: handle(async (req, res) => {
    const { categoryId, attributeId } = categoryAttributeParamsSchema.parse(req.params);
    const path = await service.getAttributeInheritancePath(categoryId, attributeId);
    return ResponseHandler.success(res, path);
  }),

  validateConsistency: handle(async (req, res) => {
    const { categoryId } = categoryParamsSchema.parse(req.params);
    const report = await service.validateInheritanceConsistency(categoryId);
    return ResponseHandler.success(res, report);
  }),

  bindAttribute: handle(async (req, res) => {
    const { categoryId } = categoryParamsSchema.parse(req.params);
    const body = bindAttributeSchema.parse(req.body);

    const result = await service.bindAttributeToCategory(categoryId, body.attribute_id, body.is_required, body.sort);
    return ResponseHandler.created(res, result.binding, 'Attribute bound to category', { cascade: result.cascade });
  }),

  batchBindAttributes: handle(async (req, res) => {
    const { categoryId } = categoryParamsSchema.parse(req.params);
    const body = batchBindSchema.parse(req.body);

    const result = await service.batchBindAttributesToCategory(categoryId, body.attributes);
    return ResponseHandler.created(res, result.bindings, `${result.bindings.length} attributes bound to category`, {
      cascades: result.cascades,
    });
  }),

  updateCategoryAttribute: handle(async (req, res) => {
    const { categoryId, attributeId } = categoryAttributeParamsSchema.parse(req.params);
    const patch = updateCategoryAttributeSchema.parse(req.body);

    const result = await service.updateCategoryAttribute(categoryId, attributeId, patch);
    return ResponseHandler.success(res, result.binding, 'Category attribute updated', {
      cascade: result.cascade,
    });
  }),

  unbindAttribute: handle(async (req, res) => {
    const { categoryId, attributeId } = categoryAttributeParamsSchema.parse(req.params);

    const result = await service.unbindAttributeFromCategory(categoryId, attributeId);
    return ResponseHandler.success(res, result.binding, 'Attribute unbound from category', {
      cascade: result.cascade,
    });
  }),

  rebuildInheritance: handle(async (req, res) => {
    const { categoryId } = categoryParamsSchema.parse(req.params);
    const result = await service.rebuildCategoryInheritance(categoryId);
    return ResponseHandler.success(res, result, `Rebuilt ${result.inserted.length} inherited bindings`);
  }),

  rebuildAllInheritance: handle(async (_req, res) => {
    const result = await service.rebuildAllCategoryInheritance();
    return ResponseHandler.success(res, result, 'Inheritance rebuilt for all categories');
  }),

  validateAttributeValue: handle(async (req, res) => {
    const { attributeId } = attributeParamsSchema.parse(req.params);
    const { value } = attributeValueSchema.parse(req.body);

    const result = await service.checkAttributeValue(attributeId, value);
    return ResponseHandler.success(res, result, 'Value is valid');
  }),
});

export type CategoryAttributesController = ReturnType<typeof createCategoryAttributesController>;
