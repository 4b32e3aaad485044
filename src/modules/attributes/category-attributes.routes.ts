import express from 'express';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { WRITE_ROLES } from '../../types/request.types';
import type { CategoryAttributesController } from './category-attributes.controller';

/**
 * Mounted at /categories/:categoryId/attributes
 */
export const createCategoryAttributesRoutes = (controller: CategoryAttributesController) => {
  const router = express.Router({ mergeParams: true });

  // Reads are public
  router.get('/', controller.getCategoryAttributes);
  router.get('/inherited', controller.getInheritedAttributes);
  router.get('/summary', controller.getInheritanceSummary);
  router.get('/consistency', controller.validateConsistency);
  router.get('/:attributeId/inheritance-path', controller.getInheritancePath);

  // Writes (staff/admin only)
  router.post('/', authenticate, requireRole(...WRITE_ROLES), controller.bindAttribute);
  router.post('/batch', authenticate, requireRole(...WRITE_ROLES), controller.batchBindAttributes);
  router.post('/rebuild', authenticate, requireRole(...WRITE_ROLES), controller.rebuildInheritance);
  router.patch('/:attributeId', authenticate, requireRole(...WRITE_ROLES), controller.updateCategoryAttribute);
  router.delete('/:attributeId', authenticate, requireRole(...WRITE_ROLES), controller.unbindAttribute);

  return router;
};

/**
 * Mounted at /attributes
 */
export const createAttributeRoutes = (controller: CategoryAttributesController) => {
  const router = express.Router();

  router.post('/:attributeId/validate-value', controller.validateAttributeValue);

  return router;
};
