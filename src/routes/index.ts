import express from 'express';
import { authenticate, requireRole } from '../middlewares/auth.middleware';
import { createCategoryAttributesController } from '../modules/attributes/category-attributes.controller';
import {
  createAttributeRoutes,
  createCategoryAttributesRoutes,
} from '../modules/attributes/category-attributes.routes';
import type { CategoryAttributeService } from '../modules/attributes/category-attributes.service';

export const createRoutes = (service: CategoryAttributeService) => {
  const router = express.Router();
  const categoryAttributes = createCategoryAttributesController(service);

  // API Routes
  router.use('/categories/:categoryId/attributes', createCategoryAttributesRoutes(categoryAttributes));
  router.use('/attributes', createAttributeRoutes(categoryAttributes));

  // Maintenance (admin only)
  router.post(
    '/maintenance/attributes/rebuild',
    authenticate,
    requireRole('admin'),
    categoryAttributes.rebuildAllInheritance
  );

  return router;
};
