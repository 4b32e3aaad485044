/**
 * Error classes for the category attribute engine.
 * Each carries the HTTP status and stable code the error middleware reports.
 */

export interface AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;
}

/**
 * A category, attribute or binding does not exist.
 *
 * @example
 * throw new NotFoundError('Category 12 not found', 'category', 12);
 */
export class NotFoundError extends Error implements AppError {
  readonly name = 'NotFoundError' as const;
  readonly statusCode = 404 as const;
  readonly code = 'NOT_FOUND' as const;
  readonly resourceType: string | null;
  readonly resourceId: number | null;

  constructor(
    message: string = 'Resource not found',
    resourceType: string | null = null,
    resourceId: number | null = null
  ) {
    super(message);
    this.resourceType = resourceType;
    this.resourceId = resourceId;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }

  get details() {
    return this.resourceType ? { resource: this.resourceType, id: this.resourceId } : undefined;
  }
}

/**
 * A live direct binding already exists for the (category, attribute) pair.
 */
export class DuplicateBindingError extends Error implements AppError {
  readonly name = 'DuplicateBindingError' as const;
  readonly statusCode = 409 as const;
  readonly code = 'DUPLICATE_BINDING' as const;
  readonly categoryId: number;
  readonly attributeId: number | null;

  constructor(categoryId: number, attributeId: number | null, message?: string) {
    super(
      message ??
        (attributeId === null
          ? `An attribute is already bound to category ${categoryId}`
          : `Attribute ${attributeId} is already bound to category ${categoryId}`)
    );
    this.categoryId = categoryId;
    this.attributeId = attributeId;
    Object.setPrototypeOf(this, DuplicateBindingError.prototype);
  }

  get details() {
    return { category_id: this.categoryId, attribute_id: this.attributeId };
  }
}

/**
 * Input failed validation: malformed batch, bad attribute value, bad request body.
 *
 * @example
 * throw new ValidationError('Batch must contain at least one attribute');
 */
export class ValidationError extends Error implements AppError {
  readonly name = 'ValidationError' as const;
  readonly statusCode = 400 as const;
  readonly code = 'VALIDATION_ERROR' as const;
  readonly details: unknown;

  constructor(message: string, details: unknown = null) {
    super(message);
    this.details = details;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * The parent-pointer chain loops back on itself.
 */
export class CategoryCycleError extends Error implements AppError {
  readonly name = 'CategoryCycleError' as const;
  readonly statusCode = 409 as const;
  readonly code = 'CATEGORY_CYCLE' as const;
  readonly categoryId: number;

  constructor(categoryId: number) {
    super(`Category ${categoryId} is part of a parent cycle`);
    this.categoryId = categoryId;
    Object.setPrototypeOf(this, CategoryCycleError.prototype);
  }

  get details() {
    return { category_id: this.categoryId };
  }
}

/**
 * The tree is deeper than the configured traversal limit.
 */
export class CategoryDepthError extends Error implements AppError {
  readonly name = 'CategoryDepthError' as const;
  readonly statusCode = 409 as const;
  readonly code = 'CATEGORY_TOO_DEEP' as const;
  readonly categoryId: number;
  readonly maxDepth: number;

  constructor(categoryId: number, maxDepth: number) {
    super(`Category ${categoryId} is more than ${maxDepth} levels from the category being walked`);
    this.categoryId = categoryId;
    this.maxDepth = maxDepth;
    Object.setPrototypeOf(this, CategoryDepthError.prototype);
  }

  get details() {
    return { category_id: this.categoryId, max_depth: this.maxDepth };
  }
}

export function isAppError(error: unknown): error is AppError {
  return (
    error instanceof NotFoundError ||
    error instanceof DuplicateBindingError ||
    error instanceof ValidationError ||
    error instanceof CategoryCycleError ||
    error instanceof CategoryDepthError
  );
}

/**
 * PostgreSQL reports constraint violations through a SQLSTATE `code` on the error.
 */
export function getPgErrorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';
