import { AddItemInput, CART_STATUSES, CartStatus } from '../models/types.js';
import { InvalidParameterError } from './errors.js';

function asObject(body: unknown): Record<string, unknown> {
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    throw new InvalidParameterError('Request body must be an object');
  }
  return Object.fromEntries(Object.entries(body));
}

/**
 * Validate article id is a positive integer
 */
export function validateArticleId(articleId: unknown): number {
  if (typeof articleId !== 'number' || !Number.isInteger(articleId) || articleId <= 0) {
    throw new InvalidParameterError('articleId must be a positive integer');
  }
  return articleId;
}

/**
 * Validate quantity is an integer between 1 and maxQuantity
 */
export function validateQuantity(quantity: unknown, maxQuantity: number): number {
  if (typeof quantity !== 'number' || !Number.isInteger(quantity) || quantity < 1) {
    throw new InvalidParameterError('quantity must be an integer >= 1');
  }
  if (quantity > maxQuantity) {
    throw new InvalidParameterError(`quantity must not exceed ${maxQuantity}`);
  }
  return quantity;
}

/**
 * Validate add item request
 */
export function validateAddItemRequest(body: unknown, maxQuantity: number): AddItemInput {
  const { articleId, articleName, quantity, price } = asObject(body);

  if (typeof articleName !== 'string' || articleName.trim().length === 0) {
    throw new InvalidParameterError('articleName must be a non-empty string');
  }

  if (typeof price !== 'number' || !Number.isFinite(price) || price < 0) {
    throw new InvalidParameterError('price must be a number >= 0');
  }

  return {
    articleId: validateArticleId(articleId),
    articleName: articleName.trim(),
    quantity: validateQuantity(quantity, maxQuantity),
    price,
  };
}

/**
 * Validate update quantity request
 */
export function validateUpdateItemRequest(
  body: unknown,
  maxQuantity: number
): { articleId: number; quantity: number } {
  const { articleId, quantity } = asObject(body);

  return {
    articleId: validateArticleId(articleId),
    quantity: validateQuantity(quantity, maxQuantity),
  };
}

/**
 * Validate an article id taken from the URL path
 */
export function validateArticleIdParam(param: string): number {
  if (!/^\d+$/.test(param)) {
    throw new InvalidParameterError('articleId must be a positive integer');
  }
  return validateArticleId(Number(param));
}

function isCartStatus(value: string): value is CartStatus {
  return CART_STATUSES.some((status) => status === value);
}

/**
 * Validate a cart status taken from the URL path, case-insensitively
 */
export function validateStatusParam(param: string): CartStatus {
  const status = param.trim().toUpperCase();
  if (!isCartStatus(status)) {
    throw new InvalidParameterError(
      `status must be one of ${CART_STATUSES.join(', ')}`
    );
  }
  return status;
}
