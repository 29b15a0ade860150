/**
 * Custom error classes for the cart service
 */

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500;

export class CartError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: ErrorStatus,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CartError';
  }
}

export class InvalidParameterError extends CartError {
  constructor(message = 'Invalid parameter') {
    super(message, 'INVALID_PARAMETER', 400);
    this.name = 'InvalidParameterError';
  }
}

export class InvalidOperationError extends CartError {
  constructor(message = 'Operation not allowed on this cart') {
    super(message, 'INVALID_OPERATION', 400);
    this.name = 'InvalidOperationError';
  }
}

export class LimitExceededError extends CartError {
  constructor(message = 'Cart item limit reached') {
    super(message, 'LIMIT_EXCEEDED', 422);
    this.name = 'LimitExceededError';
  }
}

export class CartNotFoundError extends CartError {
  constructor(message = 'Cart not found') {
    super(message, 'CART_NOT_FOUND', 404);
    this.name = 'CartNotFoundError';
  }
}

export class ItemNotFoundError extends CartError {
  constructor(message = 'Item not found in cart') {
    super(message, 'ITEM_NOT_FOUND', 404);
    this.name = 'ItemNotFoundError';
  }
}

export class DuplicateArticleError extends CartError {
  constructor(message = 'Article already exists in cart') {
    super(message, 'DUPLICATE_ARTICLE', 409);
    this.name = 'DuplicateArticleError';
  }
}

/**
 * Raised by a store when a compare-and-swap write finds a newer version
 */
export class VersionConflictError extends CartError {
  constructor(message = 'Cart version changed since it was read') {
    super(message, 'VERSION_CONFLICT', 409);
    this.name = 'VersionConflictError';
  }
}

export class ConcurrencyConflictError extends CartError {
  constructor(message = 'Cart was modified concurrently') {
    super(message, 'CONCURRENCY_CONFLICT', 409);
    this.name = 'ConcurrencyConflictError';
  }
}

export class StorageError extends CartError {
  constructor(message = 'Cart storage failure', cause?: unknown) {
    super(message, 'STORAGE_ERROR', 500, { cause });
    this.name = 'StorageError';
  }
}

export class TokenError extends CartError {
  constructor(message = 'Invalid or expired token') {
    super(message, 'INVALID_CREDENTIAL', 401);
    this.name = 'TokenError';
  }
}

export class ForbiddenError extends CartError {
  constructor(message = 'Insufficient permissions') {
    super(message, 'FORBIDDEN', 403);
    this.name = 'ForbiddenError';
  }
}

/**
 * Error envelope for API responses
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
  };
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof CartError) {
    return {
      error: {
        code: error.code,
        message: error.message,
      },
    };
  }

  return {
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  };
}

export function toErrorStatus(error: unknown): ErrorStatus {
  return error instanceof CartError ? error.statusCode : 500;
}
