// Shared error types for services, API routes and client pages.

export class AppError extends Error {
  constructor(message: string, public code: string = 'UNKNOWN_ERROR', public status: number = 500) {
    super(message);
    this.name = 'AppError';
  }
}

export interface FieldError {
  field: string;
  message: string;
}

export class ValidationError extends AppError {
  constructor(public fieldErrors: FieldError[], message?: string) {
    super(message ?? fieldErrors.map((e) => `${e.field}: ${e.message}`).join('; '), 'VALIDATION', 400);
    this.name = 'ValidationError';
  }

  static single(field: string, message: string) {
    return new ValidationError([{ field, message }]);
  }
}

export class NotFoundError extends AppError {
  constructor(public entity: string, public entityId?: number | string) {
    super(`${entity} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class BusinessRuleError extends AppError {
  constructor(message: string, code: string) {
    super(message, code, 409);
    this.name = 'BusinessRuleError';
  }
}

export interface StockShortage {
  productId: number;
  productName: string;
  requested: number;
  available: number;
}

export class InsufficientStockError extends BusinessRuleError {
  constructor(public shortages: StockShortage[]) {
    super(
      shortages
        .map((s) => `Only ${s.available} ${s.productName} available (requested ${s.requested}).`)
        .join(' '),
      'INSUFFICIENT_STOCK'
    );
    this.name = 'InsufficientStockError';
  }
}

export class InvalidTransitionError extends BusinessRuleError {
  constructor(public from: string, public to: string) {
    super(`Order cannot move from ${from} to ${to}.`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

export class StockConflictError extends BusinessRuleError {
  constructor(public productId: number) {
    super('Stock was changed by another request. Reload and try again.', 'STOCK_CONFLICT');
    this.name = 'StockConflictError';
  }
}

export class ProtectedRecordError extends BusinessRuleError {
  constructor(message: string) {
    super(message, 'PROTECTED_RECORD');
    this.name = 'ProtectedRecordError';
  }
}

export class DuplicateRecordError extends ValidationError {
  constructor(field: string, message: string) {
    super([{ field, message }], message);
    this.code = 'DUPLICATE';
    this.name = 'DuplicateRecordError';
  }
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return 'An unexpected error occurred';
}

export function fieldErrorsOf(error: unknown): FieldError[] {
  return error instanceof ValidationError ? error.fieldErrors : [];
}
