/**
 * Custom error classes
 * Each carries the HTTP status the error handler responds with. The chat tool
 * executor reports their messages to the model unchanged.
 */

/**
 * Base interface for custom errors with HTTP status codes
 */
export interface CustomError extends Error {
    readonly statusCode: number;
}

/**
 * Validation error - thrown when input validation fails
 *
 * @example
 * throw new ValidationError('Weight must be positive', { weightLbs: -1 });
 */
export class ValidationError extends Error implements CustomError {
    readonly name = 'ValidationError' as const;
    readonly statusCode = 400 as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/**
 * Not found error - thrown when a row does not exist
 *
 * @example
 * throw new NotFoundError('Order #42 not found', 'Order', 42);
 */
export class NotFoundError extends Error implements CustomError {
    readonly name = 'NotFoundError' as const;
    readonly statusCode = 404 as const;
    readonly resourceType: string | null;
    readonly resourceId: string | number | null;

    constructor(
        message: string = 'Resource not found',
        resourceType: string | null = null,
        resourceId: string | number | null = null
    ) {
        super(message);
        this.resourceType = resourceType;
        this.resourceId = resourceId;
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}

/**
 * Business logic error - thrown when a store rule is violated
 * (insufficient stock, nothing left to return, ...)
 */
export class BusinessLogicError extends Error implements CustomError {
    readonly name = 'BusinessLogicError' as const;
    readonly statusCode = 422 as const;
    readonly rule: string | null;

    constructor(message: string, rule: string | null = null) {
        super(message);
        this.rule = rule;
        Object.setPrototypeOf(this, BusinessLogicError.prototype);
    }
}

/**
 * Database error - thrown when a query or transaction fails
 */
export class DatabaseError extends Error implements CustomError {
    readonly name = 'DatabaseError' as const;
    readonly statusCode = 500 as const;
    readonly originalError: Error | null;

    constructor(message: string, originalError: Error | null = null) {
        super(message);
        this.originalError = originalError;
        Object.setPrototypeOf(this, DatabaseError.prototype);
    }
}

/**
 * Type guard to check if an error is a custom error with statusCode
 */
export function isCustomError(error: unknown): error is CustomError {
    return (
        error instanceof Error &&
        'statusCode' in error &&
        typeof error.statusCode === 'number'
    );
}

/** Message of any thrown value */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
