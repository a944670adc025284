/**
 * Centralized Error Handler Middleware
 * Handles all errors thrown in async routes and provides consistent error responses
 *
 * Must be added AFTER all routes in Express app:
 * app.use(errorHandler);
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import {
    ValidationError,
    NotFoundError,
    BusinessLogicError,
    DatabaseError,
    isCustomError,
} from '../utils/errors.js';
import { routeLogger } from '../utils/logger.js';

const isDev = process.env.NODE_ENV === 'development';

/**
 * Global error handling middleware
 * Catches all errors and formats consistent responses
 */
export const errorHandler: ErrorRequestHandler = (
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const error = err instanceof Error ? err : new Error(String(err));

    routeLogger.error({
        method: req.method,
        path: req.path,
        type: error.name,
        err: error,
    }, error.message);

    if (error instanceof ValidationError) {
        res.status(400).json({
            error: error.message,
            type: 'ValidationError',
            details: error.details
        });
        return;
    }

    if (error instanceof NotFoundError) {
        res.status(404).json({
            error: error.message,
            type: 'NotFoundError',
            resourceType: error.resourceType,
            resourceId: error.resourceId
        });
        return;
    }

    if (error instanceof BusinessLogicError) {
        res.status(422).json({
            error: error.message,
            type: 'BusinessLogicError',
            rule: error.rule
        });
        return;
    }

    if (error instanceof DatabaseError) {
        res.status(500).json({
            error: 'Database operation failed',
            type: 'DatabaseError',
            // Don't expose internal DB errors outside development
            ...(isDev && { details: error.message })
        });
        return;
    }

    if (error instanceof ZodError) {
        res.status(400).json({
            error: 'Validation failed',
            type: 'ValidationError',
            details: error.issues.map(issue => ({
                path: issue.path.join('.'),
                message: issue.message
            }))
        });
        return;
    }

    // Default 500 error
    const statusCode = isCustomError(error) ? error.statusCode : 500;
    res.status(statusCode).json({
        error: error.message || 'Internal server error',
        type: error.name || 'Error',
        ...(isDev && { stack: error.stack })
    });
};
