/**
 * Async Handler & Typed Route Middleware
 *
 * asyncHandler - wraps async route handlers to catch errors automatically
 * typedRoute  - combines Zod body validation + asyncHandler for type-safe routes
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { z } from 'zod';

// ============================================
// Core types
// ============================================

type AsyncRequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction
) => Promise<void | Response>;

type TypedHandler<TBody> = (
    body: TBody,
    req: Request,
    res: Response,
) => Promise<void | Response>;

// ============================================
// asyncHandler - for unvalidated routes
// ============================================

export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}

// ============================================
// typedRoute - Zod body validation + asyncHandler
// ============================================

/**
 * Validates the request body before the handler runs.
 * A failed parse answers 400 with the first issue as the error message.
 *
 * @example
 * router.patch('/:id/status', typedRoute(updateOrderStatusSchema, async (body, req, res) => {
 *     const { status } = body; // fully typed
 *     res.json({ success: true });
 * }));
 */
export function typedRoute<T extends z.ZodTypeAny>(
    schema: T,
    handler: TypedHandler<z.infer<T>>,
): RequestHandler {
    return asyncHandler(async (req, res) => {
        const result = schema.safeParse(req.body);
        if (!result.success) {
            res.status(400).json({
                error: result.error.issues[0]?.message || 'Validation failed',
                details: result.error.issues.map((issue: z.ZodIssue) => ({
                    path: issue.path.join('.'),
                    message: issue.message,
                })),
            });
            return;
        }
        await handler(result.data, req, res);
    });
}
