/**
 * Central error handler: status codes and response bodies per error class
 */

import type { Server } from 'node:http';
import express from 'express';
import { z } from 'zod';
import { asyncHandler } from '../asyncHandler.js';
import { errorHandler } from '../errorHandler.js';
import { BusinessLogicError, DatabaseError, NotFoundError } from '../../utils/errors.js';

let server: Server;
let baseUrl: string;

beforeAll(async () => {
    const app = express();
    app.get('/not-found', asyncHandler(async () => {
        throw new NotFoundError('Order #7 not found', 'Order', 7);
    }));
    app.get('/rule', asyncHandler(async () => {
        throw new BusinessLogicError('Order #7 has no items left to return', 'returnable');
    }));
    app.get('/database', asyncHandler(async () => {
        throw new DatabaseError('relation "Order" does not exist');
    }));
    app.get('/zod', asyncHandler(async () => {
        z.object({ weight: z.number() }).parse({ weight: 'heavy' });
    }));
    app.get('/upstream', asyncHandler(async () => {
        throw new Error('upstream timed out');
    }));
    app.use(errorHandler);

    await new Promise<void>((resolve) => {
        server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
    });
});

async function hit(path: string) {
    const res = await fetch(`${baseUrl}${path}`);
    return { status: res.status, body: await res.json() };
}

describe('errorHandler', () => {
    it('maps NotFoundError to 404 with the resource', async () => {
        expect(await hit('/not-found')).toEqual({
            status: 404,
            body: { error: 'Order #7 not found', type: 'NotFoundError', resourceType: 'Order', resourceId: 7 },
        });
    });

    it('maps BusinessLogicError to 422 with the rule', async () => {
        expect(await hit('/rule')).toEqual({
            status: 422,
            body: { error: 'Order #7 has no items left to return', type: 'BusinessLogicError', rule: 'returnable' },
        });
    });

    it('hides the database message outside development', async () => {
        expect(await hit('/database')).toEqual({
            status: 500,
            body: { error: 'Database operation failed', type: 'DatabaseError' },
        });
    });

    it('maps ZodError to 400 with the issue paths', async () => {
        expect(await hit('/zod')).toEqual({
            status: 400,
            body: {
                error: 'Validation failed',
                type: 'ValidationError',
                details: [{ path: 'weight', message: 'Expected number, received string' }],
            },
        });
    });

    it('answers any other error with 500 and its message', async () => {
        expect(await hit('/upstream')).toEqual({
            status: 500,
            body: { error: 'upstream timed out', type: 'Error' },
        });
    });
});
