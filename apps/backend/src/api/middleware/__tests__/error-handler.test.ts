/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { errorHandler } from '../error-handler.js';
import { NotFoundError, RateLimitError, StorageError, UpstreamUnavailableError } from '../../../lib/errors.js';
import { createMockNext, createMockRequest, createMockResponse } from '../../../tests/vitest/mocks/express.js';

function handle(error: unknown) {
    const response = createMockResponse();
    errorHandler(error, createMockRequest({ id: 'req-1' }), response.res, createMockNext());
    return response;
}

describe('errorHandler', () => {
    it('maps taxonomy errors to their status', () => {
        const notFound = handle(new NotFoundError('Job stats:poll not registered'));
        const limited = handle(new RateLimitError('Slow down', { retryAfterSeconds: 5 }));
        const storage = handle(new StorageError());
        const upstream = handle(new UpstreamUnavailableError('YouTube videos request failed'));

        expect(notFound.status).toHaveBeenCalledWith(404);
        expect(notFound.json).toHaveBeenCalledWith({
            success: false,
            error: 'Job stats:poll not registered',
            code: 'NOT_FOUND',
            details: undefined
        });
        expect(limited.status).toHaveBeenCalledWith(429);
        expect(limited.json).toHaveBeenCalledWith({
            success: false,
            error: 'Slow down',
            code: 'RATE_LIMIT',
            details: { retryAfterSeconds: 5 }
        });
        expect(storage.status).toHaveBeenCalledWith(503);
        expect(upstream.status).toHaveBeenCalledWith(503);
        expect(upstream.json).toHaveBeenCalledWith(expect.objectContaining({ code: 'UPSTREAM_UNAVAILABLE' }));
    });

    it('answers 400 for request validation failures', () => {
        const result = z.object({ days: z.number() }).safeParse({ days: 'seven' });
        if (result.success) {
            throw new Error('expected a validation failure');
        }

        const { status, json } = handle(result.error);

        expect(status).toHaveBeenCalledWith(400);
        expect(json).toHaveBeenCalledWith(
            expect.objectContaining({ success: false, code: 'VALIDATION_ERROR', error: 'Invalid request parameters' })
        );
    });

    it('hides unexpected errors', () => {
        const { status, json } = handle(new Error('connection reset by peer'));

        expect(status).toHaveBeenCalledWith(500);
        expect(json).toHaveBeenCalledWith({
            success: false,
            error: 'Internal server error',
            code: 'INTERNAL_ERROR',
            details: undefined
        });
    });
});
