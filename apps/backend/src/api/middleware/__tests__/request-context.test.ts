/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { requestContext } from '../request-context.js';
import { createMockNext, createMockRequest, createMockResponse } from '../../../tests/vitest/mocks/express.js';

describe('requestContext', () => {
    it('reuses an incoming request id', () => {
        const req = createMockRequest({ headers: { 'x-request-id': 'abc-123' } });
        const { res, setHeader } = createMockResponse();
        const next = createMockNext();

        requestContext(req, res, next);

        expect(req.id).toBe('abc-123');
        expect(setHeader).toHaveBeenCalledWith('x-request-id', 'abc-123');
        expect(next).toHaveBeenCalledTimes(1);
    });

    it('generates one otherwise', () => {
        const req = createMockRequest();
        const { res } = createMockResponse();

        requestContext(req, res, createMockNext());

        expect(req.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });
});
