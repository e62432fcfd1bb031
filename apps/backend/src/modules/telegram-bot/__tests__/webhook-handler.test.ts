/// <reference types="vitest" />

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { Request } from 'express';
import { createWebhookHandler } from '../webhook-handler.js';
import type { CommandHandler } from '../command-handlers.js';
import type { TelegramClient } from '../telegram-client.js';
import { createMockRequest, createMockResponse } from '../../../tests/vitest/mocks/express.js';
import { createMockLogger, type MockLogger } from '../../../tests/vitest/mocks/logger.js';

const TELEGRAM_IP = '149.154.167.220';

function webhookRequest(overrides: Partial<Request> = {}): Request {
    return createMockRequest({
        headers: {
            'x-forwarded-for': TELEGRAM_IP,
            'x-telegram-bot-api-secret-token': 'test-secret'
        },
        ip: '127.0.0.1',
        body: {
            update_id: 7,
            message: { message_id: 10, from: { id: 42 }, chat: { id: 42, type: 'private' }, text: '/stats' }
        },
        ...overrides
    });
}

describe('createWebhookHandler', () => {
    let logger: MockLogger;
    let handleUpdate: Mock<CommandHandler['handleUpdate']>;
    let sendMessage: Mock<TelegramClient['sendMessage']>;
    let handler: ReturnType<typeof createWebhookHandler>;

    beforeEach(() => {
        const mockLogger = createMockLogger();
        logger = mockLogger;
        handleUpdate = vi.fn<CommandHandler['handleUpdate']>(async () => ({ chatId: '42', text: 'hi', parseMode: 'HTML' }));
        sendMessage = vi.fn<TelegramClient['sendMessage']>(async () => undefined);
        handler = createWebhookHandler({ handleUpdate }, { sendMessage }, mockLogger, { webhookSecret: 'test-secret' });
    });

    it('processes the update and sends the reply', async () => {
        const { res, status, json } = createMockResponse();

        await handler(webhookRequest(), res);

        expect(handleUpdate).toHaveBeenCalledWith(expect.objectContaining({ update_id: 7 }));
        expect(sendMessage).toHaveBeenCalledWith('42', 'hi', { parseMode: 'HTML' });
        expect(status).toHaveBeenCalledWith(200);
        expect(json).toHaveBeenCalledWith({ ok: true });
    });

    it('rejects requests from outside the allowlist', async () => {
        const { res, status, json } = createMockResponse();
        const req = webhookRequest({ headers: { 'x-forwarded-for': '10.0.0.1', 'x-telegram-bot-api-secret-token': 'test-secret' } });

        await handler(req, res);

        expect(status).toHaveBeenCalledWith(403);
        expect(json).toHaveBeenCalledWith({ ok: false, error: 'Forbidden' });
        expect(handleUpdate).not.toHaveBeenCalled();
        expect(logger.warn).toHaveBeenCalledWith(
            { clientIp: '10.0.0.1', secretTokenPresent: true, webhookSecretConfigured: true },
            'Rejected unauthorized Telegram webhook request'
        );
    });

    it('rejects a wrong secret', async () => {
        const { res, status } = createMockResponse();
        const req = webhookRequest({ headers: { 'x-forwarded-for': TELEGRAM_IP } });

        await handler(req, res);

        expect(status).toHaveBeenCalledWith(403);
        expect(handleUpdate).not.toHaveBeenCalled();
    });

    it('acknowledges malformed bodies without processing them', async () => {
        const { res, status, json } = createMockResponse();

        await handler(webhookRequest({ body: { update_id: 'seven' } }), res);

        expect(handleUpdate).not.toHaveBeenCalled();
        expect(status).toHaveBeenCalledWith(200);
        expect(json).toHaveBeenCalledWith({ ok: true });
    });

    it('sends nothing when the update needs no reply', async () => {
        handleUpdate.mockResolvedValue(null);
        const { res, status } = createMockResponse();

        await handler(webhookRequest(), res);

        expect(sendMessage).not.toHaveBeenCalled();
        expect(status).toHaveBeenCalledWith(200);
    });

    it('still acknowledges when the reply fails', async () => {
        sendMessage.mockRejectedValue(new Error('chat not found'));
        const { res, status, json } = createMockResponse();

        await handler(webhookRequest(), res);

        expect(logger.error).toHaveBeenCalledWith(
            { error: { message: 'chat not found' }, updateId: 7 },
            'Failed to process Telegram webhook'
        );
        expect(status).toHaveBeenCalledWith(200);
        expect(json).toHaveBeenCalledWith({ ok: true });
    });
});
