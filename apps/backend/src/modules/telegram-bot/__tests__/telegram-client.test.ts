/// <reference types="vitest" />

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import { TelegramClient, describeTelegramError } from '../telegram-client.js';
import { createMockLogger, type MockLogger } from '../../../tests/vitest/mocks/logger.js';

const SEND_URL = 'https://api.telegram.org/bottest-token/sendMessage';

function httpError(status: number): AxiosError {
    const config = { headers: new AxiosHeaders() };
    const code = status >= 500 ? 'ERR_BAD_RESPONSE' : 'ERR_BAD_REQUEST';
    return new AxiosError(`Request failed with status code ${status}`, code, config, undefined, {
        data: { ok: false },
        status,
        statusText: 'Error',
        headers: {},
        config
    });
}

describe('TelegramClient', () => {
    let post: ReturnType<typeof vi.fn>;
    let logger: MockLogger;
    let client: TelegramClient;

    beforeEach(() => {
        vi.useFakeTimers();
        post = vi.fn();
        post.mockResolvedValue({ data: { ok: true } });
        const mockLogger = createMockLogger();
        logger = mockLogger;
        client = new TelegramClient({ post }, 'test-token', mockLogger);
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('sends HTML without link previews by default', async () => {
        await client.sendMessage('42', '<b>hi</b>');

        expect(post).toHaveBeenCalledWith(SEND_URL, {
            chat_id: '42',
            text: '<b>hi</b>',
            disable_web_page_preview: true,
            parse_mode: 'HTML'
        });
    });

    it('omits the parse mode for plain text', async () => {
        await client.sendMessage('42', 'hi', { parseMode: null, disablePreview: false });

        expect(post).toHaveBeenCalledWith(SEND_URL, { chat_id: '42', text: 'hi', disable_web_page_preview: false });
    });

    it('skips sending without a token', async () => {
        const unconfigured = new TelegramClient({ post }, undefined, logger);

        await unconfigured.sendMessage('42', 'hi');

        expect(unconfigured.configured).toBe(false);
        expect(post).not.toHaveBeenCalled();
        expect(logger.warn).toHaveBeenCalledWith({ chatId: '42' }, 'Telegram token not configured; skipping send');
    });

    it('retries server errors', async () => {
        post.mockRejectedValueOnce(httpError(502)).mockResolvedValueOnce({ data: { ok: true } });

        const sending = client.sendMessage('42', 'hi');
        await vi.runAllTimersAsync();
        await sending;

        expect(post).toHaveBeenCalledTimes(2);
        expect(logger.warn).toHaveBeenCalledWith(
            {
                attempt: 1,
                chatId: '42',
                error: { status: 502, code: 'ERR_BAD_RESPONSE', message: 'Request failed with status code 502' }
            },
            'Retrying Telegram sendMessage'
        );
    });

    it('gives up after three retries', async () => {
        const failure = httpError(500);
        post.mockRejectedValue(failure);

        const assertion = expect(client.sendMessage('42', 'hi')).rejects.toBe(failure);
        await vi.runAllTimersAsync();
        await assertion;

        expect(post).toHaveBeenCalledTimes(4);
    });

    it('does not retry client errors', async () => {
        const failure = httpError(400);
        post.mockRejectedValue(failure);

        await expect(client.sendMessage('42', 'hi')).rejects.toBe(failure);
        expect(post).toHaveBeenCalledTimes(1);
    });
});

describe('describeTelegramError', () => {
    it('keeps the status and drops the request config', () => {
        expect(describeTelegramError(httpError(403))).toEqual({
            status: 403,
            code: 'ERR_BAD_REQUEST',
            message: 'Request failed with status code 403'
        });
    });

    it('describes other values by message', () => {
        expect(describeTelegramError(new Error('boom'))).toEqual({ message: 'boom' });
        expect(describeTelegramError('boom')).toEqual({ message: 'boom' });
    });
});
