import type { Request, Response } from 'express';
import type { ILogger } from '@tubepulse/types';
import type { CommandHandler } from './command-handlers.js';
import type { ITelegramUpdate } from './ITelegramUpdate.js';
import { extractClientIp, validateTelegramWebhook, type WebhookSecurityOptions } from './security.js';
import { describeTelegramError, type TelegramClient } from './telegram-client.js';

/**
 * Creates the Express handler for Telegram webhook updates.
 *
 * Requests failing the IP allowlist or secret check get 403. Every accepted
 * update is acknowledged with 200, including ones whose processing or reply
 * failed, so Telegram does not redeliver them.
 *
 * @param commandHandler - Routes updates to commands
 * @param telegram - Client used to send the reply
 * @param logger - Scoped logger
 * @param securityOptions - IP allowlist and webhook secret
 */
export function createWebhookHandler(
    commandHandler: Pick<CommandHandler, 'handleUpdate'>,
    telegram: Pick<TelegramClient, 'sendMessage'>,
    logger: ILogger,
    securityOptions: WebhookSecurityOptions
) {
    return async (req: Request, res: Response): Promise<void> => {
        if (!validateTelegramWebhook(req, securityOptions)) {
            logger.warn(
                {
                    clientIp: extractClientIp(req) ?? 'unknown',
                    secretTokenPresent: Boolean(req.headers['x-telegram-bot-api-secret-token']),
                    webhookSecretConfigured: Boolean(securityOptions.webhookSecret)
                },
                'Rejected unauthorized Telegram webhook request'
            );
            res.status(403).json({ ok: false, error: 'Forbidden' });
            return;
        }

        const update = parseUpdate(req.body);
        if (!update) {
            logger.debug('Ignoring malformed Telegram update');
            res.status(200).json({ ok: true });
            return;
        }

        logger.debug({ updateId: update.update_id, hasMessage: Boolean(update.message) }, 'Received Telegram webhook');

        try {
            const response = await commandHandler.handleUpdate(update);
            if (response) {
                await telegram.sendMessage(response.chatId, response.text, { parseMode: response.parseMode });
                logger.info({ chatId: response.chatId, command: update.message?.text?.split(' ')[0] }, 'Sent Telegram response');
            }
        } catch (error) {
            logger.error({ error: describeTelegramError(error), updateId: update.update_id }, 'Failed to process Telegram webhook');
        }

        res.status(200).json({ ok: true });
    };
}

/**
 * Narrow a request body to an update with a numeric id. Field-level checks
 * happen where the fields are read.
 */
function parseUpdate(body: unknown): ITelegramUpdate | null {
    if (typeof body !== 'object' || body === null || !('update_id' in body) || typeof body.update_id !== 'number') {
        return null;
    }
    return body as ITelegramUpdate;
}
