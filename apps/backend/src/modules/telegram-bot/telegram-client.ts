import axios, { type AxiosInstance } from 'axios';
import type { ILogger } from '@tubepulse/types';
import { retry } from '../../lib/retry.js';

/**
 * Message sending options.
 */
export interface ITelegramSendOptions {
    /** Defaults to HTML; null sends plain text. */
    parseMode?: 'MarkdownV2' | 'HTML' | null;
    disablePreview?: boolean;
}

const TELEGRAM_API_BASE = 'https://api.telegram.org';

/**
 * Thin Telegram Bot API client for outgoing messages.
 *
 * Sends are retried with backoff on network errors, 5xx and 429 responses.
 * Other 4xx responses (blocked bot, bad chat id) fail at once.
 */
export class TelegramClient {
    private readonly maxRetries = 3;
    private readonly retryDelayMs = 500;

    /**
     * @param http - Axios instance used for Bot API calls
     * @param token - Bot token; when empty, sends are skipped with a warning
     * @param logger - Scoped logger
     */
    constructor(
        private readonly http: Pick<AxiosInstance, 'post'>,
        private readonly token: string | undefined,
        private readonly logger: ILogger
    ) {}

    get configured(): boolean {
        return Boolean(this.token);
    }

    async sendMessage(chatId: string, text: string, options: ITelegramSendOptions = {}): Promise<void> {
        if (!this.token) {
            this.logger.warn({ chatId }, 'Telegram token not configured; skipping send');
            return;
        }

        const { parseMode, disablePreview = true } = options;
        const payload: Record<string, unknown> = {
            chat_id: chatId,
            text,
            disable_web_page_preview: disablePreview
        };

        if (parseMode === undefined) {
            payload.parse_mode = 'HTML';
        } else if (parseMode) {
            payload.parse_mode = parseMode;
        }

        await retry(
            async () => {
                await this.http.post(this.buildUrl('sendMessage'), payload);
            },
            {
                retries: this.maxRetries,
                delayMs: this.retryDelayMs,
                shouldRetry: isRetryable,
                onRetry: (attempt, error) => {
                    this.logger.warn({ attempt, chatId, error: describeTelegramError(error) }, 'Retrying Telegram sendMessage');
                }
            }
        );
    }

    private buildUrl(method: string): string {
        return `${TELEGRAM_API_BASE}/bot${this.token}/${method}`;
    }
}

function isRetryable(error: unknown): boolean {
    if (!axios.isAxiosError(error)) {
        return false;
    }
    const status = error.response?.status;
    return status === undefined || status === 429 || status >= 500;
}

/**
 * Error summary without the request config, which carries the bot token in its URL.
 */
export function describeTelegramError(error: unknown): Record<string, unknown> {
    if (axios.isAxiosError(error)) {
        return { status: error.response?.status, code: error.code, message: error.message };
    }
    return { message: error instanceof Error ? error.message : String(error) };
}
