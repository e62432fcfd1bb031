/**
 * Sender of a message or callback.
 */
export interface ITelegramUser {
    /** Telegram user ID */
    id: number;
    /** Username (without @) */
    username?: string;
    first_name?: string;
    last_name?: string;
}

export interface ITelegramChat {
    id: number;
    /** Chat type (private, group, supergroup, channel) */
    type: string;
    title?: string;
}

/**
 * Telegram message object from a webhook update.
 */
export interface ITelegramMessage {
    message_id: number;
    /** Absent in channel posts. */
    from?: ITelegramUser;
    chat: ITelegramChat;
    text?: string;
}

export interface ITelegramCallbackQuery {
    id: string;
    from: ITelegramUser;
    data?: string;
    message?: ITelegramMessage;
}

/**
 * Telegram webhook update.
 *
 * @remarks
 * Only `message` is routed to commands. Other update types are acknowledged
 * and ignored.
 */
export interface ITelegramUpdate {
    update_id: number;
    message?: ITelegramMessage;
    callback_query?: ITelegramCallbackQuery;
}
