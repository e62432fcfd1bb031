export { CommandHandler, parseCommand, type ICommandResponse, type CommandHandlerOptions } from './command-handlers.js';
export { RequestLimiter, type RequestLimiterOptions, type RequestAllowance } from './request-limiter.js';
export { TelegramClient, type ITelegramSendOptions } from './telegram-client.js';
export { createWebhookHandler } from './webhook-handler.js';
export { validateTelegramWebhook, DEFAULT_TELEGRAM_IPS } from './security.js';
export type { ITelegramUpdate, ITelegramMessage } from './ITelegramUpdate.js';
