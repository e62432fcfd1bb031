import type { ILogger, IStatsService, ITrackedEntity } from '@tubepulse/types';
import { RateLimitError, ValidationError } from '../../lib/errors.js';
import { inferEntityType, type EntityRegistry } from '../stats/services/entity-registry.js';
import type { RequestLimiter } from './request-limiter.js';
import type { ITelegramMessage, ITelegramUpdate } from './ITelegramUpdate.js';
import {
    STALE_NOTE,
    UNAVAILABLE_NOTE,
    escapeHtml,
    formatComments,
    formatCurrentStats,
    formatQuota,
    formatStatus,
    formatSummary,
    formatTopContent,
    formatTrend,
    formatTrending,
    formatVideos
} from './message-formatter.js';

/**
 * Command handler response.
 */
export interface ICommandResponse {
    chatId: string;
    text: string;
    parseMode: 'HTML' | null;
}

export interface CommandHandlerOptions {
    adminId: number;
    defaultWindowDays: number;
    maxWindowDays: number;
}

interface CommandContext {
    chatId: string;
    userId: number;
    args: string[];
}

type Command = (context: CommandContext) => Promise<string>;

const HELP_TEXT = [
    '<b>Commands</b>',
    '/stats [channel] - current statistics',
    '/trend &lt;channel&gt; [days] - growth over a period',
    '/summary [days] - growth of all tracked channels',
    '/videos &lt;channel&gt; - recent uploads',
    '/top [days] - best performing channels and uploads',
    '/trending - what the most popular chart has in common',
    '/help - this message'
].join('\n');

const ADMIN_HELP_TEXT = [
    '',
    '<b>Admin</b>',
    '/quota - upstream quota and forecast',
    '/status - service status',
    '/add_channel &lt;id&gt; [name] - start tracking a channel',
    '/remove_channel &lt;channel&gt; - stop tracking a channel'
].join('\n');

/**
 * Handles bot commands and renders replies.
 *
 * Data commands pass through the per-user request limiter; admin commands
 * answer only the configured admin. The handler never throws for expected
 * failures: limits, bad arguments and unknown channels become replies.
 */
export class CommandHandler {
    private readonly commands: Record<string, Command>;
    private readonly adminCommands: Record<string, Command>;

    /**
     * @param stats - Stats facade
     * @param registry - Tracked entity registry for name resolution and admin edits
     * @param limiter - Per-user request limiter
     * @param options - Admin identity and trend window bounds
     * @param logger - Scoped logger
     */
    constructor(
        private readonly stats: IStatsService,
        private readonly registry: EntityRegistry,
        private readonly limiter: RequestLimiter,
        private readonly options: CommandHandlerOptions,
        private readonly logger: ILogger
    ) {
        this.commands = {
            '/start': context => this.handleStart(context),
            '/help': context => this.handleHelp(context),
            '/stats': context => this.limited(context, () => this.handleStats(context)),
            '/trend': context => this.limited(context, () => this.handleTrend(context)),
            '/summary': context => this.limited(context, () => this.handleSummary(context)),
            '/videos': context => this.limited(context, () => this.handleVideos(context)),
            '/top': context => this.limited(context, () => this.handleTop(context)),
            '/trending': context => this.limited(context, () => this.handleTrending())
        };
        this.adminCommands = {
            '/quota': () => this.handleQuota(),
            '/status': () => this.handleStatus(),
            '/add_channel': context => this.handleAddChannel(context),
            '/remove_channel': context => this.handleRemoveChannel(context)
        };
    }

    /**
     * Route an update to its command.
     *
     * @returns Reply to send, or null when the update is not a command in a private chat
     */
    async handleUpdate(update: ITelegramUpdate): Promise<ICommandResponse | null> {
        const message = update.message;
        if (!message?.text || !message.from) {
            return null;
        }

        if (message.chat.type !== 'private') {
            this.logger.debug({ chatType: message.chat.type }, 'Ignoring non-private message');
            return null;
        }

        const parsed = parseCommand(message.text);
        if (!parsed) {
            return null;
        }

        const chatId = String(message.chat.id);
        const context: CommandContext = { chatId, userId: message.from.id, args: parsed.args };
        const text = await this.dispatch(parsed.name, context, message);
        return { chatId, text, parseMode: 'HTML' };
    }

    private async dispatch(name: string, context: CommandContext, message: ITelegramMessage): Promise<string> {
        const command = this.commands[name];
        const adminCommand = this.adminCommands[name];

        try {
            if (command) {
                return await command(context);
            }
            if (adminCommand) {
                if (context.userId !== this.options.adminId) {
                    this.logger.warn({ userId: context.userId, command: name }, 'Admin command refused');
                    return '⛔ This command is available to the administrator only.';
                }
                return await adminCommand(context);
            }
            return '❓ Unknown command. Try /help to see available commands.';
        } catch (error) {
            if (error instanceof RateLimitError || error instanceof ValidationError) {
                return `⚠️ ${escapeHtml(error.message)}`;
            }
            this.logger.error({ error, command: name, chatId: context.chatId, messageId: message.message_id }, 'Command failed');
            return '⚠️ Sorry, something went wrong processing your request. Please try again later.';
        }
    }

    private async limited(context: CommandContext, run: () => Promise<string>): Promise<string> {
        const allowance = await this.limiter.consume(context.userId);
        const text = await run();
        return allowance.exempt ? text : `${text}\n\n<i>Requests today: ${allowance.used}/${allowance.limit}</i>`;
    }

    private async handleStart(context: CommandContext): Promise<string> {
        const tracked = this.registry.list().length;
        return [
            '👋 <b>Welcome!</b>',
            `I report view, subscriber and engagement statistics for ${tracked} tracked channel(s).`,
            '',
            await this.handleHelp(context)
        ].join('\n');
    }

    private async handleHelp(context: CommandContext): Promise<string> {
        return context.userId === this.options.adminId ? HELP_TEXT + ADMIN_HELP_TEXT : HELP_TEXT;
    }

    private async handleStats(context: CommandContext): Promise<string> {
        const query = context.args.join(' ');
        let ids: string[];

        if (query) {
            const entity = this.registry.resolve(query);
            ids = [entity?.entityId ?? query];
        } else {
            ids = this.registry.list().map(entity => entity.entityId);
        }

        if (ids.length === 0) {
            return 'No channels are tracked yet.';
        }
        return formatCurrentStats(await this.stats.getCurrent(ids));
    }

    private async handleTrend(context: CommandContext): Promise<string> {
        const [query, rawDays] = splitTrailingNumber(context.args);
        if (!query) {
            return 'Usage: /trend &lt;channel&gt; [days]';
        }

        const days = rawDays === undefined ? this.options.defaultWindowDays : rawDays;
        if (!Number.isInteger(days) || days < 1 || days > this.options.maxWindowDays) {
            return `⚠️ Days must be between 1 and ${this.options.maxWindowDays}.`;
        }

        const entity = this.registry.resolve(query);
        const entityId = entity?.entityId ?? query;
        const name = entity?.displayName ?? entityId;
        const result = await this.stats.getTrend(entityId, days);

        switch (result.status) {
            case 'ok':
                return formatTrend(name, result.trend);
            case 'no-data':
                return `📈 <b>${escapeHtml(name)}</b>\nNot enough data yet (${result.points} day(s) recorded).`;
            case 'not-found':
                return `Unknown channel: ${escapeHtml(query)}`;
            case 'unavailable':
                return `📈 <b>${escapeHtml(name)}</b>\n<i>${UNAVAILABLE_NOTE}</i>`;
        }
    }

    private async handleSummary(context: CommandContext): Promise<string> {
        const days = this.periodDays(context.args[0]);
        if (days === null) {
            return `⚠️ Days must be between 1 and ${this.options.maxWindowDays}.`;
        }

        const summary = await this.stats.getSummary(days);
        if (!summary) {
            return `🗓 Summary: <i>${UNAVAILABLE_NOTE}</i>`;
        }

        const names = new Map(this.registry.list(false).map(entity => [entity.entityId, entity.displayName]));
        return formatSummary(summary, names);
    }

    private async handleTop(context: CommandContext): Promise<string> {
        const days = this.periodDays(context.args[0]);
        if (days === null) {
            return `⚠️ Days must be between 1 and ${this.options.maxWindowDays}.`;
        }

        const top = await this.stats.getTopContent(days);
        return top ? formatTopContent(top) : `🏆 Top content: <i>${UNAVAILABLE_NOTE}</i>`;
    }

    private async handleTrending(): Promise<string> {
        const result = await this.stats.getTrending();
        switch (result.status) {
            case 'fresh':
                return formatTrending(result.analysis);
            case 'stale':
                return `${formatTrending(result.analysis)}\n\n<i>${STALE_NOTE}</i>`;
            case 'unavailable':
                return `🔥 Trending: <i>${UNAVAILABLE_NOTE}</i>`;
        }
    }

    /**
     * Day count for period commands, or null when out of range.
     */
    private periodDays(raw: string | undefined): number | null {
        const days = raw === undefined ? this.options.defaultWindowDays : Number(raw);
        return Number.isInteger(days) && days >= 1 && days <= this.options.maxWindowDays ? days : null;
    }

    private async handleVideos(context: CommandContext): Promise<string> {
        const query = context.args.join(' ');
        if (!query) {
            return 'Usage: /videos &lt;channel&gt;';
        }

        const entity = this.registry.resolve(query);
        const channelId = entity?.entityId ?? query;
        const name = entity?.displayName ?? channelId;

        const videos = await this.stats.getRecentVideos(channelId);
        if (videos.status === 'unavailable') {
            return `🎬 <b>${escapeHtml(name)}</b>\n<i>${UNAVAILABLE_NOTE}</i>`;
        }

        const sections = [formatVideos(name, videos.items)];
        const top = videos.items[0];
        if (top) {
            const comments = await this.stats.getTopComments(top.videoId);
            if (comments.status !== 'unavailable' && comments.items.length > 0) {
                sections.push(`<b>Top comments on the latest upload</b>\n${formatComments(comments.items)}`);
            }
        }
        if (videos.status === 'stale') {
            sections.push(`<i>${STALE_NOTE}</i>`);
        }
        return sections.join('\n\n');
    }

    private async handleQuota(): Promise<string> {
        const status = await this.stats.getStatus();
        return formatQuota(status.quota, status.forecast);
    }

    private async handleStatus(): Promise<string> {
        return formatStatus(await this.stats.getStatus());
    }

    private async handleAddChannel(context: CommandContext): Promise<string> {
        const [entityId, ...nameParts] = context.args;
        if (!entityId) {
            return 'Usage: /add_channel &lt;id&gt; [name]';
        }

        const entity = await this.registry.add({
            entityId,
            entityType: inferEntityType(entityId),
            displayName: nameParts.join(' ') || entityId
        });
        return `✅ Tracking ${describeEntity(entity)}.`;
    }

    private async handleRemoveChannel(context: CommandContext): Promise<string> {
        const query = context.args.join(' ');
        if (!query) {
            return 'Usage: /remove_channel &lt;channel&gt;';
        }

        const entity = this.registry.resolve(query);
        const entityId = entity?.entityId ?? query;
        const removed = await this.registry.deactivate(entityId);
        return removed
            ? `🗑 Stopped tracking ${entity ? describeEntity(entity) : escapeHtml(entityId)}. History is kept.`
            : `Not tracked: ${escapeHtml(query)}`;
    }
}

/**
 * Split `/command@botname arg1 arg2` into a lower-cased name and arguments.
 */
export function parseCommand(text: string): { name: string; args: string[] } | null {
    const trimmed = text.trim();
    if (!trimmed.startsWith('/')) {
        return null;
    }
    const [head = '', ...args] = trimmed.split(/\s+/);
    const name = head.split('@')[0]?.toLowerCase() ?? '';
    return { name, args };
}

/**
 * Treat a trailing integer argument as a day count: `/trend Cooking Lab 30`.
 */
function splitTrailingNumber(args: readonly string[]): [string, number | undefined] {
    const last = args[args.length - 1];
    if (args.length > 1 && last !== undefined && /^-?\d+$/.test(last)) {
        return [args.slice(0, -1).join(' '), Number(last)];
    }
    return [args.join(' '), undefined];
}

function describeEntity(entity: ITrackedEntity): string {
    return `<b>${escapeHtml(entity.displayName)}</b> (${entity.entityType} ${escapeHtml(entity.entityId)})`;
}
