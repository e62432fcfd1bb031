import type { IKeyValueStore } from '@tubepulse/types';
import { addDays, dayStart, toDayKey } from '../../lib/dates.js';
import { RateLimitError } from '../../lib/errors.js';

export interface RequestLimiterOptions {
    /** Requests per user per UTC day. */
    dailyLimit: number;
    /** Minimum spacing between two requests of the same user; 0 disables it. */
    cooldownSeconds: number;
    /** Telegram id exempt from both limits. */
    adminId: number;
}

export type RequestAllowance =
    | { exempt: true }
    | { exempt: false; used: number; limit: number };

/**
 * Per-user request limiting for data commands.
 *
 * Two keys per user on the key-value tier: a daily counter that expires at the
 * next UTC midnight, and a cooldown marker holding the instant the user may
 * ask again. The marker is claimed with one set-if-absent, so of two
 * simultaneous requests only one gets through. Refused requests do not count
 * toward the daily limit and do not start a cooldown.
 */
export class RequestLimiter {
    private readonly KEY_PREFIX = 'limit:';

    constructor(
        private readonly store: IKeyValueStore,
        private readonly options: RequestLimiterOptions,
        private readonly clock: () => number = Date.now
    ) {}

    /**
     * Count one request for `userId`.
     *
     * @throws RateLimitError during the cooldown or once the daily limit is reached
     */
    async consume(userId: number): Promise<RequestAllowance> {
        if (userId === this.options.adminId) {
            return { exempt: true };
        }

        const now = this.clock();
        const cooldownKey = `${this.KEY_PREFIX}cooldown:${userId}`;
        const cooldownMs = this.options.cooldownSeconds * 1000;

        if (cooldownMs > 0 && !(await this.store.setIfAbsent(cooldownKey, String(now + cooldownMs), cooldownMs))) {
            const until = Number(await this.store.get(cooldownKey));
            const retryAfterSeconds = Math.max(Math.ceil((until - now) / 1000), 1);
            throw new RateLimitError(`Please wait ${retryAfterSeconds} s before the next request`, {
                reason: 'cooldown',
                retryAfterSeconds
            });
        }

        const day = toDayKey(new Date(now));
        const dailyKey = `${this.KEY_PREFIX}daily:${userId}:${day}`;
        const untilMidnight = dayStart(addDays(day, 1)).getTime() - now;

        const used = await this.store.incrBy(dailyKey, 1, untilMidnight);
        if (used > this.options.dailyLimit) {
            await this.store.incrBy(dailyKey, -1);
            if (cooldownMs > 0) {
                await this.store.del(cooldownKey);
            }
            throw new RateLimitError(`Daily limit of ${this.options.dailyLimit} requests reached, try again tomorrow`, {
                reason: 'daily',
                limit: this.options.dailyLimit
            });
        }

        return { exempt: false, used, limit: this.options.dailyLimit };
    }
}
