import type { INewTrackedEntity } from '@tubepulse/types';
import { ValidationError } from '../lib/errors.js';

/**
 * Parse the `TRACKED_CHANNELS` seed list.
 *
 * Entries are comma separated, each `channelId[:Display Name[:@handle]]`.
 * Blank entries are skipped; the display name defaults to the id.
 *
 * @example
 * parseTrackedChannels('UCaaaaaaaaaaaaaaaaaaaaaa:Cooking Lab:@cookinglab')
 * // [{ entityId: 'UCaaaaaaaaaaaaaaaaaaaaaa', entityType: 'channel', displayName: 'Cooking Lab', handle: '@cookinglab' }]
 */
export function parseTrackedChannels(raw: string): INewTrackedEntity[] {
    const seen = new Set<string>();
    const entries: INewTrackedEntity[] = [];

    for (const chunk of raw.split(',')) {
        const trimmed = chunk.trim();
        if (!trimmed) {
            continue;
        }

        const [id = '', name, handle] = trimmed.split(':').map(part => part.trim());
        if (!id) {
            throw new ValidationError('TRACKED_CHANNELS entry is missing a channel id', { entry: trimmed });
        }
        if (seen.has(id)) {
            continue;
        }
        seen.add(id);

        entries.push({
            entityId: id,
            entityType: 'channel',
            displayName: name || id,
            ...(handle ? { handle } : {})
        });
    }

    return entries;
}
