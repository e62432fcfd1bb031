/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { parseTrackedChannels } from '../channels.js';
import { ValidationError } from '../../lib/errors.js';

describe('parseTrackedChannels', () => {
    it('parses ids with optional names and handles', () => {
        expect(parseTrackedChannels('UCaaaaaaaaaaaaaaaaaaaaaa:Cooking Lab:@cookinglab, UCbbbbbbbbbbbbbbbbbbbbbb')).toEqual([
            { entityId: 'UCaaaaaaaaaaaaaaaaaaaaaa', entityType: 'channel', displayName: 'Cooking Lab', handle: '@cookinglab' },
            { entityId: 'UCbbbbbbbbbbbbbbbbbbbbbb', entityType: 'channel', displayName: 'UCbbbbbbbbbbbbbbbbbbbbbb' }
        ]);
    });

    it('skips blanks and duplicates', () => {
        const entries = parseTrackedChannels(' ,UCaaaaaaaaaaaaaaaaaaaaaa:First,,UCaaaaaaaaaaaaaaaaaaaaaa:Second');

        expect(entries).toEqual([{ entityId: 'UCaaaaaaaaaaaaaaaaaaaaaa', entityType: 'channel', displayName: 'First' }]);
    });

    it('returns nothing for an empty list', () => {
        expect(parseTrackedChannels('')).toEqual([]);
    });

    it('rejects an entry without an id', () => {
        expect(() => parseTrackedChannels(':Nameless')).toThrow(ValidationError);
    });
});
