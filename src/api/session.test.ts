import { describe, expect, it } from 'vitest';
import { generateUmqid, SteamSession } from './session';

describe('SteamSession', () => {
    it('generates an unsigned 32-bit umqid when none is given', () => {
        const session = new SteamSession();
        expect(session.umqid).toMatch(/^\d+$/);
        expect(Number(session.umqid)).toBeLessThan(2 ** 32);
        expect(session.token).toBeNull();
        expect(session.steamid).toBeNull();
        expect(session.lastMessageId).toBe(0);
    });

    it('keeps a supplied umqid', () => {
        expect(new SteamSession({ umqid: 'umq-1' }).umqid).toBe('umq-1');
    });

    it('only advances the cursor forward', () => {
        const session = new SteamSession({ lastMessageId: 10 });

        expect(session.advanceCursor(9)).toBe(false);
        expect(session.advanceCursor(10)).toBe(false);
        expect(session.advanceCursor(11)).toBe(true);
        expect(session.advanceCursor(Number.NaN)).toBe(false);
        expect(session.lastMessageId).toBe(11);
    });

    it('clamps a negative starting cursor', () => {
        expect(new SteamSession({ lastMessageId: -5 }).lastMessageId).toBe(0);
    });
});

describe('generateUmqid', () => {
    it('renders digits only', () => {
        expect(generateUmqid()).toMatch(/^\d{1,10}$/);
    });
});
