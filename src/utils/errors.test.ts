import { describe, expect, it } from 'vitest';
import { describeError, SteamApiError } from './errors';

describe('SteamApiError', () => {
    it('prefixes without losing kind or cause', () => {
        const cause = new Error('reset');
        const error = new SteamApiError('transport', 'socket hang up', { cause }).withPrefix('Polling');

        expect(error).toBeInstanceOf(SteamApiError);
        expect(error.message).toBe('Polling: socket hang up');
        expect(error.kind).toBe('transport');
        expect(error.cause).toBe(cause);
        expect(error.isSoft).toBe(false);
    });

    it('marks server-reported errors as soft', () => {
        expect(new SteamApiError('poll', 'Bad').isSoft).toBe(true);
    });
});

describe('describeError', () => {
    it('reads messages from errors and stringifies the rest', () => {
        expect(describeError(new Error('boom'))).toBe('boom');
        expect(describeError(404)).toBe('404');
    });
});
