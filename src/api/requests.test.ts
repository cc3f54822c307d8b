import { describe, expect, it } from 'vitest';
import { loadConfiguration } from '@/configuration';
import {
    buildAuthRequest,
    buildLogoffRequest,
    buildLogonRequest,
    buildMessageRequest,
    buildPollRequest,
    buildSummariesRequest,
} from './requests';
import { SteamSession } from './session';

const config = loadConfiguration({ STEAM_API_HOST: 'api.example.test', STEAM_POLL_TIMEOUT: '25' });

function newSession() {
    return new SteamSession({ token: 'test-token', umqid: 'umq-1', steamid: 'self', lastMessageId: 9 });
}

describe('request builders', () => {
    it('builds auth without an access token', () => {
        const spec = buildAuthRequest(config, { username: 'test-user', password: 'test-password' });

        expect(spec).toMatchObject({ host: 'api.example.test', port: 443, method: 'POST', ssl: true });
        expect(spec.headers).toEqual({ 'User-Agent': 'Steam 1291812 / iPhone' });
        expect(spec.params).not.toHaveProperty('access_token');
        expect(spec.params.scope).toBe('read_profile write_profile read_client write_client');
    });

    it('shares one shape between logon and logoff', () => {
        const params = { format: 'json', access_token: 'test-token', umqid: 'umq-1' };
        expect(buildLogonRequest(config, newSession()).params).toEqual(params);
        expect(buildLogoffRequest(config, newSession()).params).toEqual(params);
    });

    it('includes the cursor and long-poll hint in polls', () => {
        const spec = buildPollRequest(config, newSession());

        expect(spec.keepAlive).toBe(true);
        expect(spec.params).toEqual({
            format: 'json',
            access_token: 'test-token',
            umqid: 'umq-1',
            message: 9,
            sectimeout: 25,
        });
    });

    it('reads the session at build time', () => {
        const session = newSession();
        const build = () => buildMessageRequest(config, session, { type: 'saytext', steamid: 'friend', text: 'hi' });

        expect(build().params.umqid).toBe('umq-1');
        session.umqid = 'umq-2';
        expect(build().params.umqid).toBe('umq-2');
    });

    it('leaves the text out of typing notifications', () => {
        const spec = buildMessageRequest(config, newSession(), { type: 'typing', steamid: 'friend' });
        expect(spec.params.text).toBeUndefined();
        expect(spec.params.type).toBe('typing');
    });

    it('passes joined ids to summaries', () => {
        const spec = buildSummariesRequest(config, newSession(), '1,2');
        expect(spec.method).toBe('GET');
        expect(spec.params.steamids).toBe('1,2');
    });
});
