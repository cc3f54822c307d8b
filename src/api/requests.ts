import type { Configuration } from '@/configuration';
import type { HttpRequestSpec } from './http/httpClient';
import type { SteamSession } from './session';
import type { Credentials, OutgoingMessage } from './types';

export const STEAM_API_PATHS = {
    auth: '/ISteamOAuth2/GetTokenWithCredentials/v0001',
    friends: '/ISteamUserOAuth/GetFriendList/v0001',
    logon: '/ISteamWebUserPresenceOAuth/Logon/v0001',
    logoff: '/ISteamWebUserPresenceOAuth/Logoff/v0001',
    message: '/ISteamWebUserPresenceOAuth/Message/v0001',
    poll: '/ISteamWebUserPresenceOAuth/Poll/v0001',
    summaries: '/ISteamUserOAuth/GetUserSummaries/v0001',
} as const;

function base(config: Configuration, path: string, method: HttpRequestSpec['method']): Omit<HttpRequestSpec, 'params'> {
    return {
        host: config.apiHost,
        port: config.apiPort,
        path,
        method,
        ssl: true,
    };
}

export function buildAuthRequest(config: Configuration, credentials: Credentials): HttpRequestSpec {
    return {
        ...base(config, STEAM_API_PATHS.auth, 'POST'),
        headers: { 'User-Agent': config.authUserAgent },
        params: {
            format: config.format,
            client_id: config.clientId,
            grant_type: 'password',
            username: credentials.username,
            password: credentials.password,
            x_emailauthcode: credentials.authCode,
            scope: config.authScope,
        },
    };
}

export function buildFriendsRequest(config: Configuration, session: SteamSession): HttpRequestSpec {
    return {
        ...base(config, STEAM_API_PATHS.friends, 'GET'),
        params: {
            format: config.format,
            access_token: session.token,
            steamid: session.steamid,
            relationship: 'friend',
        },
    };
}

/** Logon and relogon share one request shape. */
export function buildLogonRequest(config: Configuration, session: SteamSession): HttpRequestSpec {
    return {
        ...base(config, STEAM_API_PATHS.logon, 'POST'),
        params: {
            format: config.format,
            access_token: session.token,
            umqid: session.umqid,
        },
    };
}

export function buildLogoffRequest(config: Configuration, session: SteamSession): HttpRequestSpec {
    return {
        ...base(config, STEAM_API_PATHS.logoff, 'POST'),
        params: {
            format: config.format,
            access_token: session.token,
            umqid: session.umqid,
        },
    };
}

export function buildMessageRequest(config: Configuration, session: SteamSession, message: OutgoingMessage): HttpRequestSpec {
    return {
        ...base(config, STEAM_API_PATHS.message, 'POST'),
        params: {
            format: config.format,
            access_token: session.token,
            umqid: session.umqid,
            steamid_dst: message.steamid,
            type: message.type,
            // typing notifications carry no body
            text: message.type === 'typing' ? undefined : message.text,
        },
    };
}

export function buildPollRequest(config: Configuration, session: SteamSession): HttpRequestSpec {
    return {
        ...base(config, STEAM_API_PATHS.poll, 'POST'),
        keepAlive: true,
        params: {
            format: config.format,
            access_token: session.token,
            umqid: session.umqid,
            message: session.lastMessageId,
            sectimeout: config.pollTimeoutSeconds,
        },
    };
}

export function buildSummariesRequest(config: Configuration, session: SteamSession, steamids: string): HttpRequestSpec {
    return {
        ...base(config, STEAM_API_PATHS.summaries, 'GET'),
        params: {
            format: config.format,
            access_token: session.token,
            steamids,
        },
    };
}
