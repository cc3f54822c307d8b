import * as z from 'zod';
import { SteamApiError, type SteamApiErrorKind } from '@/utils/errors';
import type { SteamSession } from './session';
import {
    parseMessageType,
    type ApiResult,
    type OperationKind,
    type OperationResults,
    type SteamMessage,
    type SteamSummary,
} from './types';

export type DecodeOutcome<T> =
    | { type: 'deliver'; result: ApiResult<T> }
    | { type: 'relogon' };

export type ResponseDecoder<T> = (json: unknown, session: SteamSession) => DecodeOutcome<T>;

type DecoderTable = { [K in OperationKind]: ResponseDecoder<OperationResults[K]> };

const UNKNOWN_ERROR = 'Unknown error';

// Optional fields tolerate a wrong type by reading as absent.
const OptionalString = z.string().optional().catch(undefined);
const OptionalInt = z.number().int().optional().catch(undefined);
const OptionalArray = z.array(z.unknown()).optional().catch(undefined);

const StatusSchema = z.object({
    error: OptionalString,
}).passthrough();

const AuthResponseSchema = z.object({
    access_token: OptionalString,
    x_errorcode: OptionalString,
    error_description: OptionalString,
}).passthrough();

const FriendsResponseSchema = z.object({
    friends: OptionalArray,
}).passthrough();

const FriendEntrySchema = z.object({
    steamid: z.string(),
    relationship: z.string(),
}).passthrough();

const LogonResponseSchema = z.object({
    error: OptionalString,
    message: OptionalInt,
    steamid: OptionalString,
    umqid: OptionalString,
}).passthrough();

const PollResponseSchema = z.object({
    error: OptionalString,
    messagelast: OptionalInt,
    messages: OptionalArray,
}).passthrough();

const PollEntrySchema = z.object({
    steamid_from: z.string(),
    type: z.string(),
    text: OptionalString,
    persona_name: OptionalString,
    persona_state: OptionalInt,
}).passthrough();

const SummariesResponseSchema = z.object({
    players: OptionalArray,
}).passthrough();

const PlayerEntrySchema = z.object({
    steamid: z.string(),
    gameextrainfo: OptionalString,
    gameserverip: OptionalString,
    personaname: OptionalString,
    profileurl: OptionalString,
    realname: OptionalString,
    personastate: OptionalInt,
}).passthrough();

/** Reads a response object; anything that is not a JSON object reads as `{}`. */
function read<T extends z.ZodTypeAny>(schema: T, json: unknown): z.infer<T> {
    const parsed = schema.safeParse(json);
    return parsed.success ? parsed.data : schema.parse({});
}

function ok<T>(data: T): DecodeOutcome<T> {
    return { type: 'deliver', result: { status: 'ok', data } };
}

function fail<T>(kind: SteamApiErrorKind, message: string | undefined): DecodeOutcome<T> {
    return {
        type: 'deliver',
        result: { status: 'error', error: new SteamApiError(kind, message ?? UNKNOWN_ERROR) },
    };
}

function sameText(a: string | undefined, b: string): boolean {
    return a !== undefined && a.toLowerCase() === b.toLowerCase();
}

function isNotLoggedOn(error: string | undefined): boolean {
    return sameText(error, 'Not Logged On');
}

/** Adopts the cursor and identity a Logon response reports. */
function applyLogon(session: SteamSession, response: z.infer<typeof LogonResponseSchema>): void {
    if (response.message !== undefined) {
        session.advanceCursor(response.message);
    }
    if (response.steamid !== undefined && response.steamid !== session.steamid) {
        session.steamid = response.steamid;
    }
    if (response.umqid !== undefined && response.umqid !== session.umqid) {
        session.umqid = response.umqid;
    }
}

export const decodeAuth: ResponseDecoder<void> = (json, session) => {
    const response = read(AuthResponseSchema, json);
    if (response.access_token !== undefined) {
        session.token = response.access_token;
        return ok(undefined);
    }

    const kind = response.x_errorcode === 'steamguard_code_required' ? 'auth-requires-code' : 'auth';
    return fail(kind, response.error_description);
};

export const decodeFriends: ResponseDecoder<string[]> = (json) => {
    const response = read(FriendsResponseSchema, json);
    const friends: string[] = [];

    for (const raw of response.friends ?? []) {
        const entry = FriendEntrySchema.safeParse(raw);
        if (entry.success && entry.data.relationship === 'friend') {
            friends.push(entry.data.steamid);
        }
    }

    if (friends.length === 0) {
        return fail('friends', 'Empty friends list');
    }
    return ok(friends);
};

export const decodeLogon: ResponseDecoder<void> = (json, session) => {
    const response = read(LogonResponseSchema, json);
    if (response.error !== 'OK') {
        return fail('logon', response.error);
    }
    applyLogon(session, response);
    return ok(undefined);
};

export const decodeRelogon: ResponseDecoder<void> = (json, session) => {
    const response = read(LogonResponseSchema, json);
    if (response.error !== 'OK') {
        return fail('relogon', response.error);
    }
    applyLogon(session, response);
    return ok(undefined);
};

export const decodeLogoff: ResponseDecoder<void> = (json) => {
    const response = read(StatusSchema, json);
    if (response.error !== 'OK') {
        return fail('logoff', response.error);
    }
    return ok(undefined);
};

export const decodeMessage: ResponseDecoder<void> = (json) => {
    const response = read(StatusSchema, json);
    if (response.error === 'OK') {
        return ok(undefined);
    }
    if (isNotLoggedOn(response.error)) {
        return { type: 'relogon' };
    }
    return fail('message', response.error);
};

function decodePollEntry(entry: z.infer<typeof PollEntrySchema>): SteamMessage | null {
    const type = parseMessageType(entry.type);
    const steamid = entry.steamid_from;

    switch (type) {
        case 'saytext':
        case 'emote':
            return entry.text === undefined ? null : { type, steamid, text: entry.text };
        case 'personastate':
            // Observed payloads carry both the name and the numeric state.
            if (entry.persona_name === undefined || entry.persona_state === undefined) {
                return null;
            }
            return { type, steamid, nick: entry.persona_name, state: entry.persona_state };
        case 'personarelationship':
            return entry.persona_state === undefined ? null : { type, steamid, state: entry.persona_state };
        case 'typing':
        case 'leftconversation':
            return { type, steamid };
        case null:
            return null;
    }
}

export const decodePoll: ResponseDecoder<SteamMessage[]> = (json, session) => {
    const response = read(PollResponseSchema, json);

    if (response.messagelast !== undefined) {
        session.advanceCursor(response.messagelast);
    }

    if (response.error !== undefined && !sameText(response.error, 'Timeout') && !sameText(response.error, 'OK')) {
        if (isNotLoggedOn(response.error)) {
            return { type: 'relogon' };
        }
        return fail('poll', response.error);
    }

    const messages: SteamMessage[] = [];
    for (const raw of response.messages ?? []) {
        const entry = PollEntrySchema.safeParse(raw);
        if (!entry.success || entry.data.steamid_from === session.steamid) {
            continue;
        }
        const message = decodePollEntry(entry.data);
        if (message) {
            messages.push(message);
        }
    }
    return ok(messages);
};

export const decodeSummaries: ResponseDecoder<SteamSummary[]> = (json) => {
    const response = read(SummariesResponseSchema, json);
    const summaries: SteamSummary[] = [];

    for (const raw of response.players ?? []) {
        const entry = PlayerEntrySchema.safeParse(raw);
        if (!entry.success) {
            continue;
        }
        summaries.push({
            steamid: entry.data.steamid,
            game: entry.data.gameextrainfo,
            server: entry.data.gameserverip,
            nick: entry.data.personaname,
            profileUrl: entry.data.profileurl,
            fullName: entry.data.realname,
            state: entry.data.personastate ?? 0,
        });
    }

    if (summaries.length === 0) {
        return fail('summaries', 'No friends returned');
    }
    return ok(summaries);
};

export const responseDecoders: DecoderTable = {
    auth: decodeAuth,
    friends: decodeFriends,
    logon: decodeLogon,
    relogon: decodeRelogon,
    logoff: decodeLogoff,
    message: decodeMessage,
    poll: decodePoll,
    summaries: decodeSummaries,
};

export function decodeResponse<K extends OperationKind>(
    kind: K,
    json: unknown,
    session: SteamSession,
): DecodeOutcome<OperationResults[K]> {
    const decoder: ResponseDecoder<OperationResults[K]> = responseDecoders[kind];
    return decoder(json, session);
}
