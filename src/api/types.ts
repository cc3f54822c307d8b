import type { SteamApiError } from '@/utils/errors';

/**
 * Event kinds as they appear on the wire, in the order the server
 * documentation lists them. Matching against server strings is
 * case-insensitive.
 */
export const MESSAGE_TYPES = [
    'saytext',
    'emote',
    'leftconversation',
    'personarelationship',
    'personastate',
    'typing',
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export function parseMessageType(value: string): MessageType | null {
    const lowered = value.toLowerCase();
    return MESSAGE_TYPES.find((type) => type === lowered) ?? null;
}

export type SteamMessage =
    | { type: 'saytext' | 'emote'; steamid: string; text: string }
    | { type: 'typing' | 'leftconversation'; steamid: string }
    | { type: 'personastate'; steamid: string; nick: string; state: number }
    | { type: 'personarelationship'; steamid: string; state: number };

/** Message kinds the Message endpoint accepts. */
export type OutgoingMessage = SteamMessage & { type: 'saytext' | 'emote' | 'typing' };

export interface SteamSummary {
    steamid: string;
    game?: string;
    server?: string;
    nick?: string;
    profileUrl?: string;
    fullName?: string;
    state: number;
}

export const PERSONA_STATES = ['Offline', 'Online', 'Busy', 'Away', 'Snooze'] as const;

export type PersonaStateName = (typeof PERSONA_STATES)[number];

export const PersonaState = {
    Offline: 0,
    Online: 1,
    Busy: 2,
    Away: 3,
    Snooze: 4,
} as const satisfies Record<PersonaStateName, number>;

export function personaStateName(state: number): PersonaStateName | '' {
    return PERSONA_STATES[state] ?? '';
}

export function personaStateFromName(name: string | null | undefined): number {
    if (!name) {
        return PersonaState.Offline;
    }
    const lowered = name.toLowerCase();
    const index = PERSONA_STATES.findIndex((state) => state.toLowerCase() === lowered);
    return index === -1 ? PersonaState.Offline : index;
}

/** Result type of each operation, keyed by operation kind. */
export interface OperationResults {
    auth: void;
    friends: string[];
    logon: void;
    relogon: void;
    logoff: void;
    message: void;
    poll: SteamMessage[];
    summaries: SteamSummary[];
}

export type OperationKind = keyof OperationResults;

export const OPERATION_NAMES: Record<OperationKind, string> = {
    auth: 'Authentication',
    friends: 'Friends',
    logon: 'Logon',
    relogon: 'Relogon',
    logoff: 'Logoff',
    message: 'Message',
    poll: 'Polling',
    summaries: 'Summaries',
};

export type ApiResult<T> =
    | { status: 'ok'; data: T }
    | { status: 'error'; error: SteamApiError };

export interface Credentials {
    username: string;
    password: string;
    /** Steam Guard code mailed to the account owner, when the server asked for one. */
    authCode?: string;
}
