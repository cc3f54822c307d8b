import { randomInt } from 'node:crypto';

export interface SessionInit {
    token?: string | null;
    umqid?: string | null;
    steamid?: string | null;
    lastMessageId?: number;
}

export interface SessionSnapshot {
    token: string | null;
    umqid: string;
    steamid: string | null;
    lastMessageId: number;
}

/** Random unsigned 32-bit integer in decimal, the shape the server hands out itself. */
export function generateUmqid(): string {
    return String(randomInt(0, 0x1_0000_0000));
}

/**
 * Authenticated identity shared by every request of one client.
 *
 * Only response decoders write to it, and they run one at a time on the
 * completion path, so no locking is involved.
 */
export class SteamSession {
    token: string | null;
    umqid: string;
    steamid: string | null;
    private cursor: number;

    constructor(init: SessionInit = {}) {
        this.token = init.token ?? null;
        this.umqid = init.umqid ?? generateUmqid();
        this.steamid = init.steamid ?? null;
        this.cursor = init.lastMessageId !== undefined && Number.isSafeInteger(init.lastMessageId)
            ? Math.max(0, init.lastMessageId)
            : 0;
    }

    get lastMessageId(): number {
        return this.cursor;
    }

    /** Moves the poll cursor forward; values at or behind the current cursor are ignored. */
    advanceCursor(next: number): boolean {
        if (!Number.isSafeInteger(next) || next <= this.cursor) {
            return false;
        }
        this.cursor = next;
        return true;
    }

    snapshot(): SessionSnapshot {
        return {
            token: this.token,
            umqid: this.umqid,
            steamid: this.steamid,
            lastMessageId: this.cursor,
        };
    }
}
