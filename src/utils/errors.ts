export const STEAM_API_ERROR_KINDS = [
    'transport',
    'parse',
    'auth',
    'auth-requires-code',
    'friends',
    'logon',
    'relogon',
    'logoff',
    'message',
    'poll',
    'summaries',
] as const;

export type SteamApiErrorKind = (typeof STEAM_API_ERROR_KINDS)[number];

/**
 * Error value delivered inside an ApiResult. Public client operations never
 * throw it; `kind` tells transport and parse failures apart from the soft
 * errors the server reports in its JSON payload.
 */
export class SteamApiError extends Error {
    readonly kind: SteamApiErrorKind;

    constructor(kind: SteamApiErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SteamApiError';
        this.kind = kind;
    }

    /** Returns a copy whose message reads `<prefix>: <message>`. */
    withPrefix(prefix: string): SteamApiError {
        return new SteamApiError(this.kind, `${prefix}: ${this.message}`, { cause: this.cause });
    }

    /** True for server-reported failures, false for transport and parse failures. */
    get isSoft(): boolean {
        return this.kind !== 'transport' && this.kind !== 'parse';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
