import * as z from 'zod';

export const PACKAGE_NAME = 'steam-web-chat';
export const PACKAGE_VERSION = '0.1.0';

const PortSchema = z.coerce.number().int().min(1).max(65535);

const EnvSchema = z.object({
    STEAM_API_HOST: z.string().min(1).default('api.steampowered.com'),
    STEAM_API_PORT: PortSchema.default(443),
    STEAM_API_CLIENT_ID: z.string().min(1).default('DE45CD61'),
    STEAM_POLL_TIMEOUT: z.coerce.number().int().min(1).max(300).default(30),
    STEAM_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1_000).default(60_000),
    STEAM_LOG_FILE: z.string().min(1).optional(),
    DEBUG: z.string().optional(),
}).superRefine((vars, ctx) => {
    if (vars.STEAM_REQUEST_TIMEOUT_MS <= vars.STEAM_POLL_TIMEOUT * 1000) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['STEAM_REQUEST_TIMEOUT_MS'],
            message: `must exceed STEAM_POLL_TIMEOUT (${vars.STEAM_POLL_TIMEOUT}s), got ${vars.STEAM_REQUEST_TIMEOUT_MS}ms`,
        });
    }
});

export interface Configuration {
    readonly apiHost: string;
    readonly apiPort: number;
    readonly clientId: string;
    /** Server-side long-poll hold time sent as `sectimeout`. */
    readonly pollTimeoutSeconds: number;
    /** Local deadline for a single HTTP exchange; must outlive the long poll. */
    readonly requestTimeoutMs: number;
    readonly format: 'json';
    readonly userAgent: string;
    readonly authUserAgent: string;
    readonly authScope: string;
    readonly logFile: string | null;
    readonly isDebug: boolean;
}

function emptyToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
    const out: Record<string, string | undefined> = {};
    for (const [key, value] of Object.entries(env)) {
        out[key] = value === '' ? undefined : value;
    }
    return out;
}

export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): Configuration {
    const parsed = EnvSchema.safeParse(emptyToUndefined(env));
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }

    const vars = parsed.data;
    const debug = vars.DEBUG?.toLowerCase();

    return {
        apiHost: vars.STEAM_API_HOST,
        apiPort: vars.STEAM_API_PORT,
        clientId: vars.STEAM_API_CLIENT_ID,
        pollTimeoutSeconds: vars.STEAM_POLL_TIMEOUT,
        requestTimeoutMs: vars.STEAM_REQUEST_TIMEOUT_MS,
        format: 'json',
        userAgent: `Steam App / ${PACKAGE_NAME} / ${PACKAGE_VERSION} / 0`,
        authUserAgent: 'Steam 1291812 / iPhone',
        authScope: 'read_profile write_profile read_client write_client',
        logFile: vars.STEAM_LOG_FILE ?? null,
        isDebug: debug !== undefined && ['true', '1', 'yes'].includes(debug),
    };
}

export const configuration: Configuration = loadConfiguration();
