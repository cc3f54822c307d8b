/**
 * Session client for the Steam Web API chat endpoints.
 *
 * Every operation resolves to an ApiResult exactly once. A message send or a
 * poll that finds the session expired is not resolved with that error: the
 * client logs on again and resends it, and the caller sees the outcome of the
 * resend.
 */

import { configuration as defaultConfiguration, type Configuration } from '@/configuration';
import { logger } from '@/ui/logger';
import { SteamApiError, describeError } from '@/utils/errors';
import { decodeResponse } from './decoders';
import { HttpClient, HttpRequest, type HttpLane, type HttpOutcome, type HttpRequestSpec } from './http/httpClient';
import { RelogonRecovery } from './relogon';
import {
    buildAuthRequest,
    buildFriendsRequest,
    buildLogoffRequest,
    buildLogonRequest,
    buildMessageRequest,
    buildPollRequest,
    buildSummariesRequest,
} from './requests';
import { SteamSession, type SessionInit } from './session';
import { batchSteamIds, joinSteamIds, SUMMARIES_BATCH_LIMIT } from './summaryBatcher';
import {
    OPERATION_NAMES,
    type ApiResult,
    type Credentials,
    type OperationKind,
    type OperationResults,
    type OutgoingMessage,
    type SteamMessage,
    type SteamSummary,
} from './types';

export interface SteamApiClientOptions extends SessionInit {
    configuration?: Configuration;
    http?: HttpClient;
}

interface RequestContext<K extends OperationKind> {
    kind: K;
    deliver: (result: ApiResult<OperationResults[K]>) => void;
}

export class SteamApiClient {
    readonly session: SteamSession;
    private readonly config: Configuration;
    private readonly http: HttpClient;
    private readonly relogon: RelogonRecovery;

    constructor(opts: SteamApiClientOptions = {}) {
        this.config = opts.configuration ?? defaultConfiguration;
        this.session = new SteamSession(opts);
        this.http = opts.http ?? new HttpClient({
            userAgent: this.config.userAgent,
            timeoutMs: this.config.requestTimeoutMs,
        });
        this.relogon = new RelogonRecovery(this.http, () => this.sendRelogon());
    }

    get relogonState() {
        return this.relogon.state;
    }

    authenticate(credentials: Credentials): Promise<ApiResult<void>> {
        return this.dispatch('auth', 'direct', () => buildAuthRequest(this.config, credentials));
    }

    fetchFriends(): Promise<ApiResult<string[]>> {
        return this.dispatch('friends', 'direct', () => buildFriendsRequest(this.config, this.session));
    }

    logon(): Promise<ApiResult<void>> {
        return this.dispatch('logon', 'direct', () => buildLogonRequest(this.config, this.session));
    }

    logoff(): Promise<ApiResult<void>> {
        return this.dispatch('logoff', 'direct', () => buildLogoffRequest(this.config, this.session));
    }

    sendMessage(message: SteamMessage): Promise<ApiResult<void>> {
        if (!isOutgoing(message)) {
            const error = new SteamApiError('message', `Cannot send messages of type ${message.type}`);
            return Promise.resolve<ApiResult<void>>({ status: 'error', error: error.withPrefix(OPERATION_NAMES.message) });
        }
        return this.dispatch('message', 'queued', () => buildMessageRequest(this.config, this.session, message));
    }

    poll(): Promise<ApiResult<SteamMessage[]>> {
        return this.dispatch('poll', 'direct', () => buildPollRequest(this.config, this.session));
    }

    /**
     * Fetches profile summaries in batches the server accepts, all sent at
     * once. Resolves to one result per batch, in batch order; an empty id
     * list resolves to a single empty result without touching the network.
     */
    async fetchSummaries(steamids: readonly string[] | null | undefined): Promise<ApiResult<SteamSummary[]>[]> {
        const batches = batchSteamIds(steamids ?? [], SUMMARIES_BATCH_LIMIT);
        if (batches.length === 0) {
            return [{ status: 'ok', data: [] }];
        }

        logger.debug(`[STEAM API] Fetching ${steamids?.length ?? 0} summaries in ${batches.length} batches`);
        return await Promise.all(batches.map((batch) => {
            const joined = joinSteamIds(batch);
            return this.dispatch('summaries', 'direct', () => buildSummariesRequest(this.config, this.session, joined));
        }));
    }

    fetchSummary(steamid: string): Promise<ApiResult<SteamSummary[]>> {
        if (steamid.length === 0) {
            const error = new SteamApiError('summaries', 'Missing SteamID');
            return Promise.resolve<ApiResult<SteamSummary[]>>({ status: 'error', error: error.withPrefix(OPERATION_NAMES.summaries) });
        }
        return this.dispatch('summaries', 'direct', () => buildSummariesRequest(this.config, this.session, steamid));
    }

    /** Aborts outstanding requests; their promises resolve with a transport error. */
    destroy(): void {
        this.http.destroy();
    }

    private sendRelogon(): void {
        void this.dispatch('relogon', 'direct', () => buildLogonRequest(this.config, this.session)).then((result) => {
            if (result.status === 'error' && result.error.isSoft) {
                logger.warn(`[RELOGON] ${result.error.message}`);
            } else if (result.status === 'error') {
                // Resent requests report transport and parse failures themselves.
                logger.debug(`[RELOGON] ${result.error.message}`);
            } else {
                logger.debug('[RELOGON] Session restored');
            }
        });
    }

    private dispatch<K extends OperationKind>(
        kind: K,
        lane: HttpLane,
        build: () => HttpRequestSpec,
    ): Promise<ApiResult<OperationResults[K]>> {
        return new Promise((resolve) => {
            let delivered = false;
            const context: RequestContext<K> = {
                kind,
                deliver: (result) => {
                    if (delivered) {
                        return;
                    }
                    delivered = true;
                    resolve(result);
                },
            };
            this.http.send(new HttpRequest(lane, build, (request, outcome) => this.complete(context, request, outcome)));
        });
    }

    private complete<K extends OperationKind>(context: RequestContext<K>, request: HttpRequest, outcome: HttpOutcome): void {
        let result: ApiResult<OperationResults[K]> | null;

        try {
            result = this.decode(context, request, outcome);
        } finally {
            // The lane resumes whatever the relogon outcome was.
            if (context.kind === 'relogon') {
                this.relogon.complete();
            }
        }

        if (!result) {
            // Resent after relogon; the resend delivers.
            return;
        }
        if (result.status === 'error') {
            result = { status: 'error', error: result.error.withPrefix(OPERATION_NAMES[context.kind]) };
        }
        context.deliver(result);
    }

    /** Returns the result to deliver, or null once the request is handed to relogon recovery. */
    private decode<K extends OperationKind>(
        context: RequestContext<K>,
        request: HttpRequest,
        outcome: HttpOutcome,
    ): ApiResult<OperationResults[K]> | null {
        if (outcome.status === 'error') {
            return { status: 'error', error: outcome.error };
        }

        let json: unknown;
        try {
            json = JSON.parse(outcome.body);
        } catch (error) {
            return { status: 'error', error: new SteamApiError('parse', `Parser: ${describeError(error)}`, { cause: error }) };
        }

        if (context.kind !== 'auth') {
            logger.debugLargeJson(`[STEAM API] ${context.kind} response`, json);
        }

        const decoded = decodeResponse(context.kind, json, this.session);
        if (decoded.type === 'deliver') {
            return decoded.result;
        }

        this.relogon.trigger(request);
        return null;
    }
}

function isOutgoing(message: SteamMessage): message is OutgoingMessage {
    return message.type === 'saytext' || message.type === 'emote' || message.type === 'typing';
}
