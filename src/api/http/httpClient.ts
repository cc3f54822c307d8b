/**
 * Transport adapter for the Steam Web API.
 *
 * Requests are described by a builder that is invoked every time the request
 * goes out, so a resend after relogon carries the refreshed session. Message
 * sends travel on the queued lane: one at a time, in submission order, and
 * held while the lane is paused.
 */

import axios from 'axios';
import { logger } from '@/ui/logger';
import { SteamApiError, describeError } from '@/utils/errors';

export type HttpMethod = 'GET' | 'POST';

export type HttpParams = Record<string, string | number | null | undefined>;

export interface HttpRequestSpec {
    host: string;
    port: number;
    path: string;
    method: HttpMethod;
    headers?: Record<string, string>;
    params: HttpParams;
    ssl: boolean;
    keepAlive?: boolean;
}

export type HttpOutcome =
    | { status: 'ok'; httpStatus: number; body: string }
    | { status: 'error'; error: SteamApiError };

export type HttpLane = 'queued' | 'direct';

export class HttpRequest {
    attempts = 0;

    constructor(
        readonly lane: HttpLane,
        readonly build: () => HttpRequestSpec,
        readonly onComplete: (request: HttpRequest, outcome: HttpOutcome) => void,
    ) {}
}

export interface HttpClientOptions {
    userAgent: string;
    timeoutMs: number;
}

export function buildUrl(spec: Pick<HttpRequestSpec, 'host' | 'port' | 'path' | 'ssl'>): string {
    const scheme = spec.ssl ? 'https' : 'http';
    const defaultPort = spec.ssl ? 443 : 80;
    const port = spec.port === defaultPort ? '' : `:${spec.port}`;
    return `${scheme}://${spec.host}${port}${spec.path}`;
}

export function encodeParams(params: HttpParams): URLSearchParams {
    const encoded = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
        if (value === null || value === undefined) {
            continue;
        }
        encoded.append(key, String(value));
    }
    return encoded;
}

export class HttpClient {
    private readonly queue: HttpRequest[] = [];
    private readonly held: HttpRequest[] = [];
    private readonly inFlight = new Map<HttpRequest, AbortController>();
    private queueBusy = false;
    private paused = false;
    private closed = false;

    constructor(private readonly opts: HttpClientOptions) {}

    get queuePaused(): boolean {
        return this.paused;
    }

    get pendingCount(): number {
        return this.queue.length + this.held.length + this.inFlight.size;
    }

    send(request: HttpRequest): void {
        if (this.closed) {
            this.fail(request);
            return;
        }
        if (request.lane === 'queued') {
            this.queue.push(request);
            this.pump();
            return;
        }
        void this.execute(request);
    }

    /**
     * Sends a request again with freshly built parameters. While the lane is
     * paused the request waits: queued requests go back to the head of the
     * lane, direct ones are released on resume.
     */
    resend(request: HttpRequest): void {
        if (this.closed) {
            this.fail(request);
            return;
        }
        if (request.lane === 'queued') {
            this.queue.unshift(request);
            this.pump();
            return;
        }
        if (this.paused) {
            this.held.push(request);
            return;
        }
        void this.execute(request);
    }

    setQueuePaused(paused: boolean): void {
        if (this.paused === paused) {
            return;
        }
        this.paused = paused;
        logger.debug(`[STEAM HTTP] Queue ${paused ? 'paused' : 'resumed'}`);
        if (paused) {
            return;
        }

        const released = this.held.splice(0, this.held.length);
        for (const request of released) {
            void this.execute(request);
        }
        this.pump();
    }

    destroy(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        logger.debug(`[STEAM HTTP] Closing with ${this.pendingCount} pending requests`);

        const pending = [
            ...this.queue.splice(0, this.queue.length),
            ...this.held.splice(0, this.held.length),
            ...this.inFlight.keys(),
        ];
        for (const controller of this.inFlight.values()) {
            controller.abort();
        }
        this.inFlight.clear();

        for (const request of pending) {
            this.fail(request);
        }
    }

    private pump(): void {
        if (this.paused || this.queueBusy || this.closed) {
            return;
        }
        const next = this.queue.shift();
        if (!next) {
            return;
        }
        this.queueBusy = true;
        void this.execute(next).finally(() => {
            this.queueBusy = false;
            this.pump();
        });
    }

    private async execute(request: HttpRequest): Promise<void> {
        const spec = request.build();
        const url = buildUrl(spec);
        const params = encodeParams(spec.params);
        const controller = new AbortController();

        request.attempts++;
        this.inFlight.set(request, controller);
        logger.debug(`[STEAM HTTP] ${spec.method} ${url} (attempt ${request.attempts})`);

        const headers: Record<string, string> = {
            'User-Agent': this.opts.userAgent,
            ...(spec.keepAlive ? { Connection: 'Keep-Alive' } : {}),
            ...spec.headers,
        };

        let outcome: HttpOutcome;
        try {
            const response = await axios.request<string>({
                url,
                method: spec.method,
                headers: spec.method === 'POST'
                    ? { ...headers, 'Content-Type': 'application/x-www-form-urlencoded' }
                    : headers,
                params: spec.method === 'GET' ? params : undefined,
                data: spec.method === 'POST' ? params.toString() : undefined,
                timeout: this.opts.timeoutMs,
                signal: controller.signal,
                responseType: 'text',
                transformResponse: (data: unknown) => data,
                validateStatus: () => true,
            });

            const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
            if (response.status >= 500) {
                outcome = { status: 'error', error: new SteamApiError('transport', `HTTP ${response.status}`) };
            } else {
                outcome = { status: 'ok', httpStatus: response.status, body };
            }
        } catch (error) {
            outcome = { status: 'error', error: new SteamApiError('transport', describeError(error), { cause: error }) };
        }

        if (this.inFlight.get(request) !== controller) {
            // Abandoned by destroy(), which already settled it.
            return;
        }
        this.inFlight.delete(request);

        if (outcome.status === 'error') {
            logger.debug(`[STEAM HTTP] ${spec.method} ${spec.path} failed: ${outcome.error.message}`);
        }
        try {
            request.onComplete(request, outcome);
        } catch (error) {
            logger.warn(`[STEAM HTTP] Completion handler for ${spec.path} threw:`, error);
        }
    }

    private fail(request: HttpRequest): void {
        request.onComplete(request, {
            status: 'error',
            error: new SteamApiError('transport', 'HTTP client closed'),
        });
    }
}
