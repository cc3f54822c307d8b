import { logger } from '@/ui/logger';
import type { HttpClient, HttpRequest } from './http/httpClient';

export type RelogonState = 'normal' | 'relogon-in-flight' | 'resuming';

/**
 * Recovers from the server dropping the session under in-flight requests.
 *
 * normal -> relogon-in-flight: a request saw "Not Logged On". The queued lane
 *   is paused, one relogon goes out and the failed request is resent; the
 *   resend waits behind the pause.
 * relogon-in-flight -> resuming -> normal: the relogon answered, whatever it
 *   said. The lane is resumed so it can never stay stuck.
 */
export class RelogonRecovery {
    private current: RelogonState = 'normal';

    constructor(
        private readonly http: HttpClient,
        private readonly sendRelogon: () => void,
    ) {}

    get state(): RelogonState {
        return this.current;
    }

    trigger(failed: HttpRequest): void {
        this.http.setQueuePaused(true);

        if (this.current === 'normal') {
            logger.debug('[RELOGON] Session expired, logging on again');
            this.current = 'relogon-in-flight';
            this.sendRelogon();
        } else {
            logger.debug('[RELOGON] Relogon already in flight');
        }

        this.http.resend(failed);
    }

    complete(): void {
        if (this.current !== 'relogon-in-flight') {
            return;
        }
        this.current = 'resuming';
        this.http.setQueuePaused(false);
        this.current = 'normal';
    }
}
