import { describe, expect, it } from 'vitest';
import { loadConfiguration } from './configuration';

describe('loadConfiguration', () => {
    it('uses the public API defaults', () => {
        const config = loadConfiguration({});

        expect(config).toMatchObject({
            apiHost: 'api.steampowered.com',
            apiPort: 443,
            clientId: 'DE45CD61',
            pollTimeoutSeconds: 30,
            requestTimeoutMs: 60_000,
            format: 'json',
            logFile: null,
            isDebug: false,
        });
        expect(config.userAgent).toBe('Steam App / steam-web-chat / 0.1.0 / 0');
    });

    it('reads overrides from the environment', () => {
        const config = loadConfiguration({
            STEAM_API_HOST: 'api.example.test',
            STEAM_API_PORT: '8443',
            STEAM_POLL_TIMEOUT: '10',
            STEAM_LOG_FILE: '/tmp/steam-test.log',
            DEBUG: 'yes',
        });

        expect(config.apiHost).toBe('api.example.test');
        expect(config.apiPort).toBe(8443);
        expect(config.pollTimeoutSeconds).toBe(10);
        expect(config.logFile).toBe('/tmp/steam-test.log');
        expect(config.isDebug).toBe(true);
    });

    it('treats empty variables as unset', () => {
        expect(loadConfiguration({ STEAM_API_HOST: '' }).apiHost).toBe('api.steampowered.com');
    });

    it('requires the request timeout to outlive the long poll', () => {
        expect(() => loadConfiguration({ STEAM_POLL_TIMEOUT: '120' })).toThrow(
            'Invalid configuration: STEAM_REQUEST_TIMEOUT_MS: must exceed STEAM_POLL_TIMEOUT (120s), got 60000ms',
        );
        expect(() => loadConfiguration({ STEAM_POLL_TIMEOUT: '60' })).toThrow(/STEAM_REQUEST_TIMEOUT_MS/);

        const config = loadConfiguration({ STEAM_POLL_TIMEOUT: '120', STEAM_REQUEST_TIMEOUT_MS: '150000' });
        expect(config.requestTimeoutMs).toBeGreaterThan(config.pollTimeoutSeconds * 1000);
    });

    it('names the offending variable', () => {
        expect(() => loadConfiguration({ STEAM_API_PORT: 'not-a-port' })).toThrow(/STEAM_API_PORT/);
    });
});
