import { PlatformHeader } from '@wirecall/http-api';
import { ClientConfig } from '../ClientConfig';
import { EnvConfigurationSource, StaticConfigurationSource } from '../ConfigurationSource';
import { ContextMgr } from '../ContextMgr';
import { StaticContextReader } from '../ContextReader';

describe('EnvConfigurationSource', () => {
    it('should read variables, base URL and timeout under the prefix', () => {
        const source = new EnvConfigurationSource('WIRECALL_', {
            WIRECALL_VAR_region: 'eu-1',
            WIRECALL_VAR_tenant: 'acme',
            WIRECALL_BASE_URL: 'https://svc.example',
            WIRECALL_TIMEOUT_MS: '2500',
            OTHER_VAR_region: 'us',
            WIRECALL_VAR_: 'ignored',
        });

        expect(source.variables()).toEqual({ region: 'eu-1', tenant: 'acme' });
        expect(source.settings()).toEqual({ baseUrl: 'https://svc.example', timeoutMs: 2500 });
    });

    it('should refuse a timeout that is not a positive number', () => {
        const source = new EnvConfigurationSource('APP_', { APP_TIMEOUT_MS: 'soon' });

        expect(() => source.settings()).toThrow("APP_TIMEOUT_MS must be a positive number of milliseconds, got 'soon'");
    });

    it('should give empty settings for an empty environment', () => {
        const source = new EnvConfigurationSource('APP_', {});

        expect(source.variables()).toEqual({});
        expect(source.settings()).toEqual({});
    });
});

describe('ClientConfig', () => {
    it('should build from a configuration source', () => {
        const config = ClientConfig.fromSource(
            new StaticConfigurationSource({ region: 'eu-1' }, { baseUrl: 'https://svc.example', timeoutMs: 900, headers: { 'x-client': 'billing' } }),
        );

        expect(config.baseUrl).toBe('https://svc.example');
        expect(config.variables).toEqual({ region: 'eu-1' });
        expect(config.headers).toEqual({ 'x-client': 'billing' });
        expect(config.timeoutMs).toBe(900);
    });

    it('should expose baseUrl as a variable and add context headers to the global layer', () => {
        const config = new ClientConfig(
            'https://svc.example',
            new ContextMgr(new StaticContextReader(new Map([['X-Request-Id', 'req-7']])), [
                new PlatformHeader('x-request-id'),
                new PlatformHeader('x-missing'),
            ]),
        );
        config.variables = { region: 'eu-1' };
        config.headers = { accept: 'application/json' };

        const global = config.globalSettings();

        expect(global.variables).toEqual({ region: 'eu-1', baseUrl: 'https://svc.example' });
        expect(global.headers).toEqual({ accept: 'application/json', 'x-request-id': 'req-7' });
    });

    it('should mask the default secure headers and the secured context headers', () => {
        const config = new ClientConfig(
            undefined,
            new ContextMgr(new StaticContextReader(new Map()), [new PlatformHeader('x-session', true, true)]),
        );

        expect(config.allSecureHeaders().map((h) => h.headerName)).toEqual([
            'authorization',
            'proxy-authorization',
            'cookie',
            'x-api-key',
            'x-session',
        ]);
    });
});
