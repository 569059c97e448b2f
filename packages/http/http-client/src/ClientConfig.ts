import { DEFAULT_SECURE_HEADERS, PlatformHeader, Serializer } from '@wirecall/http-api';
import { ConfigurationSource } from './ConfigurationSource';
import { ContextMgr } from './ContextMgr';
import { ScopeSettings } from './descriptors';
import { JsonSerializer } from './serializers/JsonSerializer';
import { FetchTransport } from './transport/FetchTransport';
import { TransportFactory } from './transport/Transport';
import { TransportPool } from './transport/TransportPool';

/**
 * ClientConfig - the global configuration scope of a client.
 *
 * ```typescript
 * const config = new ClientConfig('http://localhost:3000');
 * config.headers = { 'x-client': 'billing' };
 * const client = createClient(CustomerApiPrototype, config);
 * ```
 */
export class ClientConfig {
    /**
     * Fills the '{baseUrl}' placeholder of contracts that declare no base address.
     * Also available to any other template as the `baseUrl` variable.
     */
    baseUrl?: string;

    /**
     * Optional context manager for header propagation; read on every call.
     */
    contextMgr?: ContextMgr;

    variables: Record<string, string> = {};
    headers: Record<string, string> = {};
    cookies: Record<string, string> = {};
    timeoutMs?: number;
    serializer: Serializer = new JsonSerializer();

    /** Creates the transport of each pool key. */
    transportFactory: TransportFactory = () => new FetchTransport();

    /** Defaults to the pool shared by every client of the process. */
    pool?: TransportPool;

    loggingEnabled = true;

    /** Headers masked in log lines, on top of the secured headers of the ContextMgr. */
    secureHeaders: PlatformHeader[] = [...DEFAULT_SECURE_HEADERS];

    /** Validate class-instance bodies with class-validator before sending. */
    validateRequests = false;

    constructor(baseUrl?: string, contextMgr?: ContextMgr) {
        this.baseUrl = baseUrl;
        this.contextMgr = contextMgr;
    }

    static fromSource(source: ConfigurationSource, contextMgr?: ContextMgr): ClientConfig {
        const settings = source.settings();
        const config = new ClientConfig(settings.baseUrl, contextMgr);
        config.variables = { ...source.variables() };
        config.headers = { ...settings.headers };
        config.timeoutMs = settings.timeoutMs;
        return config;
    }

    /**
     * The global layer for one call. Context headers are read now, so the
     * configuration resolver itself never touches ambient state.
     */
    globalSettings(): ScopeSettings {
        const variables = this.baseUrl === undefined ? { ...this.variables } : { ...this.variables, baseUrl: this.baseUrl };
        return {
            variables,
            headers: { ...this.headers, ...this.contextMgr?.readAll() },
            cookies: { ...this.cookies },
            timeoutMs: this.timeoutMs,
            serializer: this.serializer,
        };
    }

    /**
     * Every header that must be masked in logs.
     */
    allSecureHeaders(): PlatformHeader[] {
        return [...this.secureHeaders, ...(this.contextMgr?.headerSet ?? [])];
    }
}
