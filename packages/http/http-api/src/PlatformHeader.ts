/**
 * PlatformHeader - an HTTP header the client knows how to treat.
 *
 * Per-header flags:
 * - isWantTransferred: copied from the caller's context (ContextMgr) into outgoing requests
 * - isSecured: masked in [API-CLIENT-*] log lines (tokens, API keys, cookies)
 *
 * Data-only class.
 */
export class PlatformHeader {
    /**
     * The HTTP header name, e.g. 'x-request-id'. Compared case-insensitively.
     */
    readonly headerName: string;

    readonly isWantTransferred: boolean;

    readonly isSecured: boolean;

    constructor(headerName: string, isWantTransferred: boolean = true, isSecured: boolean = false) {
        this.headerName = headerName;
        this.isWantTransferred = isWantTransferred;
        this.isSecured = isSecured;
    }
}

/**
 * Headers that are masked in logs unless the client configuration says otherwise.
 */
export const DEFAULT_SECURE_HEADERS: readonly PlatformHeader[] = [
    new PlatformHeader('authorization', false, true),
    new PlatformHeader('proxy-authorization', false, true),
    new PlatformHeader('cookie', false, true),
    new PlatformHeader('x-api-key', false, true),
];
