import { ContextReader, HeaderMethods, PlatformHeader } from '@wirecall/http-api';

/**
 * ContextMgr - which headers to forward on every call, and where to read them.
 *
 * Combines a ContextReader (how to read header values) with a header set
 * (which headers to propagate). The dispatch proxy reads the values at call
 * time and adds them to the global header layer.
 *
 * ```typescript
 * const contextMgr = new ContextMgr(
 *     new StaticContextReader(new Map([['authorization', `Bearer ${token}`]])),
 *     [new PlatformHeader('authorization', true, true), new PlatformHeader('x-request-id')],
 * );
 * const client = createClient(CustomerApiPrototype, new ClientConfig('https://svc.example', contextMgr));
 * ```
 */
export class ContextMgr {
    private readonly headerMethods = new HeaderMethods();

    constructor(
        public readonly contextReader: ContextReader,
        public readonly headerSet: PlatformHeader[],
    ) {}

    /**
     * Every transferable header that currently has a value.
     */
    readAll(): Record<string, string> {
        const headers: Record<string, string> = {};
        for (const header of this.headerMethods.findTransferHeaders(this.headerSet)) {
            const value = this.readValue(header);
            if (value !== undefined) {
                headers[header.headerName] = value;
            }
        }
        return headers;
    }

    private readValue(header: PlatformHeader): string | undefined {
        const value = this.contextReader.read(header);
        return value !== undefined && value !== '' ? value : undefined;
    }
}
