import { Serializer } from './Serializer';

/**
 * CallOptions - per-call overrides, the most specific configuration scope.
 *
 * Pass one as the trailing argument of any client call. Contracts may declare
 * it as a last parameter (`options?: CallOptions`) so the type checker lets
 * callers pass it; it is never bound into the request itself.
 *
 * ```typescript
 * const controller = new AbortController();
 * await client.getCustomer(7, new CallOptions({
 *     signal: controller.signal,
 *     headers: { 'x-request-id': 'r-1' },
 *     timeoutMs: 2000,
 * }));
 * ```
 */
export class CallOptions {
    /** Cancels the call; forwarded to the transport once the request is sent. */
    signal?: AbortSignal;
    /** Replaces the contract's base-address template for this call. */
    baseUrl?: string;
    variables?: Record<string, string>;
    headers?: Record<string, string>;
    cookies?: Record<string, string>;
    timeoutMs?: number;
    serializer?: Serializer;

    constructor(init: Partial<CallOptions> = {}) {
        Object.assign(this, init);
    }
}
