import { toError } from '@wirecall/core-util';
import { CancelledError, TransportError } from '@wirecall/http-api';
import { RequestDescriptor } from '../RequestSynthesizer';
import { ResponseOutcome } from './ResponseOutcome';
import { Transport } from './Transport';

export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

/**
 * FetchTransport - the default transport, over the global fetch of Node 20.
 *
 * - the timeout aborts the fetch and surfaces as TransportError(timeout=true)
 * - the caller's signal is forwarded; aborting ends the call in CancelledError
 * - the cookie map is written as a single `cookie` header
 */
export class FetchTransport implements Transport {
    /**
     * @param fetchImpl - defaults to the global fetch, looked up on every send
     */
    constructor(private readonly fetchImpl?: FetchFunction) {}

    async send(request: RequestDescriptor, signal?: AbortSignal): Promise<ResponseOutcome> {
        const target = `${request.verb} ${request.url}`;
        if (signal?.aborted) {
            throw new CancelledError(`${target} was cancelled before it was sent`);
        }

        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, request.timeoutMs);
        const onCallerAbort = (): void => controller.abort();
        signal?.addEventListener('abort', onCallerAbort, { once: true });

        try {
            const doFetch: FetchFunction = this.fetchImpl ?? ((url, init) => fetch(url, init));
            const response = await doFetch(request.url, {
                method: request.verb,
                headers: FetchTransport.buildHeaders(request),
                body: request.body,
                signal: controller.signal,
            });
            const body = await response.text();
            const headers: Record<string, string> = {};
            response.headers.forEach((value, name) => {
                headers[name] = value;
            });
            return ResponseOutcome.fromResponse(response.status, body, headers);
        } catch (err: unknown) {
            const error = toError(err);
            if (timedOut) {
                throw new TransportError(`${target} timed out after ${request.timeoutMs}ms`, error, true);
            }
            if (signal?.aborted) {
                throw new CancelledError(`${target} was cancelled`, error);
            }
            throw new TransportError(`${target} failed: ${error.message}`, error);
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onCallerAbort);
        }
    }

    static buildHeaders(request: RequestDescriptor): Record<string, string> {
        const headers: Record<string, string> = { ...request.headers };
        const cookies = Object.entries(request.cookies)
            .map(([name, value]) => `${name}=${encodeURIComponent(value)}`)
            .join('; ');
        if (cookies === '') {
            return headers;
        }

        const existing = Object.keys(headers).find((name) => name.toLowerCase() === 'cookie');
        if (existing) {
            headers[existing] = `${headers[existing]}; ${cookies}`;
        } else {
            headers['cookie'] = cookies;
        }
        return headers;
    }
}
