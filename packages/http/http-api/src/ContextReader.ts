import { PlatformHeader } from './PlatformHeader';

/**
 * ContextReader - reads the current value of a header from the caller's context.
 *
 * Implementations (StaticContextReader, CompositeContextReader) live in
 * @wirecall/http-client; an application can plug in its own, e.g. one backed by
 * AsyncLocalStorage to forward the x-request-id of the request being served.
 */
export interface ContextReader {
    /**
     * @returns the header value, or undefined if not present
     */
    read(header: PlatformHeader): string | undefined;
}
