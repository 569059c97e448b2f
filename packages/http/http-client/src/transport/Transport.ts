import { RequestDescriptor } from '../RequestSynthesizer';
import { ResponseOutcome } from './ResponseOutcome';

/**
 * Transport - sends one request and reports what came back.
 *
 * Implementations enforce `request.timeoutMs` (TransportError with timeout=true)
 * and honour the signal (CancelledError). Any retry policy belongs here, not in
 * the dispatch engine.
 */
export interface Transport {
    send(request: RequestDescriptor, signal?: AbortSignal): Promise<ResponseOutcome>;

    /** Releases pooled connections; called by TransportPool.close(). */
    close?(): Promise<void>;
}

/**
 * Identity of a pooled transport within one factory: the contract and its
 * expanded base address.
 */
export class TransportKey {
    constructor(
        readonly contractName: string,
        readonly baseUrl: string,
    ) {}

    toString(): string {
        return `${this.contractName} ${this.baseUrl}`;
    }
}

export type TransportFactory = (key: TransportKey) => Transport | Promise<Transport>;
