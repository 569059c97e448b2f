import { RequestDescriptor } from '../../RequestSynthesizer';
import { ResponseOutcome } from '../../transport/ResponseOutcome';
import { Transport } from '../../transport/Transport';

export type Responder = (request: RequestDescriptor, signal?: AbortSignal) => ResponseOutcome | Promise<ResponseOutcome>;

/**
 * In-process transport: records every request and answers with the responder.
 */
export class StubTransport implements Transport {
    readonly requests: RequestDescriptor[] = [];
    closed = false;

    constructor(private readonly responder: Responder = () => ResponseOutcome.fromResponse(200, '{}')) {}

    async send(request: RequestDescriptor, signal?: AbortSignal): Promise<ResponseOutcome> {
        this.requests.push(request);
        return this.responder(request, signal);
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

export function json(status: number, value: unknown): ResponseOutcome {
    return ResponseOutcome.fromResponse(status, JSON.stringify(value), { 'content-type': 'application/json' });
}
