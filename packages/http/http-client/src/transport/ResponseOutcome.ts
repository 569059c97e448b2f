export type OutcomeTag = 'Success' | 'ClientError' | 'ServerError' | 'TransportFailure';

/**
 * 2xx Success, 4xx ClientError; 5xx and every other status ServerError.
 */
export function classifyStatus(status: number): OutcomeTag {
    if (status >= 200 && status < 300) {
        return 'Success';
    }
    if (status >= 400 && status < 500) {
        return 'ClientError';
    }
    return 'ServerError';
}

/**
 * ResponseOutcome - what came back from one send: status, raw body and a tag.
 * A transport that prefers not to throw reports a failed exchange as a
 * TransportFailure outcome carrying the cause.
 */
export class ResponseOutcome {
    private constructor(
        readonly tag: OutcomeTag,
        readonly status: number,
        readonly body: string,
        readonly headers: Readonly<Record<string, string>>,
        readonly cause?: Error,
    ) {
        Object.freeze(this);
    }

    static fromResponse(status: number, body: string, headers: Record<string, string> = {}): ResponseOutcome {
        return new ResponseOutcome(classifyStatus(status), status, body, Object.freeze({ ...headers }));
    }

    static transportFailure(cause: Error): ResponseOutcome {
        return new ResponseOutcome('TransportFailure', 0, '', Object.freeze({}), cause);
    }
}
