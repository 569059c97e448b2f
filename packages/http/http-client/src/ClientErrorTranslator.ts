import { ClientRequestError, HttpStatusError, ProtocolError, ServiceFailureError } from '@wirecall/http-api';
import { ResponseOutcome } from './transport/ResponseOutcome';

/**
 * ClientErrorTranslator - turns a non-success ResponseOutcome into an HttpStatusError.
 *
 * - 4xx → ClientRequestError
 * - 5xx and anything else → ServiceFailureError
 *
 * When the body is a ProtocolError JSON document (`{"message": ...}`), its
 * message is appended to the error message and the parsed document is kept
 * on the error. The raw body is always kept.
 */
export class ClientErrorTranslator {
    static translateError(outcome: ResponseOutcome): HttpStatusError {
        const protocolError = ClientErrorTranslator.readProtocolError(outcome.body);
        const message = protocolError?.message
            ? `HTTP ${outcome.status}: ${protocolError.message}`
            : `HTTP ${outcome.status}`;

        if (outcome.tag === 'ClientError') {
            return new ClientRequestError(message, outcome.status, outcome.body, protocolError);
        }
        return new ServiceFailureError(message, outcome.status, outcome.body, protocolError);
    }

    /**
     * The ProtocolError in `body`, or undefined when the body is not one.
     */
    static readProtocolError(body: string): ProtocolError | undefined {
        if (!body.trimStart().startsWith('{')) {
            return undefined;
        }
        let parsed: unknown;
        try {
            parsed = JSON.parse(body);
        } catch (err: unknown) {
            // not JSON after all; the error keeps the raw body
            void err;
            return undefined;
        }
        if (typeof parsed !== 'object' || parsed === null) {
            return undefined;
        }

        const protocolError = new ProtocolError();
        const fields = new Map(Object.entries(parsed));
        protocolError.message = stringField(fields, 'message');
        protocolError.name = stringField(fields, 'name');
        protocolError.subType = stringField(fields, 'subType');
        protocolError.errorCode = stringField(fields, 'errorCode');
        return protocolError.message === undefined ? undefined : protocolError;
    }
}

function stringField(fields: Map<string, unknown>, name: string): string | undefined {
    const value = fields.get(name);
    return typeof value === 'string' ? value : undefined;
}
