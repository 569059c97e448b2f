import { toError } from '@wirecall/core-util';
import { DeserializationError, ResultShape, Serializer, TransportError } from '@wirecall/http-api';
import { ClientErrorTranslator } from './ClientErrorTranslator';
import { ResponseOutcome } from './transport/ResponseOutcome';

/**
 * Maps a ResponseOutcome to the declared result, or throws.
 *
 * | outcome          | void shape     | entity / sequence shape                              |
 * |------------------|----------------|------------------------------------------------------|
 * | Success          | undefined      | deserialized body; empty body is DeserializationError |
 * | ClientError      | ClientRequestError{status, body}                      |
 * | ServerError      | ServiceFailureError{status, body}                     |
 * | TransportFailure | TransportError{cause}                                 |
 *
 * A body that does not fit the shape is a DeserializationError, never a default value.
 */
export function mapResponse(outcome: ResponseOutcome, shape: ResultShape, serializer: Serializer): unknown {
    switch (outcome.tag) {
        case 'TransportFailure':
            throw new TransportError(
                `No response received: ${outcome.cause?.message ?? 'unknown transport failure'}`,
                outcome.cause,
            );
        case 'ClientError':
        case 'ServerError':
            throw ClientErrorTranslator.translateError(outcome);
        case 'Success':
            return deserializeBody(outcome.body, shape, serializer);
    }
}

function deserializeBody(body: string, shape: ResultShape, serializer: Serializer): unknown {
    if (shape.kind === 'void') {
        return undefined;
    }
    if (body.trim() === '') {
        throw new DeserializationError(new Error(`empty body where ${shape.describe()} was expected`), body);
    }

    let value: unknown;
    try {
        value = serializer.deserialize(body, shape);
    } catch (err: unknown) {
        const error = toError(err);
        throw new DeserializationError(error, body);
    }

    if (shape.kind === 'sequence' && !Array.isArray(value)) {
        throw new DeserializationError(new Error(`expected a sequence (${shape.describe()})`), body);
    }
    return value;
}
