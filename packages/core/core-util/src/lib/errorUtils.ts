/**
 * Error normalisation for catch blocks.
 *
 * Every catch block in wirecall follows the same shape so that nothing
 * downstream ever has to guess what was thrown:
 * ```typescript
 * try {
 *     await transport.send(request, signal);
 * } catch (err: unknown) {
 *     const error = toError(err);
 *     throw new TransportError(`send failed: ${error.message}`, error);
 * }
 * ```
 */

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function fromErrorLike(err: Record<string, unknown>): Error {
    const error = new Error(String(err['message']));
    const stack = err['stack'];
    if (typeof stack === 'string') {
        error.stack = stack;
    }
    const name = err['name'];
    if (typeof name === 'string') {
        error.name = name;
    }
    return error;
}

function describeObject(err: Record<string, unknown>): string {
    try {
        return `Non-Error object thrown: ${JSON.stringify(err)}`;
    } catch (stringifyErr: unknown) {
        // toError() is not called here: a value that cannot be stringified would
        // send us straight back into this branch.
        void stringifyErr;
        return 'Non-Error object thrown (unable to stringify)';
    }
}

/**
 * Converts whatever was thrown into an Error.
 *
 * - Error instances (and subclasses) come back unchanged.
 * - Objects carrying a `message` become an Error with that message, keeping a
 *   string `stack` and `name` when present (axios and DOM errors look like this).
 * - Other objects are stringified into the message.
 * - Primitives are converted with String(); null and undefined get a fixed message.
 */
export function toError(err: unknown): Error {
    if (err instanceof Error) {
        return err;
    }

    if (isRecord(err)) {
        return 'message' in err ? fromErrorLike(err) : new Error(describeObject(err));
    }

    if (err === null || err === undefined) {
        return new Error('Null or undefined thrown');
    }
    return new Error(String(err));
}
