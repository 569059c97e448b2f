/**
 * Error taxonomy for wirecall clients.
 *
 * Every failure a client call can produce is one DispatchError subclass, so a
 * caller can tell apart:
 * - a malformed contract (ContractDefinitionError, raised at registration)
 * - invalid call arguments (UnresolvedPlaceholderError, UnsupportedParameterBindingError,
 *   RequestValidationError, SerializationError)
 * - a service that rejected the request (ClientRequestError, ServiceFailureError,
 *   DeserializationError)
 * - a network that failed (TransportError, CancelledError)
 */

/**
 * The pipeline stage an error surfaced in.
 */
export type PipelineStage = 'describe' | 'resolve-config' | 'build-request' | 'send' | 'map-response';

/**
 * ProtocolError - the JSON error body a server may send with a non-2xx status.
 * When present its message becomes the message of the client-side error.
 */
export class ProtocolError {
    public message?: string;
    public name?: string;
    public subType?: string;
    public errorCode?: string;
}

/**
 * DispatchError - base class of every wirecall error.
 * `stage` is filled in by the dispatch proxy when the error leaves the pipeline.
 */
export class DispatchError extends Error {
    public stage?: PipelineStage;

    constructor(message: string, stage?: PipelineStage, cause?: Error) {
        super(message, cause ? { cause } : undefined);
        this.name = 'DispatchError';
        this.stage = stage;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * The contract's metadata is malformed. Raised when the contract is registered,
 * before any request is sent.
 */
export class ContractDefinitionError extends DispatchError {
    constructor(
        public readonly contract: string,
        public readonly method: string | undefined,
        public readonly reason: string,
    ) {
        super(`${method ? `${contract}.${method}` : contract}: ${reason}`, 'describe');
        this.name = 'ContractDefinitionError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * A template is not well formed (unbalanced braces or an invalid placeholder name).
 */
export class TemplateSyntaxError extends DispatchError {
    constructor(
        public readonly template: string,
        public readonly position: number,
        public readonly reason: string,
    ) {
        super(`Invalid template '${template}' at position ${position}: ${reason}`);
        this.name = 'TemplateSyntaxError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * A `{placeholder}` had no value among the call arguments and configuration variables.
 */
export class UnresolvedPlaceholderError extends DispatchError {
    constructor(
        public readonly placeholder: string,
        public readonly template: string,
    ) {
        super(`No value for placeholder {${placeholder}} in '${template}'`);
        this.name = 'UnresolvedPlaceholderError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * An argument cannot be bound the way its parameter is declared.
 */
export class UnsupportedParameterBindingError extends DispatchError {
    constructor(
        public readonly method: string,
        public readonly parameter: string,
        public readonly reason: string,
    ) {
        super(`Cannot bind parameter '${parameter}' of ${method}: ${reason}`);
        this.name = 'UnsupportedParameterBindingError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * The body argument failed class-validator constraints.
 */
export class RequestValidationError extends DispatchError {
    constructor(
        public readonly method: string,
        public readonly violations: string[],
    ) {
        super(`Request body of ${method} is invalid: ${violations.join('; ')}`);
        this.name = 'RequestValidationError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class SerializationError extends DispatchError {
    constructor(cause: Error) {
        super(`Could not serialize request body: ${cause.message}`, undefined, cause);
        this.name = 'SerializationError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * The response body does not fit the declared result shape.
 * Never replaced by a default or empty value.
 */
export class DeserializationError extends DispatchError {
    constructor(
        cause: Error,
        public readonly rawBody: string,
    ) {
        super(`Could not deserialize response body: ${cause.message}`, undefined, cause);
        this.name = 'DeserializationError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpStatusError - the service answered with a non-success status.
 * Carries the status and the raw body so callers can branch on either.
 */
export class HttpStatusError extends DispatchError {
    constructor(
        message: string,
        public readonly status: number,
        public readonly body: string,
        public readonly protocolError?: ProtocolError,
    ) {
        super(message);
        this.name = 'HttpStatusError';
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /**
     * The body parsed as JSON, or undefined when it is not JSON.
     */
    bodyJson(): unknown {
        try {
            return JSON.parse(this.body);
        } catch (err: unknown) {
            // a non-JSON body is still available as text through `body`
            void err;
            return undefined;
        }
    }
}

/**
 * 4xx - the service rejected the request.
 */
export class ClientRequestError extends HttpStatusError {
    constructor(message: string, status: number, body: string, protocolError?: ProtocolError) {
        super(message, status, body, protocolError);
        this.name = 'ClientRequestError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * 5xx (and any other non-2xx status outside 4xx) - the service failed.
 */
export class ServiceFailureError extends HttpStatusError {
    constructor(message: string, status: number, body: string, protocolError?: ProtocolError) {
        super(message, status, body, protocolError);
        this.name = 'ServiceFailureError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * No response was received: connection failure, DNS, reset, or timeout.
 */
export class TransportError extends DispatchError {
    constructor(
        message: string,
        cause?: Error,
        public readonly timeout: boolean = false,
    ) {
        super(message, undefined, cause);
        this.name = 'TransportError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * The caller aborted the call through its AbortSignal.
 */
export class CancelledError extends DispatchError {
    constructor(message: string, cause?: Error) {
        super(message, undefined, cause);
        this.name = 'CancelledError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
