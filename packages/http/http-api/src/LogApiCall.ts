import { toError } from '@wirecall/core-util';
import { HttpVerb } from './HttpVerb';
import { CancelledError, ClientRequestError, RequestValidationError } from './errors';

/**
 * What a log line says about the call being made.
 */
export class ApiCallInfo {
    constructor(
        readonly contractName: string,
        readonly methodName: string,
        readonly verb: HttpVerb,
        readonly url: string,
        readonly body?: string,
    ) {}
}

/**
 * LogApiCall - logging around one HTTP exchange.
 *
 * Logging format patterns:
 * - [API-{type}-req] Contract.method VERB url request={...} headers={...}
 * - [API-{type}-resp-SUCCESS] Contract.method response={...}
 * - [API-{type}-resp-OTHER] Contract.method errorType={...}  (4xx, validation, cancellation)
 * - [API-{type}-resp-FAIL] Contract.method errorType={...} error={...}  (everything else)
 */
export class LogApiCall {
    /**
     * Execute an API call with logging around it.
     *
     * @param type - 'CLIENT' for outgoing calls
     * @param headers - request headers, already masked
     */
    public async execute<T>(
        type: string,
        info: ApiCallInfo,
        headers: Readonly<Record<string, string>>,
        method: () => Promise<T>,
    ): Promise<T> {
        const label = `${info.contractName}.${info.methodName}`;
        const request = info.body === undefined ? '' : ` request=${info.body}`;
        console.log(`[API-${type}-req] ${label} ${info.verb} ${info.url}${request} headers=${JSON.stringify(headers)}`);

        let response: T;
        try {
            response = await method();
        } catch (err: unknown) {
            const error = toError(err);
            const errorType = error.constructor.name;

            if (LogApiCall.isUserError(error)) {
                console.log(`[API-${type}-resp-OTHER] ${label} errorType=${errorType}`);
            } else {
                console.error(`[API-${type}-resp-FAIL] ${label} errorType=${errorType} error=${error.message}`);
            }
            throw error;
        }

        console.log(`[API-${type}-resp-SUCCESS] ${label} response=${LogApiCall.formatResponse(response)}`);
        return response;
    }

    /**
     * JSON form of a result for the SUCCESS line. A result JSON cannot write
     * is logged by placeholder; the call still succeeds.
     */
    static formatResponse(response: unknown): string {
        try {
            return String(JSON.stringify(response));
        } catch (err: unknown) {
            const error = toError(err);
            return `<unloggable: ${error.message}>`;
        }
    }

    /**
     * Errors caused by the caller or the request rather than by a failing
     * service or network. Logged as OTHER, not FAIL.
     */
    static isUserError(error: unknown): boolean {
        return (
            error instanceof ClientRequestError ||
            error instanceof RequestValidationError ||
            error instanceof CancelledError
        );
    }
}
