import { validateSync, ValidationError } from 'class-validator';
import { toError } from '@wirecall/core-util';
import {
    ApiCallInfo,
    CallOptions,
    CancelledError,
    DispatchError,
    HeaderMethods,
    LogApiCall,
    RequestValidationError,
    TransportError,
    UnsupportedParameterBindingError,
} from '@wirecall/http-api';
import { ClientConfig } from './ClientConfig';
import { resolveConfiguration } from './ConfigurationResolver';
import { ContractDescriptor, MethodDescriptor, ScopeSettings } from './descriptors';
import { Invocation } from './Invocation';
import { bindArguments } from './ParameterBinder';
import { RequestDescriptor, synthesizeRequest } from './RequestSynthesizer';
import { mapResponse } from './ResponseMapper';
import { ResponseOutcome } from './transport/ResponseOutcome';
import { Transport, TransportKey } from './transport/Transport';
import { TransportPool } from './transport/TransportPool';

/**
 * ProxyClient - runs one contract call through the dispatch pipeline.
 *
 * resolve configuration → bind arguments → synthesize request → acquire
 * transport → send → map response, tracked by an Invocation. Only the
 * transport stage awaits; nothing is cached between calls and nothing is retried.
 *
 * Logging via LogApiCall.execute() around the exchange:
 * - [API-CLIENT-req] with the request headers, secured ones masked
 * - [API-CLIENT-resp-SUCCESS] / [API-CLIENT-resp-OTHER] / [API-CLIENT-resp-FAIL]
 */
export class ProxyClient {
    constructor(
        private readonly contract: ContractDescriptor,
        private readonly config: ClientConfig,
        private readonly pool: TransportPool,
        private readonly logApiCall: LogApiCall,
        private readonly headerMethods: HeaderMethods,
    ) {}

    hasMethod(methodName: string): boolean {
        return this.contract.methods.has(methodName);
    }

    getMethod(methodName: string): MethodDescriptor {
        const method = this.contract.method(methodName);
        if (!method) {
            throw new Error(`No method ${methodName} on ${this.contract.name}`);
        }
        return method;
    }

    async invoke(method: MethodDescriptor, args: readonly unknown[]): Promise<unknown> {
        const invocation = new Invocation(this.contract.name, method.name);
        try {
            return await this.run(invocation, method, args);
        } catch (err: unknown) {
            const error = toError(err);
            throw invocation.fail(error);
        }
    }

    private async run(invocation: Invocation, method: MethodDescriptor, args: readonly unknown[]): Promise<unknown> {
        const label = `${this.contract.name}.${method.name}`;
        const options = this.callOptionsOf(method, args);
        const signal = options?.signal;
        if (signal?.aborted) {
            throw new CancelledError(`${label} was cancelled before it was sent`);
        }

        const config = resolveConfiguration(
            this.contract,
            method,
            options ? callScope(options) : undefined,
            this.config.globalSettings(),
        );
        invocation.advance('ConfigResolved');

        const bound = bindArguments(method, args);
        if (this.config.validateRequests && bound.hasBody) {
            this.validateBody(label, bound.bodyValue);
        }
        const request = synthesizeRequest(config.baseAddress, method, config, bound);
        invocation.advance('RequestBuilt');

        if (signal?.aborted) {
            throw new CancelledError(`${label} was cancelled before it was sent`);
        }

        const exchange = async (): Promise<unknown> => {
            const transport = await this.pool.acquire(
                new TransportKey(this.contract.name, request.baseUrl),
                this.config.transportFactory,
            );
            invocation.markSent();
            const outcome = await this.send(label, transport, request, signal);
            invocation.advance('ResponseReceived');
            if (signal?.aborted) {
                throw new CancelledError(`${label} was cancelled while waiting for the response`);
            }
            return mapResponse(outcome, method.resultShape, config.serializer);
        };

        const result = this.config.loggingEnabled
            ? await this.logApiCall.execute(
                  'CLIENT',
                  new ApiCallInfo(this.contract.name, method.name, request.verb, request.url, request.body),
                  this.headersForLogging(request),
                  exchange,
              )
            : await exchange();
        invocation.advance('Completed');
        return result;
    }

    /**
     * The CallOptions of a call: the argument in a declared CallOptions slot,
     * or an extra trailing CallOptions argument.
     */
    private callOptionsOf(method: MethodDescriptor, args: readonly unknown[]): CallOptions | undefined {
        if (method.callOptionsIndex !== undefined) {
            const value = args[method.callOptionsIndex];
            if (value === undefined || value === null) {
                return undefined;
            }
            if (value instanceof CallOptions) {
                return value;
            }
            throw new UnsupportedParameterBindingError(
                `${this.contract.name}.${method.name}`,
                `#${method.callOptionsIndex}`,
                'expected a CallOptions instance',
            );
        }
        const last = args[args.length - 1];
        if (args.length > method.arity && last instanceof CallOptions) {
            return last;
        }
        return undefined;
    }

    private async send(
        label: string,
        transport: Transport,
        request: RequestDescriptor,
        signal: AbortSignal | undefined,
    ): Promise<ResponseOutcome> {
        try {
            return await transport.send(request, signal);
        } catch (err: unknown) {
            const error = toError(err);
            if (error instanceof DispatchError) {
                throw error;
            }
            if (signal?.aborted) {
                throw new CancelledError(`${label} was cancelled`, error);
            }
            throw new TransportError(`${request.verb} ${request.url} failed: ${error.message}`, error);
        }
    }

    /**
     * class-validator constraints of a class-instance body. Plain objects and
     * primitives carry no constraints and pass as they are.
     */
    private validateBody(label: string, body: unknown): void {
        if (typeof body !== 'object' || body === null || body.constructor === Object || Array.isArray(body)) {
            return;
        }
        const errors = validateSync(body, { forbidUnknownValues: false });
        if (errors.length > 0) {
            throw new RequestValidationError(label, formatValidationErrors(errors));
        }
    }

    private headersForLogging(request: RequestDescriptor): Record<string, string> {
        const secureNames = this.headerMethods.secureHeaderNames(this.config.allSecureHeaders());
        return this.headerMethods.buildSecureMapForLogs(request.headers, secureNames);
    }
}

function callScope(options: CallOptions): ScopeSettings {
    return {
        baseAddress: options.baseUrl,
        variables: options.variables,
        headers: options.headers,
        cookies: options.cookies,
        timeoutMs: options.timeoutMs,
        serializer: options.serializer,
    };
}

function formatValidationErrors(errors: ValidationError[]): string[] {
    const messages: string[] = [];
    for (const error of errors) {
        if (error.constraints) {
            messages.push(...Object.values(error.constraints));
        }
        if (error.children && error.children.length > 0) {
            messages.push(...formatValidationErrors(error.children));
        }
    }
    return messages;
}
