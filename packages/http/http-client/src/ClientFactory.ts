import { inject, injectable } from 'inversify';
import { ContractDefinitionError, HeaderMethods, LogApiCall } from '@wirecall/http-api';
import { ClientConfig } from './ClientConfig';
import { ContractType, describeContract } from './ContractDescriber';
import { ContractDescriptor } from './descriptors';
import { ProxyClient } from './ProxyClient';
import { defaultTransportPool, TransportPool } from './transport/TransportPool';

/**
 * Creates a type-safe HTTP client from an API contract class.
 *
 * - Contract: decorators on an abstract class describe the HTTP endpoints
 * - Client: createClient reads them once and generates HTTP requests from method calls
 *
 * Usage:
 * ```typescript
 * const client = createClient(CustomerApiPrototype, new ClientConfig('https://svc.example/api'));
 * const customer = await client.getCustomer(7); // Type-safe!
 * ```
 *
 * @throws ContractDefinitionError when the contract is malformed or a
 *   configuration placeholder has no value in the given config
 */
export function createClient<T extends object>(contractType: ContractType<T>, config: ClientConfig = new ClientConfig()): T {
    return new ClientFactory(defaultTransportPool, new LogApiCall(), new HeaderMethods()).create(contractType, config);
}

/**
 * ClientFactory - createClient() for applications wired with inversify.
 * Bound by HttpClientModule.
 */
@injectable()
export class ClientFactory {
    constructor(
        @inject(TransportPool) private readonly pool: TransportPool,
        @inject(LogApiCall) private readonly logApiCall: LogApiCall,
        @inject(HeaderMethods) private readonly headerMethods: HeaderMethods,
    ) {}

    create<T extends object>(contractType: ContractType<T>, config: ClientConfig = new ClientConfig()): T {
        const contract = describeContract(contractType);
        verifyConfigPlaceholders(contract, config);

        const proxyClient = new ProxyClient(contract, config, config.pool ?? this.pool, this.logApiCall, this.headerMethods);
        const methods = new Map<string, (...args: unknown[]) => Promise<unknown>>();

        // Create a proxy that intercepts method calls and makes HTTP requests
        return new Proxy({} as T, {
            get(_target, prop: string | symbol) {
                // symbols (inspection, iteration) and 'then' (await) are not contract methods
                if (typeof prop !== 'string' || prop === 'then') {
                    return undefined;
                }

                const cached = methods.get(prop);
                if (cached) {
                    return cached;
                }

                if (!proxyClient.hasMethod(prop)) {
                    throw new Error(
                        `No method '${prop}' on ${contract.name}. ` +
                            'Check for typos or ensure the method is declared on the contract with a verb decorator.',
                    );
                }

                const method = proxyClient.getMethod(prop);
                const invoke = (...args: unknown[]): Promise<unknown> => proxyClient.invoke(method, args);
                methods.set(prop, invoke);
                return invoke;
            },
        });
    }
}

/**
 * Every configuration placeholder must have a value before the first call:
 * from ClientConfig (variables, baseUrl) or from the contract's own variables.
 * CallOptions variables may override these values but are not relied upon.
 */
function verifyConfigPlaceholders(contract: ContractDescriptor, config: ClientConfig): void {
    const available = new Set([
        ...Object.keys(config.globalSettings().variables ?? {}),
        ...Object.keys(contract.settings.variables ?? {}),
    ]);
    for (const method of contract.methods.values()) {
        const missing = method.configPlaceholders.filter((name) => !available.has(name));
        if (missing.length === 0) {
            continue;
        }
        const hint = missing.includes('baseUrl') ? '; set ClientConfig.baseUrl' : '';
        throw new ContractDefinitionError(
            contract.name,
            method.name,
            `no configuration value for placeholder ${missing.map((name) => `{${name}}`).join(', ')}${hint}`,
        );
    }
}
