import { ContainerModule } from 'inversify';
import { HeaderMethods, LogApiCall } from '@wirecall/http-api';
import { ClientFactory } from './ClientFactory';
import { defaultTransportPool, TransportPool } from './transport/TransportPool';

/**
 * HttpClientModule - DI bindings for applications that build clients through inversify.
 *
 * ```typescript
 * const container = new Container();
 * await container.load(HttpClientModule);
 * const client = container.get(ClientFactory).create(CustomerApiPrototype, config);
 * ```
 *
 * The TransportPool binding is the same pool createClient() uses, so clients
 * built either way share transports.
 */
export const HttpClientModule = new ContainerModule((options) => {
    const { bind } = options;

    // Stateless utilities, can be shared
    bind<HeaderMethods>(HeaderMethods).toConstantValue(new HeaderMethods());
    bind<LogApiCall>(LogApiCall).toConstantValue(new LogApiCall());

    bind<TransportPool>(TransportPool).toConstantValue(defaultTransportPool);
    bind<ClientFactory>(ClientFactory).toSelf().inSingletonScope();
});
