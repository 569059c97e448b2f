import 'reflect-metadata';
import { Container } from 'inversify';
import { ClientConfig } from '../ClientConfig';
import { ClientFactory } from '../ClientFactory';
import { HttpClientModule } from '../HttpClientModule';
import { defaultTransportPool, TransportPool } from '../transport/TransportPool';
import { CustomerApi } from './support/CustomerApi';
import { json, StubTransport } from './support/StubTransport';

describe('HttpClientModule', () => {
    it('should provide a singleton ClientFactory sharing the default pool', async () => {
        const container = new Container();
        await container.load(HttpClientModule);

        const factory = container.get(ClientFactory);

        expect(container.get(ClientFactory)).toBe(factory);
        expect(container.get(TransportPool)).toBe(defaultTransportPool);
    });

    it('should create working clients', async () => {
        const container = new Container();
        await container.load(HttpClientModule);
        const transport = new StubTransport(() => json(200, { id: 5, name: 'Lin' }));
        const config = new ClientConfig();
        config.pool = new TransportPool();
        config.transportFactory = () => transport;
        config.loggingEnabled = false;

        const client = container.get(ClientFactory).create(CustomerApi, config);

        await expect(client.getCustomer(5)).resolves.toMatchObject({ id: 5, name: 'Lin' });
        expect(transport.requests[0].url).toBe('https://svc.example/api/customers/5');
    });
});
