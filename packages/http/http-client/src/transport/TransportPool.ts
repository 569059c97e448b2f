import { toError } from '@wirecall/core-util';
import { TransportError } from '@wirecall/http-api';
import { Transport, TransportFactory, TransportKey } from './Transport';

/**
 * TransportPool - one lazily created transport per TransportKey and factory.
 *
 * Entries are grouped by factory, so two configurations that reach the same
 * contract and base address through different factories never share a
 * transport. The pool stores the creation promise, not the transport, so concurrent
 * first calls for the same key share a single factory call. A failed creation
 * is evicted and the next acquire() tries again.
 */
export class TransportPool {
    private byFactory = new Map<TransportFactory, Map<string, Promise<Transport>>>();

    acquire(key: TransportKey, factory: TransportFactory): Promise<Transport> {
        const transports = this.transportsOf(factory);
        const id = key.toString();
        const existing = transports.get(id);
        if (existing) {
            return existing;
        }

        // the factory runs on a later tick, after the entry is in the map
        const created: Promise<Transport> = Promise.resolve(key)
            .then(factory)
            .catch((err: unknown) => {
                const error = toError(err);
                if (transports.get(id) === created) {
                    transports.delete(id);
                }
                throw new TransportError(`Could not create transport for ${id}: ${error.message}`, error);
            });
        transports.set(id, created);
        return created;
    }

    get size(): number {
        let count = 0;
        for (const transports of this.byFactory.values()) {
            count += transports.size;
        }
        return count;
    }

    /**
     * Empties the pool and closes every transport that was created.
     */
    async close(): Promise<void> {
        const entries = [...this.byFactory.values()].flatMap((transports) => [...transports.values()]);
        this.byFactory.clear();

        const results = await Promise.allSettled(entries);
        for (const result of results) {
            // rejected entries already reached the callers that awaited them
            if (result.status === 'fulfilled' && result.value.close) {
                await result.value.close();
            }
        }
    }

    private transportsOf(factory: TransportFactory): Map<string, Promise<Transport>> {
        const existing = this.byFactory.get(factory);
        if (existing) {
            return existing;
        }
        const transports = new Map<string, Promise<Transport>>();
        this.byFactory.set(factory, transports);
        return transports;
    }
}

/**
 * Pool used by createClient() when the ClientConfig names none.
 */
export const defaultTransportPool = new TransportPool();
