import { ContextReader, PlatformHeader } from '@wirecall/http-api';

/**
 * StaticContextReader - header values from a fixed map.
 *
 * Useful for:
 * - command-line tools and scripts with a fixed API key
 * - tests with known header values
 *
 * ```typescript
 * const reader = new StaticContextReader(new Map([['x-api-version', 'v2']]));
 * ```
 */
export class StaticContextReader implements ContextReader {
    private readonly headers: Map<string, string>;

    constructor(headers: Map<string, string>) {
        this.headers = new Map([...headers].map(([name, value]) => [name.toLowerCase(), value]));
    }

    read(header: PlatformHeader): string | undefined {
        return this.headers.get(header.headerName.toLowerCase());
    }
}

/**
 * FunctionContextReader - header values computed on every read, e.g. from
 * the application's own AsyncLocalStorage or a token cache.
 */
export class FunctionContextReader implements ContextReader {
    constructor(private readonly readFn: (headerName: string) => string | undefined) {}

    read(header: PlatformHeader): string | undefined {
        return this.readFn(header.headerName);
    }
}

/**
 * CompositeContextReader - asks several readers; later readers win.
 *
 * ```typescript
 * const reader = new CompositeContextReader([
 *     new StaticContextReader(defaults),          // base layer
 *     new FunctionContextReader(currentRequestId), // overrides
 * ]);
 * ```
 */
export class CompositeContextReader implements ContextReader {
    constructor(private readonly readers: ContextReader[]) {}

    read(header: PlatformHeader): string | undefined {
        for (let i = this.readers.length - 1; i >= 0; i--) {
            const value = this.readers[i].read(header);
            if (value !== undefined) {
                return value;
            }
        }
        return undefined;
    }
}
