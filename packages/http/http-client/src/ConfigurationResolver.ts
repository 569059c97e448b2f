import { Serializer } from '@wirecall/http-api';
import { ContractDescriptor, MethodDescriptor, ScopeSettings } from './descriptors';
import { JsonSerializer } from './serializers/JsonSerializer';

export const DEFAULT_TIMEOUT_MS = 30_000;

const DEFAULT_SERIALIZER = new JsonSerializer();

/**
 * EffectiveConfiguration - the fully merged settings of one call.
 * Built fresh per call, never shared.
 */
export class EffectiveConfiguration {
    constructor(
        /** Base-address template, not yet expanded. */
        readonly baseAddress: string,
        readonly variables: Readonly<Record<string, string>>,
        readonly headers: Readonly<Record<string, string>>,
        readonly cookies: Readonly<Record<string, string>>,
        readonly timeoutMs: number,
        readonly serializer: Serializer,
    ) {
        Object.freeze(this);
    }
}

/**
 * Merges the four configuration scopes of one call:
 * global < service < method < call.
 *
 * - scalars (base address, timeout, serializer): the most specific scope that sets one wins
 * - collections (variables, headers, cookies): additive, same key overridden by the
 *   more specific scope; header names compare case-insensitively
 *
 * Pure: no I/O, no shared state, equal inputs give equal results.
 */
export function resolveConfiguration(
    contract: ContractDescriptor,
    method: MethodDescriptor,
    callOverrides: ScopeSettings | undefined,
    global: ScopeSettings = {},
): EffectiveConfiguration {
    const service: ScopeSettings = { ...contract.settings, baseAddress: contract.baseAddress };
    const layers: ScopeSettings[] = [global, service, method.settings, callOverrides ?? {}];

    return new EffectiveConfiguration(
        lastDefined(layers, (l) => l.baseAddress) ?? contract.baseAddress,
        Object.freeze(mergeRecords(layers.map((l) => l.variables))),
        Object.freeze(mergeHeaders(layers.map((l) => l.headers))),
        Object.freeze(mergeRecords(layers.map((l) => l.cookies))),
        lastDefined(layers, (l) => l.timeoutMs) ?? DEFAULT_TIMEOUT_MS,
        lastDefined(layers, (l) => l.serializer) ?? DEFAULT_SERIALIZER,
    );
}

function lastDefined<V>(layers: ScopeSettings[], read: (layer: ScopeSettings) => V | undefined): V | undefined {
    let result: V | undefined;
    for (const layer of layers) {
        const value = read(layer);
        if (value !== undefined) {
            result = value;
        }
    }
    return result;
}

function mergeRecords(records: (Readonly<Record<string, string>> | undefined)[]): Record<string, string> {
    const merged: Record<string, string> = {};
    for (const record of records) {
        Object.assign(merged, record);
    }
    return merged;
}

/**
 * Later maps win. A later 'Accept' replaces an earlier 'accept', keeping the later spelling.
 */
export function mergeHeaders(maps: (Readonly<Record<string, string>> | undefined)[]): Record<string, string> {
    const byLowerName = new Map<string, [string, string]>();
    for (const map of maps) {
        for (const [name, value] of Object.entries(map ?? {})) {
            const key = name.toLowerCase();
            byLowerName.delete(key);
            byLowerName.set(key, [name, value]);
        }
    }
    const merged: Record<string, string> = {};
    for (const [name, value] of byLowerName.values()) {
        merged[name] = value;
    }
    return merged;
}
