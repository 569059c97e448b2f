import { BindingKind, SerializationHint, UnsupportedParameterBindingError } from '@wirecall/http-api';
import { MethodDescriptor, ParameterBinding } from './descriptors';

export type Entry = readonly [string, string];

/**
 * The call arguments sorted by destination. Values are text, not yet URL-encoded.
 */
export class BoundArguments {
    constructor(
        readonly pathValues: Readonly<Record<string, string>>,
        readonly queryEntries: readonly Entry[],
        readonly headerEntries: readonly Entry[],
        readonly cookieEntries: readonly Entry[],
        readonly hasBody: boolean,
        readonly bodyValue: unknown,
        readonly bodyHint?: SerializationHint,
    ) {
        Object.freeze(this);
    }
}

/**
 * Sorts call arguments into path values, query entries, headers, cookies and
 * the body, following the method's bindings.
 *
 * - Path and Body arguments must be present (not null or undefined)
 * - null/undefined Query, Header and Cookie arguments are left out of the request
 * - an array Query argument repeats the key once per element, in order
 * - an array Header argument is joined with ', '
 *
 * @throws UnsupportedParameterBindingError
 */
export function bindArguments(method: MethodDescriptor, args: readonly unknown[]): BoundArguments {
    const label = `${method.contractName}.${method.name}`;
    const bodies = method.parameters.filter((p) => p.kind === BindingKind.Body);
    if (bodies.length > 1) {
        throw new UnsupportedParameterBindingError(label, bodies[1].name, 'only one body parameter is allowed per method');
    }

    const pathValues: Record<string, string> = {};
    const queryEntries: Entry[] = [];
    const headerEntries: Entry[] = [];
    const cookieEntries: Entry[] = [];
    let bodyValue: unknown;
    let bodyHint: SerializationHint | undefined;

    for (const binding of method.parameters) {
        const value = args[binding.index];
        const text = (v: unknown): string => formatParameterValue(label, binding, v);

        switch (binding.kind) {
            case BindingKind.Path:
                if (value === null || value === undefined) {
                    throw new UnsupportedParameterBindingError(label, binding.name, 'path parameters require a value');
                }
                pathValues[binding.name] = text(value);
                break;
            case BindingKind.Query:
                if (Array.isArray(value)) {
                    for (const item of value) {
                        if (item !== null && item !== undefined) {
                            queryEntries.push([binding.name, text(item)]);
                        }
                    }
                } else if (value !== null && value !== undefined) {
                    queryEntries.push([binding.name, text(value)]);
                }
                break;
            case BindingKind.Header:
                if (Array.isArray(value)) {
                    headerEntries.push([binding.name, value.map(text).join(', ')]);
                } else if (value !== null && value !== undefined) {
                    headerEntries.push([binding.name, text(value)]);
                }
                break;
            case BindingKind.Cookie:
                if (value !== null && value !== undefined) {
                    cookieEntries.push([binding.name, text(value)]);
                }
                break;
            case BindingKind.Body:
                if (value === null || value === undefined) {
                    throw new UnsupportedParameterBindingError(label, binding.name, 'the body parameter requires a value');
                }
                bodyValue = value;
                bodyHint = binding.hint;
                break;
        }
    }

    return new BoundArguments(
        Object.freeze(pathValues),
        Object.freeze(queryEntries),
        Object.freeze(headerEntries),
        Object.freeze(cookieEntries),
        bodies.length === 1,
        bodyValue,
        bodyHint,
    );
}

/**
 * Text form of one path, query, header or cookie value.
 *
 * Strings as-is, numbers/booleans/bigints with String(), Dates as ISO-8601 or
 * epoch millis, objects and arrays as JSON. `format: 'json'` forces JSON.
 */
export function formatParameterValue(label: string, binding: ParameterBinding, value: unknown): string {
    if (binding.hint?.format === 'json') {
        return JSON.stringify(value);
    }
    if (value instanceof Date) {
        return binding.hint?.dateFormat === 'epoch' ? String(value.getTime()) : value.toISOString();
    }
    switch (typeof value) {
        case 'string':
            return value;
        case 'number':
        case 'boolean':
        case 'bigint':
            return String(value);
        case 'object':
            return JSON.stringify(value);
        default:
            throw new UnsupportedParameterBindingError(
                label,
                binding.name,
                `a ${typeof value} cannot be written into a ${binding.kind.toLowerCase()}`,
            );
    }
}
