import { toError } from '@wirecall/core-util';
import { HttpVerb, SerializationError } from '@wirecall/http-api';
import { EffectiveConfiguration, mergeHeaders } from './ConfigurationResolver';
import { MethodDescriptor } from './descriptors';
import { BoundArguments, Entry } from './ParameterBinder';
import { expandTemplate } from './TemplateResolver';

/**
 * RequestDescriptor - one fully resolved, transport-agnostic HTTP request.
 */
export class RequestDescriptor {
    constructor(
        readonly url: string,
        /** The expanded base address; part of the transport pool key. */
        readonly baseUrl: string,
        readonly verb: HttpVerb,
        readonly headers: Readonly<Record<string, string>>,
        readonly cookies: Readonly<Record<string, string>>,
        readonly body: string | undefined,
        readonly timeoutMs: number,
    ) {
        Object.freeze(this);
    }
}

/**
 * Builds the RequestDescriptor of one call.
 *
 * - URL: expanded base address + '/' + expanded method path + query string.
 *   Path arguments are percent-encoded, configuration variables are inserted
 *   verbatim. Query entries keep declaration order.
 * - Headers and cookies: configuration first, bound arguments on top.
 * - Body: serialized with the configured serializer, only when the method has a
 *   body parameter; content-type comes from the serializer unless already set.
 *
 * Never mutates its inputs.
 *
 * @throws UnresolvedPlaceholderError, SerializationError
 */
export function synthesizeRequest(
    baseAddress: string,
    method: MethodDescriptor,
    config: EffectiveConfiguration,
    bound: BoundArguments,
): RequestDescriptor {
    const namedValues: Record<string, string> = { ...config.variables };
    for (const [name, value] of Object.entries(bound.pathValues)) {
        namedValues[name] = encodeURIComponent(value);
    }

    const baseUrl = expandTemplate(baseAddress, namedValues);
    const path = expandTemplate(method.pathTemplate, namedValues);
    const url = appendQuery(joinUrl(baseUrl, path), bound.queryEntries);

    const headers = mergeHeaders([config.headers, Object.fromEntries(bound.headerEntries)]);
    const cookies: Record<string, string> = { ...config.cookies, ...Object.fromEntries(bound.cookieEntries) };

    let body: string | undefined;
    if (bound.hasBody) {
        try {
            body = config.serializer.serialize(bound.bodyValue, bound.bodyHint);
        } catch (err: unknown) {
            const error = toError(err);
            throw new SerializationError(error);
        }
        if (!Object.keys(headers).some((name) => name.toLowerCase() === 'content-type')) {
            headers['content-type'] = config.serializer.contentType;
        }
    }

    return new RequestDescriptor(
        url,
        baseUrl,
        method.verb,
        Object.freeze(headers),
        Object.freeze(cookies),
        body,
        config.timeoutMs,
    );
}

/**
 * Joins with exactly one '/' between base and path; an empty path leaves the base untouched.
 */
export function joinUrl(base: string, path: string): string {
    if (path === '') {
        return base;
    }
    return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

function appendQuery(url: string, entries: readonly Entry[]): string {
    if (entries.length === 0) {
        return url;
    }
    const query = entries.map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`).join('&');
    return `${url}${url.includes('?') ? '&' : '?'}${query}`;
}
