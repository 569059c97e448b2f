import { toError } from '@wirecall/core-util';
import {
    BindingKind,
    CallOptions,
    ContractDefinitionError,
    getApiInterfaceOptions,
    getParameterMetadata,
    getRoutes,
    isApiInterface,
    ParameterMetadata,
    ResultShape,
    RouteMetadata,
    TemplateSyntaxError,
    verbForbidsBody,
    verbTakesBody,
} from '@wirecall/http-api';
import { ContractDescriptor, MethodDescriptor, ParameterBinding, ScopeSettings } from './descriptors';
import { readParameterNames } from './parameterNames';
import { placeholdersOf } from './TemplateResolver';

/**
 * A contract class: normally an abstract class decorated with @ApiInterface().
 */
export type ContractType<T extends object = object> = Function & { prototype: T };

/**
 * Base-address template of a contract that declares none; ClientConfig.baseUrl fills it.
 */
export const DEFAULT_BASE_ADDRESS = '{baseUrl}';

const SIMPLE_TYPES: readonly unknown[] = [String, Number, Boolean, BigInt, Date];

const descriptorCache = new WeakMap<Function, ContractDescriptor>();

/**
 * Returns the ContractDescriptor of a contract class, building and validating
 * it on first use and returning the cached, immutable descriptor afterwards.
 *
 * @throws ContractDefinitionError naming the offending method and the reason
 */
export function describeContract<T extends object>(contractType: ContractType<T>): ContractDescriptor {
    const cached = descriptorCache.get(contractType);
    if (cached) {
        return cached;
    }
    const descriptor = buildContractDescriptor(contractType);
    descriptorCache.set(contractType, descriptor);
    return descriptor;
}

/**
 * Builds a fresh descriptor without consulting the cache.
 */
export function buildContractDescriptor<T extends object>(contractType: ContractType<T>): ContractDescriptor {
    const contractName = contractType.name || 'AnonymousContract';

    if (!isApiInterface(contractType)) {
        throw new ContractDefinitionError(contractName, undefined, 'class must be decorated with @ApiInterface()');
    }

    const options = getApiInterfaceOptions(contractType);
    const baseAddress = options.baseUrl ?? DEFAULT_BASE_ADDRESS;
    if (baseAddress.trim() === '') {
        throw new ContractDefinitionError(contractName, undefined, 'base-address template is empty');
    }
    const basePlaceholders = templatePlaceholders(contractName, undefined, baseAddress);

    const routes = new Map<string, RouteMetadata>();
    for (const route of getRoutes(contractType)) {
        routes.set(route.methodName, route);
    }

    const methods = new Map<string, MethodDescriptor>();
    for (const [methodName, fn] of contractMethods(contractType.prototype)) {
        const route = routes.get(methodName);
        if (!route) {
            throw new ContractDefinitionError(contractName, methodName, 'method has no HTTP verb decorator (@Get, @Post, ...)');
        }
        const parameterMetadata = getParameterMetadata(contractType.prototype, methodName);
        methods.set(methodName, describeMethod(contractName, baseAddress, basePlaceholders, route, fn, parameterMetadata));
    }

    if (methods.size === 0) {
        throw new ContractDefinitionError(contractName, undefined, 'contract declares no methods');
    }

    const settings: ScopeSettings = {
        variables: copyRecord(options.variables),
        headers: copyRecord(options.headers),
        cookies: copyRecord(options.cookies),
        timeoutMs: options.timeoutMs,
    };
    return new ContractDescriptor(contractName, baseAddress, settings, methods);
}

function contractMethods(prototype: object): [string, Function][] {
    const methods: [string, Function][] = [];
    for (const name of Object.getOwnPropertyNames(prototype)) {
        if (name === 'constructor') {
            continue;
        }
        const value: unknown = Object.getOwnPropertyDescriptor(prototype, name)?.value;
        if (typeof value === 'function') {
            methods.push([name, value]);
        }
    }
    return methods;
}

function describeMethod(
    contractName: string,
    baseAddress: string,
    basePlaceholders: string[],
    route: RouteMetadata,
    fn: Function,
    parameterMetadata: ParameterMetadata[],
): MethodDescriptor {
    const methodName = route.methodName;
    const fail = (reason: string): ContractDefinitionError =>
        new ContractDefinitionError(contractName, methodName, reason);

    if (route.verbs.length === 0) {
        throw fail('method has no HTTP verb decorator (@Get, @Post, ...)');
    }
    if (route.verbs.length > 1) {
        throw fail(`method declares more than one HTTP verb (${route.verbs.join(', ')})`);
    }
    const verb = route.verbs[0];

    if (route.path === undefined) {
        throw fail(`method has no path; pass one to @${verb.charAt(0)}${verb.slice(1).toLowerCase()}() or add @Path()`);
    }
    const pathTemplate = route.path;
    const allPlaceholders = [...basePlaceholders];
    for (const name of templatePlaceholders(contractName, methodName, pathTemplate)) {
        if (!allPlaceholders.includes(name)) {
            allPlaceholders.push(name);
        }
    }

    const explicitByIndex = new Map<number, ParameterMetadata>();
    for (const meta of parameterMetadata) {
        if (explicitByIndex.has(meta.index)) {
            throw fail(`parameter #${meta.index} carries more than one binding decorator`);
        }
        explicitByIndex.set(meta.index, meta);
    }

    const names = readParameterNames(fn);
    const types = route.parameterTypes;
    const arity = Math.max(types.length, names.length, fn.length);

    const bindings: ParameterBinding[] = [];
    let callOptionsIndex: number | undefined;
    for (let index = 0; index < arity; index++) {
        const type = types[index];
        const name = names[index] ?? `arg${index}`;
        const explicit = explicitByIndex.get(index);

        if (type === CallOptions) {
            if (explicit) {
                throw fail(`CallOptions parameter '${name}' cannot carry a binding decorator`);
            }
            callOptionsIndex = index;
            continue;
        }

        if (explicit) {
            bindings.push(new ParameterBinding(explicit.name ?? name, explicit.kind, index, true, explicit.hint));
        } else if (isSimpleType(type)) {
            const kind = allPlaceholders.includes(name) ? BindingKind.Path : BindingKind.Query;
            bindings.push(new ParameterBinding(name, kind, index, false));
        } else if (verbTakesBody(verb)) {
            bindings.push(new ParameterBinding(name, BindingKind.Body, index, false));
        } else {
            throw fail(
                `parameter '${name}' has a complex type and ${verb} binds unannotated parameters to the query string; ` +
                    'annotate it with @QueryParam, @HeaderParam or @Body',
            );
        }
    }

    for (const index of explicitByIndex.keys()) {
        if (index >= arity) {
            throw fail(`binding decorator on unknown parameter #${index}`);
        }
    }

    const bodies = bindings.filter((b) => b.kind === BindingKind.Body);
    if (bodies.length > 1) {
        throw fail(`method declares more than one body parameter (${bodies.map((b) => b.name).join(', ')})`);
    }
    if (bodies.length === 1 && verbForbidsBody(verb)) {
        throw fail(`${verb} requests cannot carry a body (parameter '${bodies[0].name}')`);
    }

    const pathPlaceholders: string[] = [];
    for (const binding of bindings.filter((b) => b.kind === BindingKind.Path)) {
        if (!allPlaceholders.includes(binding.name)) {
            throw fail(`path parameter '${binding.name}' has no {${binding.name}} placeholder in '${baseAddress}' + '${pathTemplate}'`);
        }
        if (pathPlaceholders.includes(binding.name)) {
            throw fail(`placeholder {${binding.name}} is bound by more than one parameter`);
        }
        pathPlaceholders.push(binding.name);
    }
    const configPlaceholders = allPlaceholders.filter((name) => !pathPlaceholders.includes(name));

    const settings: ScopeSettings = {
        headers: copyRecord(route.headers),
        cookies: copyRecord(route.cookies),
        timeoutMs: route.timeoutMs,
    };

    return new MethodDescriptor(
        contractName,
        methodName,
        verb,
        pathTemplate,
        bindings,
        route.resultShape ?? ResultShape.entity(),
        settings,
        pathPlaceholders,
        configPlaceholders,
        arity,
        callOptionsIndex,
    );
}

function templatePlaceholders(contractName: string, methodName: string | undefined, template: string): string[] {
    try {
        return placeholdersOf(template);
    } catch (err: unknown) {
        const error = toError(err);
        if (error instanceof TemplateSyntaxError) {
            throw new ContractDefinitionError(contractName, methodName, error.message);
        }
        throw error;
    }
}

/**
 * Parameters without type metadata are treated as simple values.
 */
function isSimpleType(type: unknown): boolean {
    return type === undefined || SIMPLE_TYPES.includes(type);
}

function copyRecord(record: Record<string, string> | undefined): Record<string, string> | undefined {
    return record === undefined ? undefined : { ...record };
}
