import 'reflect-metadata';
import { HttpVerb } from './HttpVerb';
import { EntityType, ResultShape } from './ResultShape';
import { SerializationHint } from './Serializer';

/**
 * Metadata keys for contract information.
 * Written by the decorators below and read by describeContract() in @wirecall/http-client.
 */
export const METADATA_KEYS = {
    API_INTERFACE: 'wirecall:api-interface',
    API_OPTIONS: 'wirecall:api-options',
    ROUTES: 'wirecall:routes',
    PARAMETERS: 'wirecall:parameters',
};

/**
 * Where a call argument ends up in the HTTP request.
 */
export enum BindingKind {
    Path = 'Path',
    Query = 'Query',
    Body = 'Body',
    Header = 'Header',
    Cookie = 'Cookie',
}

/**
 * Service-scoped settings declared on the contract class.
 */
export class ApiInterfaceOptions {
    /**
     * Base-address template, e.g. 'https://{region}.svc.example/api'.
     * When omitted the contract uses '{baseUrl}', filled from ClientConfig.baseUrl.
     */
    baseUrl?: string;
    variables?: Record<string, string>;
    headers?: Record<string, string>;
    cookies?: Record<string, string>;
    timeoutMs?: number;
}

/**
 * Raw route metadata recorded on a contract method.
 * Validation happens later, in describeContract(); decorators only record.
 */
export class RouteMetadata {
    verbs: HttpVerb[] = [];
    path?: string;
    parameterTypes: unknown[] = [];
    resultShape?: ResultShape;
    headers?: Record<string, string>;
    cookies?: Record<string, string>;
    timeoutMs?: number;

    constructor(readonly methodName: string) {}
}

/**
 * Raw binding annotation recorded on one method parameter.
 */
export class ParameterMetadata {
    constructor(
        readonly index: number,
        readonly kind: BindingKind,
        readonly name?: string,
        readonly hint?: SerializationHint,
    ) {}
}

/**
 * Mark a class as an API contract.
 *
 * Usage:
 * ```typescript
 * @ApiInterface({ baseUrl: 'https://svc.example/api', headers: { accept: 'application/json' } })
 * export abstract class CustomerApiPrototype {
 *     @Get('customers/{marketId}')
 *     @Returns(Customer)
 *     getCustomer(marketId: number): Promise<Customer> {
 *         throw new Error('Method getCustomer() must be implemented by subclass');
 *     }
 * }
 * ```
 */
export function ApiInterface(options: ApiInterfaceOptions = {}): ClassDecorator {
    return (target) => {
        Reflect.defineMetadata(METADATA_KEYS.API_INTERFACE, true, target);
        Reflect.defineMetadata(METADATA_KEYS.API_OPTIONS, options, target);
    };
}

function updateRoute(target: Object, propertyKey: string | symbol, update: (route: RouteMetadata) => void): void {
    if (typeof propertyKey !== 'string') {
        throw new Error(`Contract methods must have string names, not ${String(propertyKey)}`);
    }

    // For static methods target is the constructor itself, for instance methods the prototype
    const metadataTarget = typeof target === 'function' ? target : target.constructor;

    const routes: RouteMetadata[] = Reflect.getOwnMetadata(METADATA_KEYS.ROUTES, metadataTarget) ?? [];
    let route = routes.find((r) => r.methodName === propertyKey);
    if (!route) {
        route = new RouteMetadata(propertyKey);
        routes.push(route);
    }
    update(route);

    Reflect.defineMetadata(METADATA_KEYS.ROUTES, routes, metadataTarget);
}

/**
 * Shared body of @Get, @Post, @Put, @Delete, @Patch, @Head and @Options.
 */
function httpMethod(verb: HttpVerb, path?: string): MethodDecorator {
    return (target, propertyKey) => {
        updateRoute(target, propertyKey, (route) => {
            route.verbs.push(verb);
            if (path !== undefined) {
                route.path = path;
            }
            const paramTypes: unknown = Reflect.getMetadata('design:paramtypes', target, propertyKey);
            if (Array.isArray(paramTypes)) {
                route.parameterTypes = paramTypes;
            }
        });
    };
}

export function Get(path?: string): MethodDecorator {
    return httpMethod(HttpVerb.GET, path);
}

export function Post(path?: string): MethodDecorator {
    return httpMethod(HttpVerb.POST, path);
}

export function Put(path?: string): MethodDecorator {
    return httpMethod(HttpVerb.PUT, path);
}

export function Delete(path?: string): MethodDecorator {
    return httpMethod(HttpVerb.DELETE, path);
}

export function Patch(path?: string): MethodDecorator {
    return httpMethod(HttpVerb.PATCH, path);
}

export function Head(path?: string): MethodDecorator {
    return httpMethod(HttpVerb.HEAD, path);
}

export function Options(path?: string): MethodDecorator {
    return httpMethod(HttpVerb.OPTIONS, path);
}

/**
 * @Path decorator, an alternative to passing the path to the verb decorator.
 * The path is relative to the contract's base address and may contain
 * `{placeholder}` tokens.
 *
 * ```typescript
 * @Post()
 * @Path('/search/item')
 * save(request: SaveRequest): Promise<SaveResponse> { ... }
 * ```
 */
export function Path(path: string): MethodDecorator {
    return (target, propertyKey) => {
        updateRoute(target, propertyKey, (route) => {
            route.path = path;
        });
    };
}

/**
 * The response body is one `type` instance.
 */
export function Returns(type?: EntityType): MethodDecorator {
    return (target, propertyKey) => {
        updateRoute(target, propertyKey, (route) => {
            route.resultShape = ResultShape.entity(type);
        });
    };
}

/**
 * The response body is an array of `type` instances.
 */
export function ReturnsList(type?: EntityType): MethodDecorator {
    return (target, propertyKey) => {
        updateRoute(target, propertyKey, (route) => {
            route.resultShape = ResultShape.sequence(type);
        });
    };
}

/**
 * The response body is ignored and the call resolves to undefined.
 */
export function ReturnsVoid(): MethodDecorator {
    return (target, propertyKey) => {
        updateRoute(target, propertyKey, (route) => {
            route.resultShape = ResultShape.VOID;
        });
    };
}

/**
 * Method-scoped default headers. They override same-named contract headers.
 */
export function DefaultHeaders(headers: Record<string, string>): MethodDecorator {
    return (target, propertyKey) => {
        updateRoute(target, propertyKey, (route) => {
            route.headers = { ...route.headers, ...headers };
        });
    };
}

export function DefaultCookies(cookies: Record<string, string>): MethodDecorator {
    return (target, propertyKey) => {
        updateRoute(target, propertyKey, (route) => {
            route.cookies = { ...route.cookies, ...cookies };
        });
    };
}

/**
 * Method-scoped timeout in milliseconds.
 */
export function Timeout(timeoutMs: number): MethodDecorator {
    return (target, propertyKey) => {
        updateRoute(target, propertyKey, (route) => {
            route.timeoutMs = timeoutMs;
        });
    };
}

function parameterBinding(kind: BindingKind, name?: string, hint?: SerializationHint): ParameterDecorator {
    return (target, propertyKey, parameterIndex) => {
        if (typeof propertyKey !== 'string') {
            throw new Error(`@${kind} bindings only apply to parameters of named contract methods`);
        }
        const existing: ParameterMetadata[] =
            Reflect.getOwnMetadata(METADATA_KEYS.PARAMETERS, target, propertyKey) ?? [];
        const updated = [...existing, new ParameterMetadata(parameterIndex, kind, name, hint)];
        Reflect.defineMetadata(METADATA_KEYS.PARAMETERS, updated, target, propertyKey);
    };
}

/**
 * Binds the parameter to the `{name}` placeholder of the path (defaults to the parameter's own name).
 */
export function PathParam(name?: string, hint?: SerializationHint): ParameterDecorator {
    return parameterBinding(BindingKind.Path, name, hint);
}

export function QueryParam(name?: string, hint?: SerializationHint): ParameterDecorator {
    return parameterBinding(BindingKind.Query, name, hint);
}

export function HeaderParam(name: string, hint?: SerializationHint): ParameterDecorator {
    return parameterBinding(BindingKind.Header, name, hint);
}

export function CookieParam(name: string, hint?: SerializationHint): ParameterDecorator {
    return parameterBinding(BindingKind.Cookie, name, hint);
}

export function Body(hint?: SerializationHint): ParameterDecorator {
    return parameterBinding(BindingKind.Body, undefined, hint);
}

/**
 * All routes recorded on a contract class.
 */
export function getRoutes(contractClass: Function): RouteMetadata[] {
    return Reflect.getOwnMetadata(METADATA_KEYS.ROUTES, contractClass) ?? [];
}

/**
 * Binding annotations recorded on one method of a contract prototype.
 */
export function getParameterMetadata(prototype: object, methodName: string): ParameterMetadata[] {
    return Reflect.getOwnMetadata(METADATA_KEYS.PARAMETERS, prototype, methodName) ?? [];
}

export function isApiInterface(contractClass: Function): boolean {
    return Reflect.getOwnMetadata(METADATA_KEYS.API_INTERFACE, contractClass) === true;
}

export function getApiInterfaceOptions(contractClass: Function): ApiInterfaceOptions {
    return Reflect.getOwnMetadata(METADATA_KEYS.API_OPTIONS, contractClass) ?? {};
}
