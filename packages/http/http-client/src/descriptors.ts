import { BindingKind, HttpVerb, ResultShape, SerializationHint, Serializer } from '@wirecall/http-api';

/**
 * One configuration layer: global, service, method or call.
 * Every field is optional; EffectiveConfiguration is the merge of all layers.
 */
export class ScopeSettings {
    baseAddress?: string;
    variables?: Readonly<Record<string, string>>;
    headers?: Readonly<Record<string, string>>;
    cookies?: Readonly<Record<string, string>>;
    timeoutMs?: number;
    serializer?: Serializer;
}

/**
 * How one declared parameter becomes part of the request.
 */
export class ParameterBinding {
    constructor(
        /** Placeholder, query key, header or cookie name. */
        readonly name: string,
        readonly kind: BindingKind,
        /** Position of the argument in the call. */
        readonly index: number,
        /** True when a binding decorator chose the kind, false when the default policy did. */
        readonly explicit: boolean,
        readonly hint?: SerializationHint,
    ) {
        Object.freeze(this);
    }
}

/**
 * Immutable description of one contract method.
 */
export class MethodDescriptor {
    readonly parameters: readonly ParameterBinding[];
    /** Placeholders filled from Path-bound arguments. */
    readonly pathPlaceholders: readonly string[];
    /** Placeholders filled from configuration variables. */
    readonly configPlaceholders: readonly string[];

    constructor(
        readonly contractName: string,
        readonly name: string,
        readonly verb: HttpVerb,
        readonly pathTemplate: string,
        parameters: ParameterBinding[],
        readonly resultShape: ResultShape,
        readonly settings: ScopeSettings,
        pathPlaceholders: string[],
        configPlaceholders: string[],
        /** Number of declared parameters, including a CallOptions slot. */
        readonly arity: number,
        /** Index of a parameter declared as CallOptions, if any. */
        readonly callOptionsIndex?: number,
    ) {
        this.parameters = Object.freeze([...parameters]);
        this.pathPlaceholders = Object.freeze([...pathPlaceholders]);
        this.configPlaceholders = Object.freeze([...configPlaceholders]);
        Object.freeze(this.settings);
        Object.freeze(this);
    }

    bodyBinding(): ParameterBinding | undefined {
        return this.parameters.find((p) => p.kind === BindingKind.Body);
    }
}

/**
 * Immutable description of a contract: its base-address template, its
 * service-scoped settings and one MethodDescriptor per method.
 * Built once per contract class and shared by every client of that contract.
 */
export class ContractDescriptor {
    readonly methods: ReadonlyMap<string, MethodDescriptor>;

    constructor(
        readonly name: string,
        readonly baseAddress: string,
        readonly settings: ScopeSettings,
        methods: Map<string, MethodDescriptor>,
    ) {
        this.methods = new Map(methods);
        Object.freeze(this.settings);
        Object.freeze(this);
    }

    method(name: string): MethodDescriptor | undefined {
        return this.methods.get(name);
    }
}
