/**
 * @wirecall/http-client
 *
 * Turns contracts declared with @wirecall/http-api decorators into working
 * HTTP clients.
 */
import 'reflect-metadata';

export { createClient, ClientFactory } from './ClientFactory';
export { ClientConfig } from './ClientConfig';
export { HttpClientModule } from './HttpClientModule';
export { ProxyClient } from './ProxyClient';
export { Invocation, InvocationState } from './Invocation';

// Metadata model
export { describeContract, buildContractDescriptor, ContractType, DEFAULT_BASE_ADDRESS } from './ContractDescriber';
export { ContractDescriptor, MethodDescriptor, ParameterBinding, ScopeSettings } from './descriptors';
export { readParameterNames } from './parameterNames';

// Pipeline stages
export { resolveConfiguration, mergeHeaders, EffectiveConfiguration, DEFAULT_TIMEOUT_MS } from './ConfigurationResolver';
export { parseTemplate, placeholdersOf, expandTemplate, TemplateSegment } from './TemplateResolver';
export { bindArguments, formatParameterValue, BoundArguments, Entry } from './ParameterBinder';
export { synthesizeRequest, joinUrl, RequestDescriptor } from './RequestSynthesizer';
export { mapResponse } from './ResponseMapper';
export { ClientErrorTranslator } from './ClientErrorTranslator';

// Configuration and header propagation
export {
    ConfigurationSource,
    SourceSettings,
    StaticConfigurationSource,
    EnvConfigurationSource,
} from './ConfigurationSource';
export { ContextMgr } from './ContextMgr';
export { StaticContextReader, FunctionContextReader, CompositeContextReader } from './ContextReader';

// Serializers
export { JsonSerializer } from './serializers/JsonSerializer';
export { TextSerializer } from './serializers/TextSerializer';

// Transports
export { Transport, TransportKey, TransportFactory } from './transport/Transport';
export { TransportPool, defaultTransportPool } from './transport/TransportPool';
export { FetchTransport, FetchFunction } from './transport/FetchTransport';
export { ResponseOutcome, OutcomeTag, classifyStatus } from './transport/ResponseOutcome';
