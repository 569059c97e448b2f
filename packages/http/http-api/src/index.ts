/**
 * @wirecall/http-api
 *
 * Everything a contract definition needs: decorators, result shapes, per-call
 * options, the serializer interface and the error taxonomy. Contract packages
 * depend only on this package; @wirecall/http-client turns them into clients.
 */

// Contract decorators and their raw metadata
export {
    ApiInterface,
    ApiInterfaceOptions,
    Get,
    Post,
    Put,
    Delete,
    Patch,
    Head,
    Options,
    Path,
    Returns,
    ReturnsList,
    ReturnsVoid,
    DefaultHeaders,
    DefaultCookies,
    Timeout,
    PathParam,
    QueryParam,
    HeaderParam,
    CookieParam,
    Body,
    BindingKind,
    RouteMetadata,
    ParameterMetadata,
    METADATA_KEYS,
    getRoutes,
    getParameterMetadata,
    isApiInterface,
    getApiInterfaceOptions,
} from './decorators';

export { HttpVerb, verbTakesBody, verbForbidsBody } from './HttpVerb';
export { ResultShape, ResultKind, EntityType } from './ResultShape';
export { Serializer, SerializationHint } from './Serializer';
export { CallOptions } from './CallOptions';

// Headers and logging
export { PlatformHeader, DEFAULT_SECURE_HEADERS } from './PlatformHeader';
export { ContextReader } from './ContextReader';
export { HeaderMethods } from './HeaderMethods';
export { LogApiCall, ApiCallInfo } from './LogApiCall';

// Errors
export {
    PipelineStage,
    ProtocolError,
    DispatchError,
    ContractDefinitionError,
    TemplateSyntaxError,
    UnresolvedPlaceholderError,
    UnsupportedParameterBindingError,
    RequestValidationError,
    SerializationError,
    DeserializationError,
    HttpStatusError,
    ClientRequestError,
    ServiceFailureError,
    TransportError,
    CancelledError,
} from './errors';
