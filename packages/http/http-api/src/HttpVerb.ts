/**
 * HTTP verbs a contract method can declare.
 */
export enum HttpVerb {
    GET = 'GET',
    POST = 'POST',
    PUT = 'PUT',
    DELETE = 'DELETE',
    PATCH = 'PATCH',
    HEAD = 'HEAD',
    OPTIONS = 'OPTIONS',
}

/**
 * Verbs whose unannotated complex parameter becomes the request body.
 */
export function verbTakesBody(verb: HttpVerb): boolean {
    return verb === HttpVerb.POST || verb === HttpVerb.PUT || verb === HttpVerb.PATCH;
}

/**
 * Verbs that may never carry a body, even through an explicit @Body().
 */
export function verbForbidsBody(verb: HttpVerb): boolean {
    return verb === HttpVerb.GET || verb === HttpVerb.HEAD;
}
