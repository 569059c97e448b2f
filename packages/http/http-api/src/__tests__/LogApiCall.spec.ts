import { ClientRequestError, ServiceFailureError } from '../errors';
import { HttpVerb } from '../HttpVerb';
import { ApiCallInfo, LogApiCall } from '../LogApiCall';

describe('LogApiCall', () => {
    const info = new ApiCallInfo('CustomerApi', 'getCustomer', HttpVerb.GET, 'https://svc.example/api/customers/7');
    let logSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should log request and successful response', async () => {
        const result = await new LogApiCall().execute('CLIENT', info, { accept: 'application/json' }, async () => ({ id: 7 }));

        expect(result).toEqual({ id: 7 });
        expect(logSpy.mock.calls).toEqual([
            ['[API-CLIENT-req] CustomerApi.getCustomer GET https://svc.example/api/customers/7 headers={"accept":"application/json"}'],
            ['[API-CLIENT-resp-SUCCESS] CustomerApi.getCustomer response={"id":7}'],
        ]);
        expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should include the request body when there is one', async () => {
        const post = new ApiCallInfo('CustomerApi', 'createCustomer', HttpVerb.POST, 'https://svc.example/api/customers', '{"name":"Ada"}');

        await new LogApiCall().execute('CLIENT', post, {}, async () => undefined);

        expect(logSpy.mock.calls[0]).toEqual([
            '[API-CLIENT-req] CustomerApi.createCustomer POST https://svc.example/api/customers request={"name":"Ada"} headers={}',
        ]);
    });

    it('should keep a successful result that JSON cannot write', async () => {
        const value = { n: BigInt(10) };

        const result = await new LogApiCall().execute('CLIENT', info, {}, async () => value);

        expect(result).toBe(value);
        expect(logSpy.mock.calls[1]).toEqual([
            '[API-CLIENT-resp-SUCCESS] CustomerApi.getCustomer response=<unloggable: Do not know how to serialize a BigInt>',
        ]);
        expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should log client errors as OTHER and rethrow them', async () => {
        const failure = new ClientRequestError('HTTP 404', 404, '');

        await expect(
            new LogApiCall().execute('CLIENT', info, {}, async () => {
                throw failure;
            }),
        ).rejects.toBe(failure);

        expect(logSpy.mock.calls[1]).toEqual(['[API-CLIENT-resp-OTHER] CustomerApi.getCustomer errorType=ClientRequestError']);
        expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should log other failures as FAIL with the error message', async () => {
        await expect(
            new LogApiCall().execute('CLIENT', info, {}, async () => {
                throw new ServiceFailureError('HTTP 503', 503, '');
            }),
        ).rejects.toBeInstanceOf(ServiceFailureError);

        expect(errorSpy.mock.calls).toEqual([
            ['[API-CLIENT-resp-FAIL] CustomerApi.getCustomer errorType=ServiceFailureError error=HTTP 503'],
        ]);
    });
});
