import {
    ApiInterface,
    Get,
    HttpVerb,
    SerializationError,
    Serializer,
    UnresolvedPlaceholderError,
} from '@wirecall/http-api';
import { EffectiveConfiguration } from '../ConfigurationResolver';
import { bindArguments } from '../ParameterBinder';
import { joinUrl, synthesizeRequest } from '../RequestSynthesizer';
import { JsonSerializer } from '../serializers/JsonSerializer';
import { TextSerializer } from '../serializers/TextSerializer';
import { CustomerApi, NewCustomer } from './support/CustomerApi';
import { methodOf } from './support/methodOf';

@ApiInterface({ baseUrl: 'https://{host}/{prefix}' })
abstract class FileApi {
    @Get('files/{fileName}')
    read(fileName: string, q: string): Promise<string> {
        throw new Error('Method read() must be implemented by subclass');
    }
}

function configWith(
    baseAddress: string,
    variables: Record<string, string> = {},
    headers: Record<string, string> = {},
    serializer: Serializer = new JsonSerializer(),
): EffectiveConfiguration {
    return new EffectiveConfiguration(baseAddress, variables, headers, { lang: 'en' }, 1000, serializer);
}

describe('synthesizeRequest', () => {
    const getCustomer = methodOf(CustomerApi, 'getCustomer');
    const createCustomer = methodOf(CustomerApi, 'createCustomer');
    const deleteCustomer = methodOf(CustomerApi, 'deleteCustomer');
    const read = methodOf(FileApi, 'read');

    it('should join the expanded base and path with exactly one slash', () => {
        const config = configWith('https://{region}.svc.example/api/', { region: 'eu-1' });

        const request = synthesizeRequest(config.baseAddress, getCustomer, config, bindArguments(getCustomer, [7]));

        expect(request.url).toBe('https://eu-1.svc.example/api/customers/7');
        expect(request.baseUrl).toBe('https://eu-1.svc.example/api/');
        expect(request.verb).toBe(HttpVerb.GET);
        expect(request.body).toBeUndefined();
        expect(request.timeoutMs).toBe(1000);
        expect(request.cookies).toEqual({ lang: 'en' });
    });

    it('should encode path arguments and query entries but insert variables verbatim', () => {
        const config = configWith('https://{host}/{prefix}', { host: 'files.example', prefix: 'v1/store' });

        const request = synthesizeRequest(config.baseAddress, read, config, bindArguments(read, ['a/b c.txt', 'x&y z']));

        expect(request.url).toBe('https://files.example/v1/store/files/a%2Fb%20c.txt?q=x%26y%20z');
    });

    it('should add bound headers on top of configured ones', () => {
        const config = configWith('https://svc.example/api', {}, { Accept: 'application/json', 'X-Request-Id': 'from-config' });

        const request = synthesizeRequest(config.baseAddress, deleteCustomer, config, bindArguments(deleteCustomer, [7, 'r-1']));

        expect(request.url).toBe('https://svc.example/api/customers/7');
        expect(request.headers).toEqual({ Accept: 'application/json', 'x-request-id': 'r-1' });
        expect(config.headers).toEqual({ Accept: 'application/json', 'X-Request-Id': 'from-config' });
    });

    it('should serialize the body and set the serializer content type', () => {
        const config = configWith('https://svc.example/api');

        const request = synthesizeRequest(
            config.baseAddress,
            createCustomer,
            config,
            bindArguments(createCustomer, [new NewCustomer('Ada', 'ada@example.com')]),
        );

        expect(request.verb).toBe(HttpVerb.POST);
        expect(request.body).toBe('{"name":"Ada","email":"ada@example.com"}');
        expect(request.headers).toEqual({ 'content-type': 'application/json' });
    });

    it('should keep a configured content type', () => {
        const config = configWith('https://svc.example/api', {}, { 'Content-Type': 'application/vnd.customer+json' });

        const request = synthesizeRequest(
            config.baseAddress,
            createCustomer,
            config,
            bindArguments(createCustomer, [new NewCustomer('Ada', 'ada@example.com')]),
        );

        expect(request.headers).toEqual({ 'Content-Type': 'application/vnd.customer+json' });
    });

    it('should wrap serializer failures in SerializationError', () => {
        const config = configWith('https://svc.example/api', {}, {}, new TextSerializer());
        const bound = bindArguments(createCustomer, [new NewCustomer('Ada', 'ada@example.com')]);

        expect(() => synthesizeRequest(config.baseAddress, createCustomer, config, bound)).toThrow(SerializationError);
        expect(() => synthesizeRequest(config.baseAddress, createCustomer, config, bound)).toThrow(
            'Could not serialize request body: text bodies must be strings, numbers or booleans, not object',
        );
    });

    it('should fail on a placeholder without a value', () => {
        const config = configWith('https://{host}/{prefix}', { host: 'files.example' });

        expect(() => synthesizeRequest(config.baseAddress, read, config, bindArguments(read, ['a', 'b']))).toThrow(
            new UnresolvedPlaceholderError('prefix', 'https://{host}/{prefix}'),
        );
    });
});

describe('joinUrl', () => {
    it('should leave exactly one slash at the join', () => {
        expect(joinUrl('https://a.example/', '/b')).toBe('https://a.example/b');
        expect(joinUrl('https://a.example', 'b')).toBe('https://a.example/b');
        expect(joinUrl('https://a.example//', '//b')).toBe('https://a.example/b');
    });

    it('should return the base for an empty path', () => {
        expect(joinUrl('https://a.example/', '')).toBe('https://a.example/');
    });
});
