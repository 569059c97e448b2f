import {
    ApiInterface,
    BindingKind,
    Body,
    ContractDefinitionError,
    Get,
    HttpVerb,
    PathParam,
    Post,
    QueryParam,
} from '@wirecall/http-api';
import { buildContractDescriptor, describeContract } from '../ContractDescriber';
import { ParameterBinding } from '../descriptors';
import { CustomerApi, NewCustomer, StatusApi } from './support/CustomerApi';

class Filter {
    text = '';
}

@ApiInterface()
abstract class TwoBodiesApi {
    @Post('customers')
    create(@Body() a: NewCustomer, @Body() b: NewCustomer): Promise<void> {
        throw new Error('Method create() must be implemented by subclass');
    }
}

abstract class NotAContract {
    @Get('x')
    x(): Promise<void> {
        throw new Error('Method x() must be implemented by subclass');
    }
}

@ApiInterface()
abstract class MissingVerbApi {
    @Get('ok')
    ok(): Promise<void> {
        throw new Error('Method ok() must be implemented by subclass');
    }

    helper(): Promise<void> {
        throw new Error('Method helper() must be implemented by subclass');
    }
}

@ApiInterface()
abstract class ComplexQueryApi {
    @Get('search')
    search(filter: Filter): Promise<void> {
        throw new Error('Method search() must be implemented by subclass');
    }
}

@ApiInterface()
abstract class ExplicitQueryApi {
    @Get('search')
    search(@QueryParam('filter') filter: Filter): Promise<void> {
        throw new Error('Method search() must be implemented by subclass');
    }
}

@ApiInterface()
abstract class DanglingPathParamApi {
    @Get('items')
    get(@PathParam() id: string): Promise<void> {
        throw new Error('Method get() must be implemented by subclass');
    }
}

@ApiInterface()
abstract class BodyOnGetApi {
    @Get('items')
    find(@Body() filter: Filter): Promise<void> {
        throw new Error('Method find() must be implemented by subclass');
    }
}

@ApiInterface()
abstract class NoPathApi {
    @Get()
    list(): Promise<void> {
        throw new Error('Method list() must be implemented by subclass');
    }
}

@ApiInterface({ baseUrl: 'https://{region.svc.example' })
abstract class BadTemplateApi {
    @Get('ping')
    ping(): Promise<void> {
        throw new Error('Method ping() must be implemented by subclass');
    }
}

@ApiInterface()
abstract class TwoVerbsApi {
    @Get('items')
    @Post('items')
    items(): Promise<void> {
        throw new Error('Method items() must be implemented by subclass');
    }
}

@ApiInterface()
abstract class EmptyApi {}

function definitionError(fn: () => unknown): ContractDefinitionError {
    try {
        fn();
    } catch (err: unknown) {
        if (err instanceof ContractDefinitionError) {
            return err;
        }
        throw err;
    }
    throw new Error('expected a ContractDefinitionError');
}

describe('describeContract', () => {
    it('should describe every method of a valid contract', () => {
        const contract = describeContract(CustomerApi);

        expect(contract.name).toBe('CustomerApi');
        expect(contract.baseAddress).toBe('https://svc.example/api');
        expect([...contract.methods.keys()].sort()).toEqual([
            'createCustomer',
            'deleteCustomer',
            'getCustomer',
            'listCustomers',
        ]);
    });

    it('should bind a simple parameter named like a placeholder to the path and skip CallOptions', () => {
        const method = describeContract(CustomerApi).method('getCustomer');

        expect(method?.verb).toBe(HttpVerb.GET);
        expect(method?.pathTemplate).toBe('customers/{customerId}');
        expect(method?.parameters).toEqual([new ParameterBinding('customerId', BindingKind.Path, 0, false)]);
        expect(method?.callOptionsIndex).toBe(1);
        expect(method?.arity).toBe(2);
        expect(method?.pathPlaceholders).toEqual(['customerId']);
        expect(method?.configPlaceholders).toEqual([]);
        expect(method?.resultShape.describe()).toBe('Customer');
    });

    it('should bind other simple parameters to the query and complex POST parameters to the body', () => {
        const contract = describeContract(CustomerApi);

        expect(contract.method('listCustomers')?.parameters.map((p) => [p.name, p.kind, p.explicit])).toEqual([
            ['region', BindingKind.Query, false],
            ['tag', BindingKind.Query, true],
        ]);
        expect(contract.method('createCustomer')?.bodyBinding()).toEqual(
            new ParameterBinding('customer', BindingKind.Body, 0, false),
        );
        expect(contract.method('deleteCustomer')?.parameters.map((p) => [p.name, p.kind])).toEqual([
            ['customerId', BindingKind.Path],
            ['x-request-id', BindingKind.Header],
        ]);
    });

    it('should return the same immutable descriptor on every call', () => {
        const first = describeContract(CustomerApi);

        expect(describeContract(CustomerApi)).toBe(first);
        expect(Object.isFrozen(first)).toBe(true);
        expect(Object.isFrozen(first.method('getCustomer'))).toBe(true);
    });

    it('should default the base address to {baseUrl}', () => {
        const contract = describeContract(StatusApi);

        expect(contract.baseAddress).toBe('{baseUrl}');
        expect(contract.method('status')?.configPlaceholders).toEqual(['baseUrl']);
        expect(contract.settings.headers).toEqual({ accept: 'application/json' });
    });

    it('should reject a method with two body parameters', () => {
        const error = definitionError(() => buildContractDescriptor(TwoBodiesApi));

        expect(error.contract).toBe('TwoBodiesApi');
        expect(error.method).toBe('create');
        expect(error.message).toBe('TwoBodiesApi.create: method declares more than one body parameter (a, b)');
    });

    it('should reject a class without @ApiInterface', () => {
        expect(definitionError(() => buildContractDescriptor(NotAContract)).message).toBe(
            'NotAContract: class must be decorated with @ApiInterface()',
        );
    });

    it('should reject a method without a verb decorator', () => {
        expect(definitionError(() => buildContractDescriptor(MissingVerbApi)).message).toBe(
            'MissingVerbApi.helper: method has no HTTP verb decorator (@Get, @Post, ...)',
        );
    });

    it('should reject a complex parameter on GET unless it is annotated', () => {
        expect(definitionError(() => buildContractDescriptor(ComplexQueryApi)).method).toBe('search');
        expect(buildContractDescriptor(ExplicitQueryApi).method('search')?.parameters[0].kind).toBe(BindingKind.Query);
    });

    it('should reject a path parameter without a placeholder', () => {
        expect(definitionError(() => buildContractDescriptor(DanglingPathParamApi)).reason).toBe(
            "path parameter 'id' has no {id} placeholder in '{baseUrl}' + 'items'",
        );
    });

    it('should reject a body on GET', () => {
        expect(definitionError(() => buildContractDescriptor(BodyOnGetApi)).reason).toBe(
            "GET requests cannot carry a body (parameter 'filter')",
        );
    });

    it('should reject a method without a path', () => {
        expect(definitionError(() => buildContractDescriptor(NoPathApi)).reason).toBe(
            'method has no path; pass one to @Get() or add @Path()',
        );
    });

    it('should report template syntax errors as definition errors', () => {
        expect(definitionError(() => buildContractDescriptor(BadTemplateApi)).message).toBe(
            "BadTemplateApi: Invalid template 'https://{region.svc.example' at position 8: unclosed '{'",
        );
    });

    it('should reject more than one verb and an empty contract', () => {
        expect(definitionError(() => buildContractDescriptor(TwoVerbsApi)).reason).toBe(
            'method declares more than one HTTP verb (POST, GET)',
        );
        expect(definitionError(() => buildContractDescriptor(EmptyApi)).message).toBe('EmptyApi: contract declares no methods');
    });
});
