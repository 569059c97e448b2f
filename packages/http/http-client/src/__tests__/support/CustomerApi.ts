import { IsEmail, IsNotEmpty } from 'class-validator';
import {
    ApiInterface,
    CallOptions,
    Delete,
    Get,
    HeaderParam,
    Post,
    QueryParam,
    Returns,
    ReturnsList,
    ReturnsVoid,
} from '@wirecall/http-api';

export class Customer {
    id = 0;
    name = '';

    get displayName(): string {
        return `#${this.id} ${this.name}`;
    }
}

export class NewCustomer {
    @IsNotEmpty()
    name = '';

    @IsEmail()
    email = '';

    constructor(name: string = '', email: string = '') {
        this.name = name;
        this.email = email;
    }
}

@ApiInterface({ baseUrl: 'https://svc.example/api' })
export abstract class CustomerApi {
    @Get('customers/{customerId}')
    @Returns(Customer)
    getCustomer(customerId: number, options?: CallOptions): Promise<Customer> {
        throw new Error('Method getCustomer() must be implemented by subclass');
    }

    @Get('customers')
    @ReturnsList(Customer)
    listCustomers(region: string, @QueryParam('tag') tags: string[]): Promise<Customer[]> {
        throw new Error('Method listCustomers() must be implemented by subclass');
    }

    @Post('customers')
    @Returns(Customer)
    createCustomer(customer: NewCustomer): Promise<Customer> {
        throw new Error('Method createCustomer() must be implemented by subclass');
    }

    @Delete('customers/{customerId}')
    @ReturnsVoid()
    deleteCustomer(customerId: number, @HeaderParam('x-request-id') requestId: string): Promise<void> {
        throw new Error('Method deleteCustomer() must be implemented by subclass');
    }
}

/**
 * A contract without a base address; ClientConfig.baseUrl fills '{baseUrl}'.
 */
@ApiInterface({ headers: { accept: 'application/json' } })
export abstract class StatusApi {
    @Get('status')
    @Returns()
    status(): Promise<unknown> {
        throw new Error('Method status() must be implemented by subclass');
    }
}
