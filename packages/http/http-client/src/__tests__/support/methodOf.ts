import { ContractType, describeContract } from '../../ContractDescriber';
import { ContractDescriptor, MethodDescriptor } from '../../descriptors';

export function methodOf(contract: ContractDescriptor | ContractType, name: string): MethodDescriptor {
    const descriptor = contract instanceof ContractDescriptor ? contract : describeContract(contract);
    const method = descriptor.method(name);
    if (!method) {
        throw new Error(`${descriptor.name}.${name} missing`);
    }
    return method;
}
