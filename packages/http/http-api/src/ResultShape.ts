import { ClassConstructor } from 'class-transformer';

/**
 * A class the response body is deserialized into.
 */
export type EntityType<T = object> = ClassConstructor<T>;

export type ResultKind = 'void' | 'entity' | 'sequence';

/**
 * ResultShape - what a contract method promises to return.
 *
 * - void: the body is ignored and the call resolves to undefined
 * - entity: the body is one value (an instance of `type` when given)
 * - sequence: the body is an array (of `type` instances when given)
 *
 * Data-only class, compared structurally in tests.
 */
export class ResultShape {
    static readonly VOID = new ResultShape('void');

    private constructor(
        readonly kind: ResultKind,
        readonly type?: EntityType,
    ) {}

    static entity(type?: EntityType): ResultShape {
        return new ResultShape('entity', type);
    }

    static sequence(type?: EntityType): ResultShape {
        return new ResultShape('sequence', type);
    }

    describe(): string {
        const typeName = this.type?.name;
        if (this.kind === 'void') {
            return 'void';
        }
        const element = typeName ?? 'unknown';
        return this.kind === 'sequence' ? `${element}[]` : element;
    }
}
