import { instanceToPlain, plainToInstance } from 'class-transformer';
import { ResultShape, SerializationHint, Serializer } from '@wirecall/http-api';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Class instances (and arrays of them) go through class-transformer so that
 * @Exclude/@Expose/@Transform decorators on request DTOs apply. Plain objects
 * and Dates are written as they are.
 */
function toPlain(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(toPlain);
    }
    if (isRecord(value) && !(value instanceof Date) && Object.getPrototypeOf(value) !== Object.prototype) {
        return instanceToPlain(value);
    }
    return value;
}

/**
 * JsonSerializer - the default serializer.
 *
 * Serialize: class-transformer `instanceToPlain` for class instances, then
 * JSON.stringify. Dates become ISO-8601 strings, or epoch millis with
 * `dateFormat: 'epoch'`.
 *
 * Deserialize: JSON.parse, then class-transformer `plainToInstance` when the
 * result shape names a class, so callers get real instances (methods, getters,
 * @Type-converted nested objects).
 */
export class JsonSerializer implements Serializer {
    readonly contentType = 'application/json';

    serialize(value: unknown, hint?: SerializationHint): string {
        const epochDates = hint?.dateFormat === 'epoch';
        const text = JSON.stringify(toPlain(value), function (this: unknown, key: string, current: unknown) {
            // toJSON has already turned Dates into strings; the holder still has the Date
            const original = typeof this === 'object' && this !== null ? Reflect.get(this, key) : undefined;
            return epochDates && original instanceof Date ? original.getTime() : current;
        });
        if (text === undefined) {
            throw new Error(`a value of type ${typeof value} has no JSON representation`);
        }
        return text;
    }

    deserialize(text: string, shape: ResultShape): unknown {
        const parsed: unknown = JSON.parse(text);
        const type = shape.type;
        if (type === undefined || shape.kind === 'void') {
            return parsed;
        }

        if (shape.kind === 'sequence') {
            if (!Array.isArray(parsed)) {
                throw new Error(`expected a JSON array of ${type.name}`);
            }
            return parsed.map((item: unknown) => {
                if (!isRecord(item)) {
                    throw new Error(`expected every element to be a JSON object for ${type.name}`);
                }
                return plainToInstance(type, item);
            });
        }

        if (!isRecord(parsed)) {
            throw new Error(`expected a JSON object for ${type.name}`);
        }
        return plainToInstance(type, parsed);
    }
}
