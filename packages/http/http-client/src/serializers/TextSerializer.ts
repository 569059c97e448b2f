import { ResultShape, SerializationHint, Serializer } from '@wirecall/http-api';

/**
 * TextSerializer - plain-text bodies.
 *
 * Strings, numbers, booleans and bigints are written with String(); Dates as
 * ISO-8601 (or epoch millis with `dateFormat: 'epoch'`). A sequence result is
 * the body split into its non-empty lines.
 */
export class TextSerializer implements Serializer {
    readonly contentType = 'text/plain; charset=utf-8';

    serialize(value: unknown, hint?: SerializationHint): string {
        if (value instanceof Date) {
            return hint?.dateFormat === 'epoch' ? String(value.getTime()) : value.toISOString();
        }
        switch (typeof value) {
            case 'string':
                return value;
            case 'number':
            case 'boolean':
            case 'bigint':
                return String(value);
            default:
                throw new Error(`text bodies must be strings, numbers or booleans, not ${typeof value}`);
        }
    }

    deserialize(text: string, shape: ResultShape): unknown {
        if (shape.kind === 'sequence') {
            return text.split(/\r?\n/).filter((line) => line !== '');
        }
        return text;
    }
}
