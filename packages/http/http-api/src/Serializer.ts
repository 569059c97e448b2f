import { ResultShape } from './ResultShape';

/**
 * SerializationHint - per-binding formatting instructions.
 *
 * `format: 'json'` writes a query/header/cookie/path value as JSON text even
 * when it is a string. `dateFormat` picks ISO-8601 (default) or epoch millis
 * for Date values, in bound parameters and in serialized bodies.
 */
export class SerializationHint {
    format?: 'json' | 'text';
    dateFormat?: 'iso' | 'epoch';
}

/**
 * Serializer - turns body values into text and response text into values.
 *
 * Implementations live in @wirecall/http-client (JsonSerializer, TextSerializer).
 * A serializer is chosen per call from the effective configuration.
 */
export interface Serializer {
    /** Content-Type sent with serialized bodies. */
    readonly contentType: string;

    /**
     * @throws when the value has no representation in this format
     */
    serialize(value: unknown, hint?: SerializationHint): string;

    /**
     * @throws when the text is malformed for the requested shape
     */
    deserialize(text: string, shape: ResultShape): unknown;
}
