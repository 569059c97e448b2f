import { TemplateSyntaxError, UnresolvedPlaceholderError } from '@wirecall/http-api';

const PLACEHOLDER_NAME = /^[A-Za-z_$][\w$.-]*$/;

export type TemplateSegment =
    | { readonly kind: 'literal'; readonly text: string }
    | { readonly kind: 'placeholder'; readonly name: string };

/**
 * Splits a template such as 'customers/{marketId}/orders' into literal and
 * placeholder segments.
 *
 * @throws TemplateSyntaxError on an unclosed '{', a stray '}' or an invalid name
 */
export function parseTemplate(template: string): TemplateSegment[] {
    const segments: TemplateSegment[] = [];
    let literal = '';
    let i = 0;

    while (i < template.length) {
        const ch = template[i];
        if (ch === '{') {
            const close = template.indexOf('}', i + 1);
            if (close < 0) {
                throw new TemplateSyntaxError(template, i, "unclosed '{'");
            }
            const name = template.slice(i + 1, close);
            if (!PLACEHOLDER_NAME.test(name)) {
                throw new TemplateSyntaxError(template, i, `invalid placeholder name '${name}'`);
            }
            if (literal !== '') {
                segments.push({ kind: 'literal', text: literal });
                literal = '';
            }
            segments.push({ kind: 'placeholder', name });
            i = close + 1;
        } else if (ch === '}') {
            throw new TemplateSyntaxError(template, i, "'}' without matching '{'");
        } else {
            literal += ch;
            i++;
        }
    }

    if (literal !== '') {
        segments.push({ kind: 'literal', text: literal });
    }
    return segments;
}

/**
 * Placeholder names in order of first appearance, without duplicates.
 */
export function placeholdersOf(template: string): string[] {
    const names: string[] = [];
    for (const segment of parseTemplate(template)) {
        if (segment.kind === 'placeholder' && !names.includes(segment.name)) {
            names.push(segment.name);
        }
    }
    return names;
}

/**
 * Replaces every `{name}` token with its value.
 *
 * Exactly one pass: a substituted value that itself contains `{...}` is copied
 * as-is and never expanded again.
 *
 * @throws UnresolvedPlaceholderError when a token has no value
 */
export function expandTemplate(template: string, namedValues: Readonly<Record<string, string>>): string {
    let result = '';
    for (const segment of parseTemplate(template)) {
        if (segment.kind === 'literal') {
            result += segment.text;
        } else if (Object.hasOwn(namedValues, segment.name)) {
            result += namedValues[segment.name];
        } else {
            throw new UnresolvedPlaceholderError(segment.name, template);
        }
    }
    return result;
}
