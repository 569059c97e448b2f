/**
 * Reads parameter names from a function's source text.
 *
 * Decorator metadata records parameter types but not names, and unannotated
 * parameters bind by name (path placeholder or query key). A parameter written
 * as a destructuring pattern has no usable name and comes back as `arg{index}`.
 */
export function readParameterNames(fn: Function): string[] {
    const source = stripComments(Function.prototype.toString.call(fn));
    const list = parameterList(source);
    if (list === undefined || list.trim() === '') {
        return [];
    }

    return splitTopLevel(list).map((raw, index) => {
        const text = raw.trim().replace(/^\.\.\./, '');
        const match = /^([A-Za-z_$][\w$]*)/.exec(text);
        return match ? match[1] : `arg${index}`;
    });
}

function stripComments(source: string): string {
    return source.replace(/\/\*[\s\S]*?\*\//g, '').replace(/\/\/[^\n]*/g, '');
}

function parameterList(source: string): string | undefined {
    const open = source.indexOf('(');
    if (open < 0) {
        return undefined;
    }
    let depth = 0;
    for (let i = open; i < source.length; i++) {
        if (source[i] === '(') {
            depth++;
        } else if (source[i] === ')') {
            depth--;
            if (depth === 0) {
                return source.slice(open + 1, i);
            }
        }
    }
    return undefined;
}

function splitTopLevel(list: string): string[] {
    const parts: string[] = [];
    let depth = 0;
    let current = '';
    for (const ch of list) {
        if (ch === '(' || ch === '[' || ch === '{') {
            depth++;
        } else if (ch === ')' || ch === ']' || ch === '}') {
            depth--;
        }
        if (ch === ',' && depth === 0) {
            parts.push(current);
            current = '';
        } else {
            current += ch;
        }
    }
    if (current.trim() !== '') {
        parts.push(current);
    }
    return parts;
}
