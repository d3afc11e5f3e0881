/**
 * JSON payload extraction for model responses
 */

import { ValidationError } from '../../errors';
import { errorMessage } from '../../logger';

export type PayloadShape = 'object' | 'array';

/**
 * Remove a surrounding ```json fence if the model added one
 */
export function stripCodeFences(text: string): string {
    let body = text.trim();
    if (body.startsWith('```json')) {
        body = body.slice(7);
    } else if (body.startsWith('```')) {
        body = body.slice(3);
    }
    if (body.endsWith('```')) {
        body = body.slice(0, -3);
    }
    return body.trim();
}

/**
 * Cut the first balanced JSON object or array out of the text, ignoring
 * brackets inside strings. An unbalanced payload is returned as-is from its
 * first bracket so the parser reports it.
 */
export function extractJson(text: string): string {
    const body = stripCodeFences(text);
    const start = body.search(/[[{]/);
    if (start === -1) {
        return body;
    }

    const open = body[start];
    const close = open === '{' ? '}' : ']';
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < body.length; i++) {
        const char = body[i];
        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (char === '\\') {
                escaped = true;
            } else if (char === '"') {
                inString = false;
            }
            continue;
        }

        if (char === '"') {
            inString = true;
        } else if (char === open) {
            depth++;
        } else if (char === close) {
            depth--;
            if (depth === 0) {
                return body.slice(start, i + 1);
            }
        }
    }
    return body.slice(start);
}

/**
 * Parse a model response into a JSON value of the expected shape.
 * A response that does not end with the closing bracket is reported as truncated.
 */
export function parseJsonPayload(text: string, shape: PayloadShape): unknown {
    const closing = shape === 'object' ? '}' : ']';
    let value: unknown;

    try {
        value = JSON.parse(extractJson(text));
    } catch (error) {
        if (!stripCodeFences(text).endsWith(closing)) {
            throw new ValidationError('truncated', [
                `Response ended without a closing '${closing}' after ${text.length} characters`,
            ], { cause: error });
        }
        throw new ValidationError('malformed', [`Invalid JSON: ${errorMessage(error)}`], { cause: error });
    }

    const matches = shape === 'array' ? Array.isArray(value) : typeof value === 'object' && value !== null && !Array.isArray(value);
    if (!matches) {
        throw new ValidationError('schema', [`Expected a JSON ${shape}`]);
    }
    return value;
}
