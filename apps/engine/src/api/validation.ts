import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';

function describe(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Validate the query string; 422 on failure
 */
export function parseQuery<T extends z.ZodTypeAny>(c: Context, schema: T): z.output<T> {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
        throw new HTTPException(422, { message: describe(result.error) });
    }
    return result.data;
}

/**
 * Validate a JSON body; 400 when it is not JSON, 422 when it does not match
 */
export async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
    let body: unknown;
    try {
        body = await c.req.json();
    } catch {
        throw new HTTPException(400, { message: 'Request body must be valid JSON' });
    }

    const result = schema.safeParse(body);
    if (!result.success) {
        throw new HTTPException(422, { message: describe(result.error) });
    }
    return result.data;
}

export const uuidParam = z.string().uuid();
