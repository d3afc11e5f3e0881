import { Hono } from 'hono';
import { z } from 'zod';
import type { ApiDeps } from '../app';
import { formatCategory } from '../format';
import { parseBody, parseQuery, uuidParam } from '../validation';

const listQuerySchema = z.object({
    active_only: z.enum(['true', 'false']).optional().transform(value => value === 'true'),
});

const createSchema = z.object({
    name: z.string().trim().min(1).max(100),
    description: z.string().trim().max(1000).nullable().optional(),
    is_active: z.boolean().optional(),
});

const updateSchema = z.object({
    name: z.string().trim().min(1).max(100).optional(),
    description: z.string().trim().max(1000).nullable().optional(),
    is_active: z.boolean().optional(),
});

export function categoriesRoute({ repo }: ApiDeps): Hono {
    const route = new Hono();

    // GET /categories
    route.get('/categories', async (c) => {
        const { active_only } = parseQuery(c, listQuerySchema);
        const categories = await repo.listCategories({ activeOnly: active_only });
        return c.json(categories.map(formatCategory));
    });

    // POST /categories
    route.post('/categories', async (c) => {
        const data = await parseBody(c, createSchema);
        if (await repo.findCategoryByName(data.name)) {
            return c.json({ detail: `Category "${data.name}" already exists` }, 409);
        }
        const category = await repo.createCategory({
            name: data.name,
            description: data.description,
            isActive: data.is_active,
        });
        return c.json(formatCategory(category), 201);
    });

    // PATCH /categories/:id
    route.patch('/categories/:id', async (c) => {
        const id = c.req.param('id');
        const data = await parseBody(c, updateSchema);
        if (!uuidParam.safeParse(id).success) {
            return c.json({ detail: 'Category not found' }, 404);
        }
        const updated = await repo.updateCategory(id, {
            name: data.name,
            description: data.description,
            isActive: data.is_active,
        });
        if (!updated) {
            return c.json({ detail: 'Category not found' }, 404);
        }
        return c.json(formatCategory(updated));
    });

    return route;
}
