import { z } from 'zod';
import { createLogger } from '../logger';
import { Repository } from './Repository';

const logger = createLogger('seed');

export const categorySeedSchema = z.array(z.object({
    name: z.string().trim().min(1),
    description: z.string().trim().nullable().default(null),
}));

export type CategorySeed = z.infer<typeof categorySeedSchema>[number];

export interface SeedResult {
    created: string[];
    skipped: string[];
    reset: string[];
}

/**
 * Insert seed categories by name. Existing names are skipped, or with
 * `reset` re-activated with the seed description.
 */
export async function seedCategories(
    repo: Repository,
    seeds: CategorySeed[],
    options: { reset?: boolean } = {}
): Promise<SeedResult> {
    const result: SeedResult = { created: [], skipped: [], reset: [] };

    for (const seed of seeds) {
        const existing = await repo.findCategoryByName(seed.name);

        if (!existing) {
            await repo.createCategory({ name: seed.name, description: seed.description, isActive: true });
            result.created.push(seed.name);
            logger.info('Category created', { name: seed.name });
        } else if (options.reset) {
            await repo.updateCategory(existing.id, { description: seed.description, isActive: true });
            result.reset.push(seed.name);
            logger.info('Category reset', { name: seed.name });
        } else {
            result.skipped.push(seed.name);
            logger.debug('Category exists, skipping', { name: seed.name });
        }
    }

    return result;
}
