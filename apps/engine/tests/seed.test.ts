/**
 * Tests for seed.ts
 */

import fs from 'fs';
import path from 'path';
import { categorySeedSchema, seedCategories } from '../src/storage/seed';
import { InMemoryRepository } from './helpers';

describe('seed file', () => {
    it('should hold the eight default categories', () => {
        const raw: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '../seeds/categories.json'), 'utf-8'));
        const seeds = categorySeedSchema.parse(raw);

        expect(seeds.map(s => s.name)).toEqual([
            'Web Development',
            'AI & Machine Learning',
            'DevOps',
            'Cybersecurity',
            'Cloud Computing',
            'Mobile Development',
            'Data Science',
            'Blockchain',
        ]);
    });
});

describe('seedCategories', () => {
    const seeds = [
        { name: 'DevOps', description: 'Pipelines and infrastructure' },
        { name: 'Data Science', description: null },
    ];

    it('should create missing categories and skip existing ones', async () => {
        const repo = new InMemoryRepository();
        await repo.createCategory({ name: 'DevOps', description: 'Custom text', isActive: false });

        const result = await seedCategories(repo, seeds);

        expect(result).toEqual({ created: ['Data Science'], skipped: ['DevOps'], reset: [] });
        expect(repo.categories.find(c => c.name === 'DevOps')?.description).toBe('Custom text');
    });

    it('should restore existing categories on reset', async () => {
        const repo = new InMemoryRepository();
        await repo.createCategory({ name: 'DevOps', description: 'Custom text', isActive: false });

        const result = await seedCategories(repo, seeds, { reset: true });

        expect(result.reset).toEqual(['DevOps']);
        expect(repo.categories.find(c => c.name === 'DevOps')).toMatchObject({
            description: 'Pipelines and infrastructure',
            isActive: true,
        });
    });
});
