/**
 * Tests for CorpusWriter
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { buildStatistics, CorpusWriter } from './CorpusWriter';
import type { RecipeRecord } from '../../src/lib/schemas';

function record(overrides: Partial<RecipeRecord> & Pick<RecipeRecord, 'id' | 'category'>): RecipeRecord {
  return {
    name: overrides.id,
    description: '',
    dietaryTags: [],
    allergens: [],
    traditional: false,
    ingredients: [],
    instructions: [],
    servings: 4,
    difficulty: 'easy',
    ...overrides
  };
}

const RECORDS: RecipeRecord[] = [
  record({ id: 'dessert-tart', category: 'dessert', dietaryTags: ['vegetarian'], allergens: ['gluten', 'dairy'], sourceHash: 'h1' }),
  record({ id: 'appetizer-dip', category: 'appetizer', dietaryTags: ['vegan', 'vegetarian'], difficulty: 'medium' })
];

describe('buildStatistics', () => {
  it('should count categories, difficulty, tags and allergens', () => {
    expect(buildStatistics(RECORDS, new Date('2026-01-02T03:04:05.000Z'))).toEqual({
      totalRecipes: 2,
      categories: { dessert: 1, appetizer: 1 },
      difficulty: { easy: 1, medium: 1 },
      dietaryTags: { vegetarian: 2, vegan: 1 },
      allergens: { gluten: 1, dairy: 1 },
      generatedAt: '2026-01-02T03:04:05.000Z'
    });
  });
});

describe('CorpusWriter', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'menu-data-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should start fresh when there is no corpus yet', async () => {
    await expect(new CorpusWriter(path.join(tmpDir, 'missing')).loadExisting()).resolves.toEqual({});
  });

  it('should write the corpus sorted by id and read it back', async () => {
    const writer = new CorpusWriter(path.join(tmpDir, 'data'));

    await writer.write(RECORDS);
    const written = z.array(z.object({ id: z.string() })).parse(JSON.parse(await fs.readFile(writer.recipesPath, 'utf-8')));
    const existing = await writer.loadExisting();

    expect(written.map(entry => entry.id)).toEqual(['appetizer-dip', 'dessert-tart']);
    expect(Object.keys(existing).sort()).toEqual(['appetizer-dip', 'dessert-tart']);
    expect(existing['dessert-tart']?.sourceHash).toBe('h1');
    await expect(fs.access(path.join(tmpDir, 'data', 'statistics.json'))).resolves.toBeUndefined();
  });
});
