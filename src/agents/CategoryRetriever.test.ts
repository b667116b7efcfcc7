/**
 * Tests for CategoryRetriever
 */

import { describe, it, expect, vi } from 'vitest';
import type { Candidate, ProgressEvent, RecipeCategory, RequirementSet } from '../types';
import { RunStage } from '../types';
import { CategoryRetriever, COURSE_PROFILES, compareCandidates, createCategoryRetrievers } from './CategoryRetriever';
import { DiscoveryAgent } from './DiscoveryAgent';
import type { Discoverer } from './DiscoveryAgent';
import { RetrievalDegradedError } from '../lib/errors';
import { RecipeCorpus } from '../lib/KnowledgeBase';
import { FakeWebSearch } from '../__tests__/mocks/search.mock';
import {
  FailingRetriever,
  GatedRetriever,
  LeakyRetriever,
  makeCandidate,
  makeRecipe,
  makeRequirements
} from '../__tests__/mocks/recipes.mock';

function createDiscovery(candidates: Candidate[] | Error) {
  return {
    discover: vi.fn(async (_category: RecipeCategory, _requirements: RequirementSet): Promise<Candidate[]> => {
      if (candidates instanceof Error) throw candidates;
      return candidates;
    })
  } satisfies Discoverer;
}

describe('CategoryRetriever', () => {
  const appetizers = new CategoryRetriever(COURSE_PROFILES.appetizer);
  const desserts = new CategoryRetriever(COURSE_PROFILES.dessert);

  it('should build the query from the course hint, restrictions and notes', () => {
    const requirements = makeRequirements({ restrictions: ['vegan', 'gluten_free'], notes: ['pumpkin'] });

    expect(desserts.buildQuery(requirements)).toBe('sweet dessert cake tart or mousse vegan gluten free pumpkin');
  });

  it('should rank by relevance plus tradition and note bonuses', async () => {
    const corpus = new RecipeCorpus([
      makeRecipe({ id: 'a-plain', category: 'appetizer', name: 'Plain Crackers' }),
      makeRecipe({ id: 'a-trad', category: 'appetizer', name: 'Grandma Crackers', traditional: true })
    ]);
    const requirements = makeRequirements({ notes: ['extra crackers please'] });

    const candidates = await appetizers.retrieve(requirements, 5, { corpus, timeoutMs: 1000 });

    expect(candidates.map(({ recipe, score, provenance }) => [recipe.id, score, provenance])).toEqual([
      ['a-trad', 0.875, 'retrieved'],
      ['a-plain', 0.375, 'retrieved']
    ]);
  });

  it('should return at most k candidates', async () => {
    const corpus = new RecipeCorpus(
      ['a', 'b', 'c', 'd'].map(id => makeRecipe({ id: `app-${id}`, category: 'appetizer' }))
    );

    const candidates = await appetizers.retrieve(makeRequirements(), 2, { corpus, timeoutMs: 1000 });

    expect(candidates.map(candidate => candidate.recipe.id)).toEqual(['app-a', 'app-b']);
  });

  it('should drop results the backend let through that break a hard filter', async () => {
    const nutty = makeRecipe({ id: 'a-nut', category: 'appetizer', allergens: ['nuts'] });
    const clean = makeRecipe({ id: 'a-clean', category: 'appetizer' });
    const corpus = new LeakyRetriever([
      { recipe: nutty, score: 1 },
      { recipe: clean, score: 0.5 }
    ]);

    const candidates = await appetizers.retrieve(makeRequirements({ allergens: ['nuts'] }), 5, {
      corpus,
      timeoutMs: 1000
    });

    expect(candidates.map(({ recipe, score }) => [recipe.id, score])).toEqual([['a-clean', 0.5]]);
  });

  it('should leave out recipes over the time and difficulty limits', async () => {
    const corpus = new RecipeCorpus([
      makeRecipe({ id: 'a-quick', category: 'appetizer', prepTimeMinutes: 10 }),
      makeRecipe({ id: 'a-slow', category: 'appetizer', prepTimeMinutes: 50 }),
      makeRecipe({ id: 'a-fiddly', category: 'appetizer', prepTimeMinutes: 5, difficulty: 'hard' })
    ]);
    const requirements = makeRequirements({ maxPrepTimeMinutes: 30, maxDifficulty: 'medium' });

    const candidates = await appetizers.retrieve(requirements, 5, { corpus, timeoutMs: 1000 });

    expect(candidates.map(candidate => candidate.recipe.id)).toEqual(['a-quick']);
  });

  it('should report a failing backend as degraded without trying the web', async () => {
    const discovery = createDiscovery([]);

    const attempt = appetizers.retrieve(makeRequirements(), 5, {
      corpus: new FailingRetriever(new RecipeCorpus([])),
      discovery,
      timeoutMs: 1000
    });

    await expect(attempt).rejects.toBeInstanceOf(RetrievalDegradedError);
    await expect(attempt).rejects.toThrow('Appetizer retrieval failed: index offline');
    expect(discovery.discover).not.toHaveBeenCalled();
  });

  it('should time out a slow backend', async () => {
    await expect(
      appetizers.retrieve(makeRequirements(), 5, {
        corpus: new GatedRetriever(new RecipeCorpus([])),
        timeoutMs: 20
      })
    ).rejects.toThrow('Appetizer retrieval failed: Appetizer retrieval timed out after 20ms');
  });

  it('should not search the web while the corpus has candidates', async () => {
    const discovery = createDiscovery([]);
    const corpus = new RecipeCorpus([makeRecipe({ id: 'd1', category: 'dessert' })]);

    await desserts.retrieve(makeRequirements(), 5, { corpus, discovery, timeoutMs: 1000 });

    expect(discovery.discover).not.toHaveBeenCalled();
  });

  it('should fall back to discovery and re-check what it finds', async () => {
    const discovery = createDiscovery([
      makeCandidate(makeRecipe({ id: 'web-dessert-0', category: 'dessert', dietaryTags: ['vegan', 'vegetarian'] }), 1, 'discovered'),
      makeCandidate(makeRecipe({ id: 'web-dessert-1', category: 'dessert' }), 0.9, 'discovered')
    ]);
    const events: ProgressEvent[] = [];

    const candidates = await desserts.retrieve(makeRequirements({ restrictions: ['vegan'] }), 5, {
      corpus: new RecipeCorpus([]),
      discovery,
      timeoutMs: 1000,
      onProgress: event => events.push(event)
    });

    expect(candidates.map(({ recipe, score, provenance }) => [recipe.id, score, provenance])).toEqual([
      ['web-dessert-0', 1, 'discovered']
    ]);
    expect(discovery.discover).toHaveBeenCalledWith('dessert', expect.objectContaining({ restrictions: ['vegan'] }));
    expect(events).toEqual([
      {
        stage: RunStage.DISCOVERING,
        status: 'started',
        category: 'dessert',
        payload: { message: 'No dessert in the corpus fits, searching the web', data: undefined }
      },
      {
        stage: RunStage.DISCOVERING,
        status: 'succeeded',
        category: 'dessert',
        payload: { message: 'Found 1 dessert recipes on the web', data: { count: 1 } }
      }
    ]);
  });

  it('should keep web recipes that mention nuts away from a nut allergy', async () => {
    const discovery = new DiscoveryAgent(
      new FakeWebSearch([
        { title: 'Mixed Nut Brittle', snippet: 'Crunchy caramel packed with toasted nuts' },
        { title: 'Nutmeg Custard Tart', snippet: 'Nut-free and lightly spiced' },
        { title: 'Coconut Panna Cotta', snippet: 'Set with agar' }
      ])
    );

    const candidates = await desserts.retrieve(makeRequirements({ allergens: ['nuts'] }), 5, {
      corpus: new RecipeCorpus([]),
      discovery,
      timeoutMs: 1000
    });

    expect(candidates.map(({ recipe }) => [recipe.name, recipe.allergens])).toEqual([
      ['Nutmeg Custard Tart', ['eggs']],
      ['Coconut Panna Cotta', []]
    ]);
  });

  it('should keep meat dishes described as "not vegan" away from vegans', async () => {
    const discovery = new DiscoveryAgent(
      new FakeWebSearch([
        { title: 'Beef Wellington', snippet: 'Not vegan or vegetarian: beef fillet in pastry' },
        { title: 'Vegan Lentil Pie', snippet: 'A hearty plant-based pie' }
      ])
    );

    const candidates = await desserts.retrieve(makeRequirements({ restrictions: ['vegan'] }), 5, {
      corpus: new RecipeCorpus([]),
      discovery,
      timeoutMs: 1000
    });

    expect(candidates.map(({ recipe }) => [recipe.id, recipe.dietaryTags])).toEqual([
      ['web-dessert-1', ['vegan', 'vegetarian']]
    ]);
  });

  it('should return nothing when discovery fails', async () => {
    const events: ProgressEvent[] = [];

    const candidates = await desserts.retrieve(makeRequirements(), 5, {
      corpus: new RecipeCorpus([]),
      discovery: createDiscovery(new Error('search down')),
      timeoutMs: 1000,
      onProgress: event => events.push(event)
    });

    expect(candidates).toEqual([]);
    expect(events.map(event => [event.stage, event.status, event.payload.message])).toEqual([
      [RunStage.DISCOVERING, 'started', 'No dessert in the corpus fits, searching the web'],
      [RunStage.DISCOVERING, 'failed', 'Web search for dessert failed']
    ]);
  });
});

describe('compareCandidates', () => {
  it('should order by score, then tradition, then provenance, then id', () => {
    const modern = makeCandidate(makeRecipe({ id: 'b', category: 'dessert' }), 0.5);
    const classic = makeCandidate(makeRecipe({ id: 'c', category: 'dessert', traditional: true }), 0.5);
    const found = makeCandidate(makeRecipe({ id: 'a', category: 'dessert' }), 0.5, 'discovered');
    const best = makeCandidate(makeRecipe({ id: 'z', category: 'dessert' }), 0.9);
    const twin = makeCandidate(makeRecipe({ id: 'd', category: 'dessert' }), 0.5);

    const sorted = [found, twin, modern, classic, best].sort(compareCandidates);

    expect(sorted.map(candidate => candidate.recipe.id)).toEqual(['z', 'c', 'b', 'd', 'a']);
  });
});

describe('createCategoryRetrievers', () => {
  it('should create one retriever per course', () => {
    const retrievers = createCategoryRetrievers();

    expect(Object.keys(retrievers)).toEqual(['appetizer', 'main_dish', 'second_course', 'dessert']);
    expect(retrievers.main_dish.profile.label).toBe('Main dish');
  });
});
