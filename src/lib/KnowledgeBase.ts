import * as fs from 'fs/promises';
import type {
  CorpusSource,
  HardFilters,
  Recipe,
  RecipeCategory,
  RecipeSource,
  Retriever,
  ScoredRecipe,
  SoftPreferences
} from '../types';
import { satisfiesHardFilters } from './filters';
import { createLogger } from './logger';
import { RecipeRecordSchema } from './schemas';

const logger = createLogger('KnowledgeBase');

export interface CorpusStatistics {
  totalRecipes: number;
  categories: Record<RecipeCategory, number>;
  dietaryTags: Record<string, number>;
  allergens: Record<string, number>;
  traditional: number;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(token => token.length > 2);
}

function recipeText(recipe: Recipe): string {
  return [recipe.name, recipe.description, ...recipe.ingredients].join(' ');
}

/**
 * Immutable in-memory corpus. Hard filters are applied here, on the backend
 * side, before anything is ranked.
 */
export class RecipeCorpus implements Retriever {
  private readonly byId: ReadonlyMap<string, Recipe>;
  private readonly tokens: ReadonlyMap<string, ReadonlySet<string>>;

  constructor(recipes: readonly Recipe[]) {
    const byId = new Map<string, Recipe>();
    const tokens = new Map<string, ReadonlySet<string>>();
    for (const recipe of recipes) {
      if (byId.has(recipe.id)) {
        logger.warn(`Duplicate recipe id ${recipe.id}, keeping the first one`);
        continue;
      }
      byId.set(recipe.id, recipe);
      tokens.set(recipe.id, new Set(tokenize(recipeText(recipe))));
    }
    this.byId = byId;
    this.tokens = tokens;
  }

  get size(): number {
    return this.byId.size;
  }

  get recipes(): Recipe[] {
    return Array.from(this.byId.values());
  }

  getRecipeById(id: string): Recipe | undefined {
    return this.byId.get(id);
  }

  getRecipesByCategory(category: RecipeCategory): Recipe[] {
    return this.recipes.filter(recipe => recipe.category === category);
  }

  /**
   * Relevance is the share of query terms found in the recipe text. Soft
   * preferences are left to the caller, which owns the ranking policy.
   */
  async search(query: string, hardFilters: HardFilters, _soft: SoftPreferences, k: number): Promise<ScoredRecipe[]> {
    const queryTokens = Array.from(new Set(tokenize(query)));

    const scored = this.recipes
      .filter(recipe => satisfiesHardFilters(recipe, hardFilters))
      .map(recipe => {
        const recipeTokens = this.tokens.get(recipe.id);
        const matched = queryTokens.filter(token => recipeTokens?.has(token)).length;
        const score = queryTokens.length === 0 ? 0 : matched / queryTokens.length;
        return { recipe, score: Math.round(score * 10000) / 10000 };
      });

    scored.sort((a, b) => b.score - a.score || a.recipe.id.localeCompare(b.recipe.id));
    return scored.slice(0, Math.max(0, k));
  }
}

/** Parses raw records; invalid ones are skipped and logged. */
export function parseRecipes(records: readonly unknown[]): Recipe[] {
  const recipes: Recipe[] = [];

  records.forEach((record, index) => {
    const parsed = RecipeRecordSchema.safeParse(record);
    if (parsed.success) {
      recipes.push(Object.freeze({ ...parsed.data }));
    } else {
      logger.warn(`Skipping invalid recipe record #${index}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
  });

  return recipes;
}

async function loadRecords(source: CorpusSource): Promise<readonly unknown[]> {
  if (typeof source !== 'string') {
    return source;
  }

  const content = await fs.readFile(source, 'utf-8');
  const data: unknown = JSON.parse(content);
  if (!Array.isArray(data)) {
    throw new Error(`Recipe corpus ${source} must contain a JSON array`);
  }
  return data;
}

/**
 * Owner of the current corpus. Runs take a snapshot when they start;
 * `reload` swaps in a new corpus for later runs only.
 */
export class KnowledgeBase implements RecipeSource {
  private corpus: RecipeCorpus;

  constructor(recipes: readonly Recipe[] = []) {
    this.corpus = new RecipeCorpus(recipes);
  }

  static async fromSource(source: CorpusSource): Promise<KnowledgeBase> {
    const knowledgeBase = new KnowledgeBase();
    await knowledgeBase.reload(source);
    return knowledgeBase;
  }

  snapshot(): RecipeCorpus {
    return this.corpus;
  }

  async reload(source: CorpusSource): Promise<number> {
    const label = typeof source === 'string' ? source : 'in-memory records';
    logger.info(`Loading recipe corpus from ${label}...`);

    let records: readonly unknown[];
    try {
      records = await loadRecords(source);
    } catch (error) {
      throw new Error(`Failed to load recipe corpus: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error
      });
    }

    // Built completely before the swap, so a failed load leaves the old corpus in place.
    const next = new RecipeCorpus(parseRecipes(records));
    this.corpus = next;
    logger.info(`Loaded ${next.size} recipes into memory`);
    return next.size;
  }

  getRecipeById(id: string): Recipe | undefined {
    return this.corpus.getRecipeById(id);
  }

  getRecipesByCategory(category: RecipeCategory): Recipe[] {
    return this.corpus.getRecipesByCategory(category);
  }

  countRecipes(): number {
    return this.corpus.size;
  }

  getStatistics(): CorpusStatistics {
    const categories: Record<RecipeCategory, number> = { appetizer: 0, main_dish: 0, second_course: 0, dessert: 0 };
    const dietaryTags: Record<string, number> = {};
    const allergens: Record<string, number> = {};
    let traditional = 0;

    this.corpus.recipes.forEach(recipe => {
      categories[recipe.category] += 1;
      recipe.dietaryTags.forEach(tag => {
        dietaryTags[tag] = (dietaryTags[tag] || 0) + 1;
      });
      recipe.allergens.forEach(allergen => {
        allergens[allergen] = (allergens[allergen] || 0) + 1;
      });
      if (recipe.traditional) traditional += 1;
    });

    return {
      totalRecipes: this.corpus.size,
      categories,
      dietaryTags,
      allergens,
      traditional
    };
  }
}
