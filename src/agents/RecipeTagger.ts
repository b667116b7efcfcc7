import { generateObject, type LanguageModel as SdkLanguageModel } from 'ai';
import type { DietaryRestriction, Difficulty, RawRecipe } from '../types';
import { createLogger } from '../lib/logger';
import { RecipeRecord, RecipeTags, RecipeTagsSchema } from '../lib/schemas';
import { AllergenKeywords, DEFAULT_ALLERGEN_KEYWORDS, inferAllergens, MEAT_AND_FISH } from './DiscoveryAgent';

const logger = createLogger('RecipeTagger');

export interface RecipeTaggerOptions {
  batchSize: number;
  requestDelayMs: number;
  temperature: number;
}

/** Keyword-based tags used when no model is configured or the model call fails. */
export function inferTags(recipe: RawRecipe, keywords: AllergenKeywords = DEFAULT_ALLERGEN_KEYWORDS): RecipeTags {
  const text = recipe.ingredients.join('\n').toLowerCase();
  const allergens = inferAllergens(text, keywords);
  const has = (allergen: string) => allergens.includes(allergen);

  const dietaryTags: DietaryRestriction[] = [];
  const vegetarian = !MEAT_AND_FISH.some(word => text.includes(word));
  if (vegetarian && !has('dairy') && !has('eggs') && !text.includes('honey')) dietaryTags.push('vegan');
  if (vegetarian) dietaryTags.push('vegetarian');
  if (!has('gluten') && !has('wheat')) dietaryTags.push('gluten_free');
  if (!has('dairy')) dietaryTags.push('dairy_free');
  if (!has('nuts') && !has('peanuts')) dietaryTags.push('nut_free');

  return {
    dietaryTags,
    allergens,
    difficulty: estimateDifficulty(recipe),
    traditional: recipe.traditional ?? false
  };
}

export function estimateDifficulty(recipe: RawRecipe): Difficulty {
  const steps = recipe.instructions.length;
  const minutes = (recipe.prepTimeMinutes ?? 0) + (recipe.cookTimeMinutes ?? 0);
  if (steps > 6 || minutes > 150) return 'hard';
  if (steps > 3 || minutes > 60) return 'medium';
  return 'easy';
}

export function toRecipeRecord(recipe: RawRecipe, tags: RecipeTags): RecipeRecord {
  return {
    id: recipe.id,
    name: recipe.name,
    description: recipe.description,
    category: recipe.category,
    dietaryTags: tags.dietaryTags,
    allergens: tags.allergens.map(allergen => allergen.toLowerCase()),
    traditional: recipe.traditional ?? tags.traditional,
    ingredients: recipe.ingredients,
    instructions: recipe.instructions,
    servings: recipe.servings ?? 4,
    prepTimeMinutes: recipe.prepTimeMinutes,
    cookTimeMinutes: recipe.cookTimeMinutes,
    difficulty: tags.difficulty,
    sourceHash: recipe.contentHash
  };
}

export class RecipeTagger {
  private readonly options: RecipeTaggerOptions;

  constructor(
    private readonly model?: SdkLanguageModel,
    options: Partial<RecipeTaggerOptions> = {}
  ) {
    this.options = { batchSize: 10, requestDelayMs: 1000, temperature: 0.2, ...options };
  }

  async tagRecipe(recipe: RawRecipe): Promise<RecipeRecord> {
    if (!this.model) {
      return toRecipeRecord(recipe, inferTags(recipe));
    }

    try {
      logger.info(`Tagging recipe: ${recipe.name}`);
      const result = await generateObject({
        model: this.model,
        system: this.getSystemPrompt(),
        prompt: this.buildPrompt(recipe),
        schema: RecipeTagsSchema,
        temperature: this.options.temperature
      });
      return toRecipeRecord(recipe, result.object);
    } catch (error) {
      logger.warn(`Applying fallback tags for ${recipe.name}:`, error instanceof Error ? error.message : error);
      return toRecipeRecord(recipe, inferTags(recipe));
    }
  }

  /** Re-tags only recipes whose markdown changed since the last build. */
  async tagRecipesIncremental(
    recipes: RawRecipe[],
    existing: Record<string, RecipeRecord> = {}
  ): Promise<RecipeRecord[]> {
    const records: RecipeRecord[] = [];
    let modelCalls = 0;

    for (const recipe of recipes) {
      const previous = existing[recipe.id];
      if (previous && previous.sourceHash === recipe.contentHash) {
        logger.debug(`Skipping unchanged recipe: ${recipe.name}`);
        records.push(previous);
        continue;
      }

      records.push(await this.tagRecipe(recipe));
      if (this.model) {
        modelCalls++;
        if (modelCalls % this.options.batchSize === 0) {
          logger.info(`Tagged ${modelCalls} recipes, pausing...`);
          await new Promise(resolve => setTimeout(resolve, this.options.requestDelayMs));
        }
      }
    }

    logger.info(`Total model calls made: ${modelCalls}`);
    return records;
  }

  private getSystemPrompt(): string {
    return `You are a meticulous recipe editor. Classify recipes for a dinner party planner.
Only claim a dietary tag when every ingredient allows it. List every allergen an ingredient implies, using lower-case names such as nuts, peanuts, sesame, dairy, eggs, fish, shellfish, gluten, wheat, soy.`;
  }

  private buildPrompt(recipe: RawRecipe): string {
    return `Recipe: ${recipe.name}
Course: ${recipe.category}
Description: ${recipe.description || 'not provided'}

Ingredients:
${recipe.ingredients.map(ingredient => `- ${ingredient}`).join('\n') || 'not provided'}

Instructions:
${recipe.instructions.map((step, index) => `${index + 1}. ${step}`).join('\n') || 'not provided'}

Extract:
- dietaryTags: any of [vegan, vegetarian, gluten_free, dairy_free, nut_free]
- allergens: allergens present in the ingredients
- difficulty: easy, medium or hard for a home cook
- traditional: true when this is a classic festive dish`;
  }
}
