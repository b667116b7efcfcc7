import type { Difficulty, HardFilters, Recipe, RecipeCategory, RecipeLimits, RequirementSet } from '../types';

const DIFFICULTY_RANK: Record<Difficulty, number> = { easy: 0, medium: 1, hard: 2 };

export function buildHardFilters(category: RecipeCategory, requirements: RequirementSet): HardFilters {
  return {
    category,
    requiredTags: requirements.restrictions,
    excludedAllergens: requirements.allergens,
    maxDifficulty: requirements.maxDifficulty,
    maxPrepTimeMinutes: requirements.maxPrepTimeMinutes,
    maxCookTimeMinutes: requirements.maxCookTimeMinutes
  };
}

/** Returns why the recipe goes over a difficulty or time limit, or undefined. */
export function limitViolation(recipe: Recipe, limits: RecipeLimits): string | undefined {
  if (limits.maxDifficulty && DIFFICULTY_RANK[recipe.difficulty] > DIFFICULTY_RANK[limits.maxDifficulty]) {
    return `is ${recipe.difficulty}, harder than ${limits.maxDifficulty}`;
  }

  const { prepTimeMinutes, cookTimeMinutes } = recipe;
  if (limits.maxPrepTimeMinutes !== undefined && prepTimeMinutes !== undefined && prepTimeMinutes > limits.maxPrepTimeMinutes) {
    return `takes ${prepTimeMinutes} min to prepare, over ${limits.maxPrepTimeMinutes}`;
  }
  if (limits.maxCookTimeMinutes !== undefined && cookTimeMinutes !== undefined && cookTimeMinutes > limits.maxCookTimeMinutes) {
    return `takes ${cookTimeMinutes} min to cook, over ${limits.maxCookTimeMinutes}`;
  }

  return undefined;
}

/** Returns why the recipe breaks the hard filters, or undefined when it complies. */
export function hardFilterViolation(recipe: Recipe, filters: HardFilters): string | undefined {
  if (recipe.category !== filters.category) {
    return `belongs to ${recipe.category}, not ${filters.category}`;
  }

  const missing = filters.requiredTags.filter(tag => !recipe.dietaryTags.includes(tag));
  if (missing.length > 0) {
    return `is not ${missing.join(', ')}`;
  }

  const allergens = new Set(recipe.allergens.map(allergen => allergen.toLowerCase()));
  const present = filters.excludedAllergens.filter(allergen => allergens.has(allergen.toLowerCase()));
  if (present.length > 0) {
    return `contains ${present.join(', ')}`;
  }

  return limitViolation(recipe, filters);
}

export function satisfiesHardFilters(recipe: Recipe, filters: HardFilters): boolean {
  return hardFilterViolation(recipe, filters) === undefined;
}
