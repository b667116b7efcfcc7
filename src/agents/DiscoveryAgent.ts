import { z } from 'zod';
import type {
  Candidate,
  DietaryRestriction,
  RawSearchResult,
  Recipe,
  RecipeCategory,
  RequirementSet,
  WebSearch
} from '../types';
import { DIETARY_RESTRICTIONS } from '../types';
import { withTimeout } from '../lib/async';
import { describeError, DiscoveryUnavailableError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import allergenKeywordData from '../../data/allergen-keywords.json';

const logger = createLogger('DiscoveryAgent');

/** Allergen name to keyword patterns, each a case-insensitive regular expression. */
export type AllergenKeywords = Record<string, readonly string[]>;

const KeywordPattern = z.string().refine(pattern => {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}, 'not a valid regular expression');

export const DEFAULT_ALLERGEN_KEYWORDS: AllergenKeywords = z
  .record(z.array(KeywordPattern))
  .parse(allergenKeywordData);

export const MEAT_AND_FISH = [
  'beef',
  'pork',
  'lamb',
  'chicken',
  'turkey',
  'duck',
  'veal',
  'ham',
  'bacon',
  'pancetta',
  'sausage',
  'anchovy',
  'gelatine',
  'salmon',
  'tuna',
  'cod',
  'sea bass',
  'prawn',
  'shrimp',
  'clam',
  'mussel',
  'crab',
  'lobster'
];

// "not vegan", "non-vegetarian", "isn't gluten free or dairy free"
const NEGATED = /\b(?:not|non|never|isn't|aren't)\b[\w\s-]{0,20}$/;

const DIETARY_PHRASES: Record<DietaryRestriction, readonly string[]> = {
  vegan: ['vegan', 'plant-based', 'plant based'],
  vegetarian: ['vegetarian', 'meat-free', 'meatless'],
  gluten_free: ['gluten-free', 'gluten free', 'coeliac', 'celiac'],
  dairy_free: ['dairy-free', 'dairy free', 'lactose-free'],
  nut_free: ['nut-free', 'nut free']
};

const CATEGORY_QUERY_TERMS: Record<RecipeCategory, string> = {
  appetizer: 'appetizer starter',
  main_dish: 'main course pasta or risotto',
  second_course: 'roast or fish second course',
  dessert: 'dessert'
};

export interface Discoverer {
  discover(category: RecipeCategory, requirements: RequirementSet): Promise<Candidate[]>;
}

export interface DiscoveryAgentOptions {
  timeoutMs: number;
  maxResults: number;
  allergenKeywords: AllergenKeywords;
}

function cleanTitle(title: string | undefined): string | undefined {
  const name = title?.split(/\s[|–-]\s/)[0]?.trim();
  return name ? name : undefined;
}

/** True when the phrase occurs at least once without a negation just before it. */
function affirms(text: string, phrase: string): boolean {
  let index = text.indexOf(phrase);
  while (index >= 0) {
    if (!NEGATED.test(text.slice(Math.max(0, index - 30), index))) {
      return true;
    }
    index = text.indexOf(phrase, index + phrase.length);
  }
  return false;
}

export function inferDietaryTags(text: string): DietaryRestriction[] {
  const lower = text.toLowerCase();
  const tags = new Set<DietaryRestriction>();
  for (const tag of DIETARY_RESTRICTIONS) {
    if (DIETARY_PHRASES[tag].some(phrase => affirms(lower, phrase))) {
      tags.add(tag);
    }
  }
  if (tags.has('vegan')) {
    tags.add('vegetarian');
  }
  if (MEAT_AND_FISH.some(word => lower.includes(word))) {
    tags.delete('vegan');
    tags.delete('vegetarian');
  }
  return Array.from(tags);
}

export function inferAllergens(text: string, keywords: AllergenKeywords): string[] {
  return Object.entries(keywords)
    .filter(([, patterns]) => patterns.some(pattern => new RegExp(pattern, 'i').test(text)))
    .map(([allergen]) => allergen)
    .sort();
}

/**
 * Looks for new recipes on the web when the corpus has nothing compliant.
 * Every failure of the search backend ends in an empty list.
 */
export class DiscoveryAgent implements Discoverer {
  private readonly options: DiscoveryAgentOptions;

  constructor(
    private readonly search: WebSearch,
    options: Partial<DiscoveryAgentOptions> = {}
  ) {
    this.options = {
      timeoutMs: 10000,
      maxResults: 5,
      allergenKeywords: DEFAULT_ALLERGEN_KEYWORDS,
      ...options
    };
  }

  buildQuery(category: RecipeCategory, requirements: RequirementSet): string {
    const parts = [
      ...requirements.restrictions.map(restriction => restriction.replace('_', '-')),
      CATEGORY_QUERY_TERMS[category],
      'recipe'
    ];
    if (requirements.allergens.length > 0) {
      parts.push(`without ${requirements.allergens.join(' ')}`);
    }
    return parts.join(' ');
  }

  async discover(category: RecipeCategory, requirements: RequirementSet): Promise<Candidate[]> {
    const query = this.buildQuery(category, requirements);
    logger.info(`Searching the web for ${category}: "${query}"`);

    let results: RawSearchResult[];
    try {
      results = await withTimeout(this.search.lookup(query), this.options.timeoutMs, 'Web search');
    } catch (error) {
      const unavailable = new DiscoveryUnavailableError(`Discovery for ${category} failed: ${describeError(error).message}`, error);
      logger.warn(unavailable.message);
      return [];
    }

    if (results.length === 0) {
      logger.info(`Web search returned nothing for ${category}`);
      return [];
    }

    return this.normalize(category, results.slice(0, this.options.maxResults));
  }

  normalize(category: RecipeCategory, results: readonly RawSearchResult[]): Candidate[] {
    const candidates: Candidate[] = [];

    results.forEach((result, index) => {
      const name = cleanTitle(result.title);
      if (!name) {
        logger.debug(`Dropping web result #${index} without a usable name`, result.url ?? '');
        return;
      }

      const n = candidates.length;
      const text = `${result.title ?? ''} ${result.snippet ?? ''}`;
      const recipe: Recipe = Object.freeze({
        id: `web-${category}-${n}`,
        name,
        description: result.snippet?.trim() ?? '',
        category,
        dietaryTags: inferDietaryTags(text),
        allergens: inferAllergens(text, this.options.allergenKeywords),
        traditional: false,
        ingredients: [],
        instructions: result.url ? [`Full recipe: ${result.url}`] : [],
        servings: 4,
        difficulty: 'medium'
      });

      candidates.push({
        recipe,
        score: Math.round(Math.max(0.1, 1 - 0.1 * n) * 10000) / 10000,
        provenance: 'discovered'
      });
    });

    return candidates;
  }
}
