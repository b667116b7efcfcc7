import type {
  Candidate,
  ProgressEvent,
  Recipe,
  RecipeCategory,
  RequirementSet,
  Retriever,
  ScoredRecipe,
  SoftPreferences
} from '../types';
import { RunStage } from '../types';
import { withTimeout } from '../lib/async';
import { describeError, RetrievalDegradedError } from '../lib/errors';
import { buildHardFilters, hardFilterViolation } from '../lib/filters';
import { tokenize } from '../lib/KnowledgeBase';
import { createLogger } from '../lib/logger';
import type { Discoverer } from './DiscoveryAgent';

const logger = createLogger('CategoryRetriever');

export interface CourseProfile {
  category: RecipeCategory;
  label: string;
  searchHint: string;
  /** How many candidates the Composer usually wants to look at. */
  recommendedCount: number;
}

export const COURSE_PROFILES: Record<RecipeCategory, CourseProfile> = {
  appetizer: {
    category: 'appetizer',
    label: 'Appetizer',
    searchHint: 'light starter finger food to share',
    recommendedCount: 3
  },
  main_dish: {
    category: 'main_dish',
    label: 'Main dish',
    searchHint: 'hearty pasta risotto or baked main course',
    recommendedCount: 2
  },
  second_course: {
    category: 'second_course',
    label: 'Second course',
    searchHint: 'roast meat fish or vegetable centrepiece',
    recommendedCount: 2
  },
  dessert: {
    category: 'dessert',
    label: 'Dessert',
    searchHint: 'sweet dessert cake tart or mousse',
    recommendedCount: 2
  }
};

export interface RetrievalContext {
  /** Corpus snapshot taken when the run started. */
  corpus: Retriever;
  discovery?: Discoverer;
  timeoutMs: number;
  onProgress?: (event: ProgressEvent) => void;
}

const TRADITION_BONUS = 0.5;
const NOTE_KEYWORD_BONUS = 0.25;

function round(score: number): number {
  return Math.round(score * 10000) / 10000;
}

export function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.recipe.traditional !== b.recipe.traditional) return a.recipe.traditional ? -1 : 1;
  if (a.provenance !== b.provenance) return a.provenance === 'retrieved' ? -1 : 1;
  return a.recipe.id.localeCompare(b.recipe.id);
}

export class CategoryRetriever {
  constructor(public readonly profile: CourseProfile) {}

  get category(): RecipeCategory {
    return this.profile.category;
  }

  buildQuery(requirements: RequirementSet): string {
    return [
      this.profile.searchHint,
      ...requirements.restrictions.map(restriction => restriction.replace('_', ' ')),
      ...requirements.notes
    ].join(' ');
  }

  /** Backend relevance plus the soft-preference bonuses; never excludes anything. */
  softScore(recipe: Recipe, relevance: number, soft: SoftPreferences): number {
    let score = relevance;
    if (soft.preferTraditional && recipe.traditional) {
      score += TRADITION_BONUS;
    }

    const recipeTokens = new Set(tokenize([recipe.name, recipe.description, ...recipe.ingredients].join(' ')));
    const noteKeywords = new Set(soft.notes.flatMap(note => tokenize(note)));
    noteKeywords.forEach(keyword => {
      if (recipeTokens.has(keyword)) score += NOTE_KEYWORD_BONUS;
    });

    return round(score);
  }

  /**
   * Up to `k` candidates that satisfy every hard filter, best first. An empty
   * list is a normal answer. Throws RetrievalDegradedError when the backend
   * fails or times out.
   */
  async retrieve(requirements: RequirementSet, k: number, context: RetrievalContext): Promise<Candidate[]> {
    const hardFilters = buildHardFilters(this.category, requirements);
    const soft: SoftPreferences = { preferTraditional: requirements.preferTraditional, notes: requirements.notes };

    let found: ScoredRecipe[];
    try {
      found = await withTimeout(
        context.corpus.search(this.buildQuery(requirements), hardFilters, soft, k),
        context.timeoutMs,
        `${this.profile.label} retrieval`
      );
    } catch (error) {
      throw new RetrievalDegradedError(
        this.category,
        `${this.profile.label} retrieval failed: ${describeError(error).message}`,
        error
      );
    }

    const candidates: Candidate[] = [];
    for (const { recipe, score } of found) {
      const violation = hardFilterViolation(recipe, hardFilters);
      if (violation) {
        logger.warn(`Backend returned ${recipe.id} which ${violation}; dropped`);
        continue;
      }
      candidates.push({ recipe, score: this.softScore(recipe, score, soft), provenance: 'retrieved' });
    }

    if (candidates.length === 0 && context.discovery) {
      candidates.push(...(await this.discover(requirements, context)));
    }

    return candidates.sort(compareCandidates).slice(0, k);
  }

  private async discover(requirements: RequirementSet, context: RetrievalContext): Promise<Candidate[]> {
    const hardFilters = buildHardFilters(this.category, requirements);
    const emit = (status: ProgressEvent['status'], message: string, data?: unknown) =>
      context.onProgress?.({ stage: RunStage.DISCOVERING, status, category: this.category, payload: { message, data } });

    emit('started', `No ${this.profile.label.toLowerCase()} in the corpus fits, searching the web`);

    let discovered: Candidate[];
    try {
      discovered = context.discovery ? await context.discovery.discover(this.category, requirements) : [];
    } catch (error) {
      logger.warn(`Discovery for ${this.category} failed:`, describeError(error).message);
      emit('failed', `Web search for ${this.profile.label.toLowerCase()} failed`, describeError(error));
      return [];
    }

    const compliant = discovered.filter(candidate => hardFilterViolation(candidate.recipe, hardFilters) === undefined);
    if (compliant.length < discovered.length) {
      logger.info(`Dropped ${discovered.length - compliant.length} discovered ${this.category} recipes that break the filters`);
    }

    emit('succeeded', `Found ${compliant.length} ${this.profile.label.toLowerCase()} recipes on the web`, {
      count: compliant.length
    });

    return compliant.map((candidate): Candidate => ({ ...candidate, provenance: 'discovered' }));
  }
}

export function createCategoryRetrievers(
  profiles: Record<RecipeCategory, CourseProfile> = COURSE_PROFILES
): Record<RecipeCategory, CategoryRetriever> {
  return {
    appetizer: new CategoryRetriever(profiles.appetizer),
    main_dish: new CategoryRetriever(profiles.main_dish),
    second_course: new CategoryRetriever(profiles.second_course),
    dessert: new CategoryRetriever(profiles.dessert)
  };
}
