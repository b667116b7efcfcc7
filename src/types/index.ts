import type { ZodTypeAny } from 'zod';

export const RECIPE_CATEGORIES = ['appetizer', 'main_dish', 'second_course', 'dessert'] as const;
export type RecipeCategory = (typeof RECIPE_CATEGORIES)[number];

export const DIETARY_RESTRICTIONS = ['vegan', 'vegetarian', 'gluten_free', 'dairy_free', 'nut_free'] as const;
export type DietaryRestriction = (typeof DIETARY_RESTRICTIONS)[number];

export const COMMON_ALLERGENS = [
  'nuts',
  'peanuts',
  'sesame',
  'dairy',
  'eggs',
  'fish',
  'shellfish',
  'gluten',
  'wheat',
  'soy'
] as const;

export type Difficulty = 'easy' | 'medium' | 'hard';

export const UNSPECIFIED_GUESTS = 'unspecified' as const;
export type GuestCount = number | typeof UNSPECIFIED_GUESTS;

export interface Recipe {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly category: RecipeCategory;
  readonly dietaryTags: readonly DietaryRestriction[];
  readonly allergens: readonly string[];
  readonly traditional: boolean;
  readonly ingredients: readonly string[];
  readonly instructions: readonly string[];
  readonly servings: number;
  readonly prepTimeMinutes?: number;
  readonly cookTimeMinutes?: number;
  readonly difficulty: Difficulty;
}

/** A recipe as parsed from its markdown source, before tagging. */
export interface RawRecipe {
  id: string;
  name: string;
  description: string;
  category: RecipeCategory;
  ingredients: string[];
  instructions: string[];
  servings?: number;
  prepTimeMinutes?: number;
  cookTimeMinutes?: number;
  traditional?: boolean;
  sourceFile: string;
  contentHash: string;
}

/**
 * Merged requirements for one planning run. Frozen once handed to the
 * coordinator; only the next extraction turn produces a new one.
 */
export interface RequirementSet {
  readonly guestCount: GuestCount;
  readonly restrictions: readonly DietaryRestriction[];
  readonly restrictionGuests: Readonly<Partial<Record<DietaryRestriction, number>>>;
  readonly allergens: readonly string[];
  readonly preferTraditional: boolean;
  readonly notes: readonly string[];
  readonly maxDifficulty?: Difficulty;
  readonly maxPrepTimeMinutes?: number;
  readonly maxCookTimeMinutes?: number;
}

export type Provenance = 'retrieved' | 'discovered';

export interface Candidate {
  readonly recipe: Recipe;
  readonly score: number;
  readonly provenance: Provenance;
}

export type CategoryCandidates = Record<RecipeCategory, Candidate[]>;

/** Upper bounds on effort; a recipe with no recorded time passes the time limits. */
export interface RecipeLimits {
  maxDifficulty?: Difficulty;
  maxPrepTimeMinutes?: number;
  maxCookTimeMinutes?: number;
}

export interface HardFilters extends RecipeLimits {
  category: RecipeCategory;
  requiredTags: readonly DietaryRestriction[];
  excludedAllergens: readonly string[];
}

export interface SoftPreferences {
  preferTraditional: boolean;
  notes: readonly string[];
}

export interface ScoredRecipe {
  recipe: Recipe;
  score: number;
}

export interface Retriever {
  search(query: string, hardFilters: HardFilters, soft: SoftPreferences, k: number): Promise<ScoredRecipe[]>;
}

export type CorpusSource = string | readonly unknown[];

export interface RecipeSource {
  /** The corpus a new run should read from; later reloads do not affect it. */
  snapshot(): Retriever;
  reload(source: CorpusSource): Promise<number>;
}

export interface RawSearchResult {
  title?: string;
  snippet?: string;
  url?: string;
}

export interface WebSearch {
  lookup(query: string): Promise<RawSearchResult[]>;
}

export type ToolPolicy = 'unrestricted' | 'forced-first-call' | { restrictTo: readonly string[] };

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ZodTypeAny;
}

export interface ToolCall {
  toolName: string;
  args: unknown;
}

export interface ModelRequest {
  system: string;
  prompt: string;
}

export interface ModelResponse {
  text: string;
  toolCalls: ToolCall[];
}

export interface LanguageModel {
  complete(request: ModelRequest, tools: readonly ToolDefinition[], policy: ToolPolicy): Promise<ModelResponse>;
}

export interface UnavailableCourse {
  category: RecipeCategory;
  reason: string;
}

export interface MenuDraft {
  courses: CategoryCandidates;
  unavailable: Partial<Record<RecipeCategory, string>>;
  pairingNotes: string[];
  timeline: string[];
  shoppingList: string[];
}

export interface Menu {
  readonly title: string;
  readonly guestCount: number;
  readonly courses: Readonly<Record<RecipeCategory, readonly Candidate[]>>;
  readonly unavailable: readonly UnavailableCourse[];
  readonly pairingNotes: readonly string[];
  readonly timeline: readonly string[];
  readonly shoppingList: readonly string[];
  readonly rounds: number;
}

export enum RunStage {
  RECEIVED = 'RECEIVED',
  EXTRACTING = 'EXTRACTING',
  RETRIEVING = 'RETRIEVING',
  DISCOVERING = 'DISCOVERING',
  COMPOSING = 'COMPOSING',
  DONE = 'DONE',
  FAILED = 'FAILED'
}

export type ProgressStatus = 'started' | 'succeeded' | 'failed';

export interface ProgressEvent {
  stage: RunStage;
  status: ProgressStatus;
  category?: RecipeCategory;
  payload: {
    message: string;
    data?: unknown;
  };
}

export interface ErrorInfo {
  name: string;
  message: string;
}

export type PlanResult =
  | { status: 'success'; requirements: RequirementSet; menu: Menu; unmet: readonly UnavailableCourse[] }
  | { status: 'partial'; requirements: RequirementSet; menu: Menu; unmet: readonly UnavailableCourse[] }
  | { status: 'failed'; stage: RunStage; error: ErrorInfo }
  | { status: 'cancelled'; stage: RunStage };

export type ExecutionMode = 'sync' | 'stream' | 'async_stream';

export interface Message {
  role: 'user' | 'assistant';
  content: string;
  timestamp: Date;
}
