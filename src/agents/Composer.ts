import type {
  Candidate,
  CategoryCandidates,
  LanguageModel,
  Menu,
  MenuDraft,
  RecipeCategory,
  RequirementSet,
  ToolDefinition,
  UnavailableCourse
} from '../types';
import { RECIPE_CATEGORIES, UNSPECIFIED_GUESTS } from '../types';
import { withTimeout } from '../lib/async';
import { describeLimits, describeRestrictions } from '../lib/ConversationState';
import { CompositionError, describeError } from '../lib/errors';
import { limitViolation } from '../lib/filters';
import { createLogger } from '../lib/logger';
import { MenuNotesSchema } from '../lib/schemas';
import { COURSE_PROFILES } from './CategoryRetriever';

const logger = createLogger('Composer');

export interface ComposerOptions {
  planningInterval: number;
  maxPlanningRounds: number;
  defaultPartySize: number;
  /** Maximum number of courses that may contain a given allergen. */
  courseAllergenLimits: Record<string, number>;
  timeoutMs: number;
}

/**
 * Hooks the Coordinator hands to `planWithAgents`. They run the same
 * retrieval stage and stage checks the relayed path uses.
 */
export interface AgentDispatch {
  retrieveAll(requirements: RequirementSet): Promise<CategoryCandidates>;
  beforeCompose(): void;
}

export interface Violation {
  category: RecipeCategory;
  recipeId: string;
  reason: string;
}

const MENU_NOTES_TOOL: ToolDefinition = {
  name: 'record_menu_notes',
  description: 'Record drink pairings and serving notes for the finished menu.',
  parameters: MenuNotesSchema
};

function emptyCourses(): CategoryCandidates {
  return { appetizer: [], main_dish: [], second_course: [], dessert: [] };
}

function mainIngredient(candidate: Candidate): string | undefined {
  return candidate.recipe.ingredients[0]?.trim().toLowerCase();
}

function totalMinutes(candidate: Candidate): number {
  return (candidate.recipe.prepTimeMinutes ?? 0) + (candidate.recipe.cookTimeMinutes ?? 0);
}

/** Picks per category for a party of the given size. */
export function courseSlots(partySize: number): Record<RecipeCategory, number> {
  return {
    appetizer: partySize > 8 ? 2 : 1,
    main_dish: 1,
    second_course: 1,
    dessert: 1
  };
}

export function buildShoppingList(courses: CategoryCandidates): string[] {
  const items = new Set<string>();
  for (const category of RECIPE_CATEGORIES) {
    for (const candidate of courses[category]) {
      candidate.recipe.ingredients.forEach(ingredient => {
        const item = ingredient.trim().toLowerCase();
        if (item) items.add(item);
      });
    }
  }
  return Array.from(items).sort();
}

/** Longest total cooking time first, so the slowest dish is started earliest. */
export function buildTimeline(courses: CategoryCandidates): string[] {
  return RECIPE_CATEGORIES.flatMap(category => courses[category])
    .sort((a, b) => totalMinutes(b) - totalMinutes(a) || a.recipe.name.localeCompare(b.recipe.name))
    .map(candidate => `${totalMinutes(candidate)} min before serving: start ${candidate.recipe.name}`);
}

function freezeMenu(menu: Menu): Menu {
  const courses = emptyCourses();
  for (const category of RECIPE_CATEGORIES) {
    courses[category] = [...menu.courses[category]];
    Object.freeze(courses[category]);
  }
  return Object.freeze({
    ...menu,
    courses: Object.freeze(courses),
    unavailable: Object.freeze(menu.unavailable.map(entry => Object.freeze({ ...entry }))),
    pairingNotes: Object.freeze([...menu.pairingNotes]),
    timeline: Object.freeze([...menu.timeline]),
    shoppingList: Object.freeze([...menu.shoppingList])
  });
}

export class Composer {
  private readonly options: ComposerOptions;

  constructor(
    private readonly model?: LanguageModel,
    options: Partial<ComposerOptions> = {}
  ) {
    this.options = {
      planningInterval: 3,
      maxPlanningRounds: 10,
      defaultPartySize: 6,
      courseAllergenLimits: { nuts: 1 },
      timeoutMs: 30000,
      ...options
    };
  }

  /** Native dispatch: the Composer asks for the candidates itself, then composes. */
  async planWithAgents(requirements: RequirementSet, dispatch: AgentDispatch): Promise<Menu> {
    const candidates = await dispatch.retrieveAll(requirements);
    dispatch.beforeCompose();
    return this.compose(requirements, candidates);
  }

  async compose(requirements: RequirementSet, candidates: CategoryCandidates): Promise<Menu> {
    const partySize =
      requirements.guestCount === UNSPECIFIED_GUESTS ? this.options.defaultPartySize : requirements.guestCount;
    const slots = courseSlots(partySize);

    // Per category, the ids already placed or rejected; candidates are drawn in rank order.
    const tried: Record<RecipeCategory, Set<string>> = {
      appetizer: new Set(),
      main_dish: new Set(),
      second_course: new Set(),
      dessert: new Set()
    };
    const draft: MenuDraft = { courses: emptyCourses(), unavailable: {}, pairingNotes: [], timeline: [], shoppingList: [] };

    const nextCandidate = (category: RecipeCategory, accept: (candidate: Candidate) => boolean = () => true) => {
      const next = candidates[category].find(candidate => !tried[category].has(candidate.recipe.id) && accept(candidate));
      if (next) tried[category].add(next.recipe.id);
      return next;
    };

    let rounds = 0;
    let violations: Violation[] = [];

    while (rounds < this.options.maxPlanningRounds) {
      rounds += 1;

      this.fillSlots(draft, slots, candidates, nextCandidate);

      if (rounds % this.options.planningInterval === 0) {
        this.revise(draft, violations, nextCandidate);
        this.fillSlots(draft, slots, candidates, nextCandidate);
      }

      violations = this.checkRules(draft.courses, requirements);
      draft.shoppingList = buildShoppingList(draft.courses);
      draft.timeline = buildTimeline(draft.courses);

      logger.debug(`Round ${rounds}: ${violations.length} violations`);

      if (violations.length === 0 && this.isComplete(draft)) {
        break;
      }
    }

    if (violations.length > 0) {
      logger.warn(`Stopping after ${rounds} rounds with ${violations.length} unresolved violations; dropping those picks`);
      this.stripViolations(draft, violations);
    }

    const picked = RECIPE_CATEGORIES.reduce((sum, category) => sum + draft.courses[category].length, 0);
    if (picked === 0) {
      throw new CompositionError('No course could be planned: every category came back without a usable recipe');
    }

    draft.pairingNotes = await this.writeNotes(draft, requirements, partySize);

    const unavailable: UnavailableCourse[] = RECIPE_CATEGORIES.filter(
      category => draft.courses[category].length === 0
    ).map(category => ({
      category,
      reason: draft.unavailable[category] ?? 'No compliant recipe found'
    }));

    return freezeMenu({
      title: `Dinner for ${partySize}`,
      guestCount: partySize,
      courses: draft.courses,
      unavailable,
      pairingNotes: draft.pairingNotes,
      timeline: draft.timeline,
      shoppingList: draft.shoppingList,
      rounds
    });
  }

  /** Cross-course hard rules over the combined selection. */
  checkRules(courses: CategoryCandidates, requirements: RequirementSet): Violation[] {
    const violations: Violation[] = [];
    const seen = new Set<string>();
    const allergenCounts: Record<string, number> = {};

    for (const category of RECIPE_CATEGORIES) {
      for (const { recipe } of courses[category]) {
        const flag = (reason: string) => violations.push({ category, recipeId: recipe.id, reason });

        if (seen.has(recipe.id)) {
          flag(`${recipe.name} is already on the menu`);
          continue;
        }
        seen.add(recipe.id);

        const excluded = recipe.allergens.filter(allergen => requirements.allergens.includes(allergen));
        if (excluded.length > 0) {
          flag(`${recipe.name} contains ${excluded.join(', ')}`);
          continue;
        }

        const missing = requirements.restrictions.filter(tag => !recipe.dietaryTags.includes(tag));
        if (missing.length > 0) {
          flag(`${recipe.name} is not ${missing.join(', ')}`);
          continue;
        }

        const tooMuch = limitViolation(recipe, requirements);
        if (tooMuch) {
          flag(`${recipe.name} ${tooMuch}`);
          continue;
        }

        const overLimit = recipe.allergens.filter(allergen => {
          const limit = this.options.courseAllergenLimits[allergen];
          return limit !== undefined && (allergenCounts[allergen] ?? 0) + 1 > limit;
        });
        if (overLimit.length > 0) {
          flag(`${recipe.name} would put ${overLimit.join(', ')} in too many courses`);
          continue;
        }
        recipe.allergens.forEach(allergen => {
          allergenCounts[allergen] = (allergenCounts[allergen] ?? 0) + 1;
        });
      }
    }

    return violations;
  }

  private isComplete(draft: MenuDraft): boolean {
    return RECIPE_CATEGORIES.every(
      category => draft.courses[category].length > 0 || draft.unavailable[category] !== undefined
    );
  }

  private fillSlots(
    draft: MenuDraft,
    slots: Record<RecipeCategory, number>,
    candidates: CategoryCandidates,
    nextCandidate: (category: RecipeCategory) => Candidate | undefined
  ): void {
    for (const category of RECIPE_CATEGORIES) {
      if (draft.unavailable[category] !== undefined) continue;

      while (draft.courses[category].length < slots[category]) {
        const next = nextCandidate(category);
        if (!next) break;
        draft.courses[category].push(next);
      }

      if (draft.courses[category].length === 0) {
        draft.unavailable[category] =
          candidates[category].length === 0
            ? `No compliant ${COURSE_PROFILES[category].label.toLowerCase()} recipe found`
            : `Every ${COURSE_PROFILES[category].label.toLowerCase()} candidate breaks the menu rules`;
      }
    }
  }

  /**
   * Balance review: swaps out picks that break a rule, then picks that repeat
   * the main ingredient of an earlier course when another candidate avoids it.
   */
  private revise(
    draft: MenuDraft,
    violations: readonly Violation[],
    nextCandidate: (category: RecipeCategory, accept?: (candidate: Candidate) => boolean) => Candidate | undefined
  ): void {
    for (const violation of violations) {
      const picks = draft.courses[violation.category];
      const index = picks.findIndex(candidate => candidate.recipe.id === violation.recipeId);
      if (index < 0) continue;

      const replacement = nextCandidate(violation.category);
      if (replacement) {
        logger.info(`Replacing ${violation.recipeId} with ${replacement.recipe.id}: ${violation.reason}`);
        picks[index] = replacement;
      } else {
        picks.splice(index, 1);
        if (picks.length === 0) {
          draft.unavailable[violation.category] = violation.reason;
        }
      }
    }

    const usedIngredients = new Set<string>();
    for (const category of RECIPE_CATEGORIES) {
      const picks = draft.courses[category];
      picks.forEach((candidate, index) => {
        const ingredient = mainIngredient(candidate);
        if (ingredient && usedIngredients.has(ingredient)) {
          const replacement = nextCandidate(category, other => {
            const otherIngredient = mainIngredient(other);
            return otherIngredient === undefined || !usedIngredients.has(otherIngredient);
          });
          if (replacement) {
            logger.info(`Replacing ${candidate.recipe.id} with ${replacement.recipe.id}: ${ingredient} repeats`);
            picks[index] = replacement;
          }
        }
        const kept = mainIngredient(picks[index] ?? candidate);
        if (kept) usedIngredients.add(kept);
      });
    }
  }

  private stripViolations(draft: MenuDraft, violations: readonly Violation[]): void {
    for (const violation of violations) {
      const picks = draft.courses[violation.category].filter(candidate => candidate.recipe.id !== violation.recipeId);
      draft.courses[violation.category] = picks;
      if (picks.length === 0) {
        draft.unavailable[violation.category] = violation.reason;
      }
    }
    draft.shoppingList = buildShoppingList(draft.courses);
    draft.timeline = buildTimeline(draft.courses);
  }

  private async writeNotes(
    draft: MenuDraft,
    requirements: RequirementSet,
    partySize: number
  ): Promise<string[]> {
    if (!this.model) {
      return this.fallbackNotes(draft);
    }

    try {
      const response = await withTimeout(
        this.model.complete(
          { system: this.getSystemPrompt(), prompt: this.buildNotesPrompt(draft, requirements, partySize) },
          [MENU_NOTES_TOOL],
          'forced-first-call'
        ),
        this.options.timeoutMs,
        'Menu notes'
      );

      const call = response.toolCalls.find(candidate => candidate.toolName === MENU_NOTES_TOOL.name);
      const parsed = MenuNotesSchema.safeParse(call?.args);
      if (parsed.success) {
        return parsed.data.pairingNotes;
      }
      logger.warn('Model returned no usable menu notes, using the default ones');
    } catch (error) {
      logger.warn('Error writing menu notes, using the default ones:', describeError(error).message);
    }

    return this.fallbackNotes(draft);
  }

  fallbackNotes(draft: MenuDraft): string[] {
    const notes: string[] = [];
    const names = (category: RecipeCategory) => draft.courses[category].map(candidate => candidate.recipe.name);

    const appetizers = names('appetizer');
    if (appetizers.length > 0) {
      notes.push(`Serve ${appetizers.join(' and ')} with sparkling wine as guests arrive.`);
    }

    const [second] = draft.courses.second_course;
    if (second) {
      const seafood = second.recipe.allergens.some(allergen => allergen === 'fish' || allergen === 'shellfish');
      notes.push(
        seafood
          ? `Pair ${second.recipe.name} with a crisp white wine.`
          : `Pair ${second.recipe.name} with a medium-bodied red wine.`
      );
    }

    const desserts = names('dessert');
    if (desserts.length > 0) {
      notes.push(`Finish with ${desserts.join(' and ')} and coffee.`);
    }

    return notes;
  }

  private getSystemPrompt(): string {
    return `You are a head chef and sommelier finishing a dinner party menu. The dishes are already chosen; do not change them.

Write short, practical notes:
1. A drink pairing for each course
2. Serving order and timing tips
3. A reminder for any dietary need the host mentioned

Record the notes with the record_menu_notes tool.`;
  }

  private buildNotesPrompt(draft: MenuDraft, requirements: RequirementSet, partySize: number): string {
    const lines = RECIPE_CATEGORIES.map(category => {
      const picks = draft.courses[category];
      const label = COURSE_PROFILES[category].label;
      return picks.length > 0
        ? `- ${label}: ${picks.map(candidate => candidate.recipe.name).join(', ')}`
        : `- ${label}: not available`;
    });

    return `Menu for ${partySize} guests:
${lines.join('\n')}

Dietary restrictions: ${describeRestrictions(requirements) || 'none'}
Allergens excluded: ${requirements.allergens.join(', ') || 'none'}
Cooking limits: ${describeLimits(requirements).join(', ') || 'none'}
Host notes: ${requirements.notes.join('; ') || 'none'}`;
  }
}
