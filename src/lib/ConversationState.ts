import { DIETARY_RESTRICTIONS, UNSPECIFIED_GUESTS } from '../types';
import type { DietaryRestriction, RecipeLimits, RequirementSet } from '../types';
import { ExtractionError } from './errors';
import { ConversationStateSchema, RequirementDelta, SerializedConversation } from './schemas';

export const EMPTY_REQUIREMENTS: RequirementSet = freezeRequirements({
  guestCount: UNSPECIFIED_GUESTS,
  restrictions: [],
  restrictionGuests: {},
  allergens: [],
  preferTraditional: true,
  notes: []
});

export interface ConversationTurn {
  readonly text: string;
  readonly delta: RequirementDelta;
  readonly requirements: RequirementSet;
}

function freezeRequirements(requirements: RequirementSet): RequirementSet {
  return Object.freeze({
    guestCount: requirements.guestCount,
    restrictions: Object.freeze([...requirements.restrictions]),
    restrictionGuests: Object.freeze({ ...requirements.restrictionGuests }),
    allergens: Object.freeze([...requirements.allergens]),
    preferTraditional: requirements.preferTraditional,
    notes: Object.freeze([...requirements.notes]),
    maxDifficulty: requirements.maxDifficulty,
    maxPrepTimeMinutes: requirements.maxPrepTimeMinutes,
    maxCookTimeMinutes: requirements.maxCookTimeMinutes
  });
}

function sortRestrictions(restrictions: Iterable<DietaryRestriction>): DietaryRestriction[] {
  const present = new Set(restrictions);
  return DIETARY_RESTRICTIONS.filter(restriction => present.has(restriction));
}

/** True when the delta carries no requirement signal at all. */
export function isEmptyDelta(delta: RequirementDelta): boolean {
  return (
    delta.guestCount === undefined &&
    !delta.addRestrictions?.length &&
    !delta.removeRestrictions?.length &&
    Object.keys(delta.restrictionGuests ?? {}).length === 0 &&
    !delta.addAllergens?.length &&
    !delta.removeAllergens?.length &&
    delta.preferTraditional === undefined &&
    !delta.notes?.trim() &&
    delta.maxDifficulty === undefined &&
    delta.maxPrepTimeMinutes === undefined &&
    delta.maxCookTimeMinutes === undefined &&
    !delta.liftLimits
  );
}

/**
 * Scalars are last-stated-wins; restriction and allergen sets are unioned and
 * only shrink through an explicit retraction in the delta. A guest count of
 * zero for a restriction retracts it.
 */
export function mergeRequirements(prior: RequirementSet, delta: RequirementDelta): RequirementSet {
  const restrictions = new Set(prior.restrictions);
  const restrictionGuests: Partial<Record<DietaryRestriction, number>> = { ...prior.restrictionGuests };

  for (const restriction of delta.addRestrictions ?? []) {
    restrictions.add(restriction);
  }
  for (const [restriction, count] of Object.entries(delta.restrictionGuests ?? {})) {
    const known = DIETARY_RESTRICTIONS.find(candidate => candidate === restriction);
    if (!known || count === undefined) continue;
    if (count > 0) {
      restrictionGuests[known] = count;
      restrictions.add(known);
    } else {
      delete restrictionGuests[known];
      restrictions.delete(known);
    }
  }
  for (const restriction of delta.removeRestrictions ?? []) {
    restrictions.delete(restriction);
    delete restrictionGuests[restriction];
  }

  const allergens = new Set(prior.allergens);
  for (const allergen of delta.addAllergens ?? []) {
    allergens.add(allergen.toLowerCase());
  }
  for (const allergen of delta.removeAllergens ?? []) {
    allergens.delete(allergen.toLowerCase());
  }

  const note = delta.notes?.trim();
  const limits: RecipeLimits = delta.liftLimits ? {} : prior;

  return freezeRequirements({
    guestCount: delta.guestCount ?? prior.guestCount,
    restrictions: sortRestrictions(restrictions),
    restrictionGuests,
    allergens: [...allergens].sort(),
    preferTraditional: delta.preferTraditional ?? prior.preferTraditional,
    notes: note ? [...prior.notes, note] : prior.notes,
    maxDifficulty: delta.maxDifficulty ?? limits.maxDifficulty,
    maxPrepTimeMinutes: delta.maxPrepTimeMinutes ?? limits.maxPrepTimeMinutes,
    maxCookTimeMinutes: delta.maxCookTimeMinutes ?? limits.maxCookTimeMinutes
  });
}

function formatRestriction(restriction: DietaryRestriction, guests: number | undefined): string {
  const label = restriction.replace('_', '-');
  if (guests === undefined) return label;
  return `${label} (${guests} ${guests === 1 ? 'guest' : 'guests'})`;
}

/** "vegetarian (2 guests), gluten-free", or an empty string when nothing is restricted. */
export function describeRestrictions(requirements: RequirementSet): string {
  return requirements.restrictions
    .map(restriction => formatRestriction(restriction, requirements.restrictionGuests[restriction]))
    .join(', ');
}

export function describeLimits(requirements: RequirementSet): string[] {
  const limits: string[] = [];
  if (requirements.maxDifficulty) limits.push(`${requirements.maxDifficulty} recipes at most`);
  if (requirements.maxPrepTimeMinutes !== undefined) limits.push(`prep under ${requirements.maxPrepTimeMinutes} min`);
  if (requirements.maxCookTimeMinutes !== undefined) limits.push(`cooking under ${requirements.maxCookTimeMinutes} min`);
  return limits;
}

/**
 * Append-only log of extraction turns. Every operation returns a new value;
 * stored turns are never rewritten.
 */
export class ConversationState {
  private constructor(public readonly turns: readonly ConversationTurn[]) {}

  static empty(): ConversationState {
    return new ConversationState([]);
  }

  get current(): RequirementSet {
    const last = this.turns[this.turns.length - 1];
    return last ? last.requirements : EMPTY_REQUIREMENTS;
  }

  get length(): number {
    return this.turns.length;
  }

  append(text: string, delta: RequirementDelta): ConversationState {
    const turn: ConversationTurn = Object.freeze({
      text,
      delta: Object.freeze({ ...delta }),
      requirements: mergeRequirements(this.current, delta)
    });
    return new ConversationState(Object.freeze([...this.turns, turn]));
  }

  toJSON(): SerializedConversation {
    return {
      version: 1,
      turns: this.turns.map(turn => ({
        text: turn.text,
        delta: turn.delta,
        requirements: {
          ...turn.requirements,
          restrictions: [...turn.requirements.restrictions],
          allergens: [...turn.requirements.allergens],
          notes: [...turn.requirements.notes]
        }
      }))
    };
  }

  serialize(): string {
    return JSON.stringify(this.toJSON());
  }

  static restore(serialized: string): ConversationState {
    let raw: unknown;
    try {
      raw = JSON.parse(serialized);
    } catch (error) {
      throw new ExtractionError('Conversation state is not valid JSON', error);
    }

    const parsed = ConversationStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExtractionError(`Conversation state is malformed: ${parsed.error.message}`, parsed.error);
    }

    const turns = parsed.data.turns.map(turn =>
      Object.freeze({
        text: turn.text,
        delta: Object.freeze({ ...turn.delta }),
        requirements: freezeRequirements(turn.requirements)
      })
    );
    return new ConversationState(Object.freeze(turns));
  }
}
