import { z } from 'zod';
import { DIETARY_RESTRICTIONS, RECIPE_CATEGORIES, UNSPECIFIED_GUESTS } from '../types';

const DIFFICULTIES = ['easy', 'medium', 'hard'] as const;

const normalizedAllergen = z
  .string()
  .trim()
  .min(1)
  .transform(value => value.toLowerCase());

export const RecipeRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().trim().min(1),
  description: z.string().default(''),
  category: z.enum(RECIPE_CATEGORIES),
  dietaryTags: z.array(z.enum(DIETARY_RESTRICTIONS)).default([]),
  allergens: z.array(normalizedAllergen).default([]),
  traditional: z.boolean().default(false),
  ingredients: z.array(z.string()).default([]),
  instructions: z.array(z.string()).default([]),
  servings: z.number().int().positive().default(4),
  prepTimeMinutes: z.number().int().nonnegative().optional(),
  cookTimeMinutes: z.number().int().nonnegative().optional(),
  difficulty: z.enum(DIFFICULTIES).default('medium'),
  /** Hash of the markdown the record was built from, for incremental rebuilds. */
  sourceHash: z.string().optional()
});

export const RequirementDeltaSchema = z.object({
  guestCount: z.number().int().positive().optional().describe('Total number of guests, only if stated in this turn'),
  addRestrictions: z
    .array(z.enum(DIETARY_RESTRICTIONS))
    .optional()
    .describe('Dietary restrictions newly stated in this turn'),
  removeRestrictions: z
    .array(z.enum(DIETARY_RESTRICTIONS))
    .optional()
    .describe('Restrictions the user explicitly retracts, e.g. "not vegan anymore"'),
  restrictionGuests: z
    .record(z.enum(DIETARY_RESTRICTIONS), z.number().int().nonnegative())
    .optional()
    .describe('How many guests follow each restriction, when stated'),
  addAllergens: z.array(normalizedAllergen).optional().describe('Allergens to exclude, lower case'),
  removeAllergens: z.array(normalizedAllergen).optional().describe('Allergens the user explicitly retracts'),
  preferTraditional: z.boolean().optional().describe('Whether traditional recipes are preferred over modern ones'),
  notes: z.string().optional().describe('Other free-text preferences worth remembering'),
  maxDifficulty: z.enum(DIFFICULTIES).optional().describe('Hardest recipe difficulty the host will cook'),
  maxPrepTimeMinutes: z.number().int().positive().optional().describe('Longest preparation time per recipe, in minutes'),
  maxCookTimeMinutes: z.number().int().positive().optional().describe('Longest cooking time per recipe, in minutes'),
  liftLimits: z
    .boolean()
    .optional()
    .describe('True when the host drops every earlier difficulty or time limit')
});

export const RequirementSetSchema = z.object({
  guestCount: z.union([z.number().int().positive(), z.literal(UNSPECIFIED_GUESTS)]),
  restrictions: z.array(z.enum(DIETARY_RESTRICTIONS)),
  restrictionGuests: z.record(z.enum(DIETARY_RESTRICTIONS), z.number().int().nonnegative()),
  allergens: z.array(z.string()),
  preferTraditional: z.boolean(),
  notes: z.array(z.string()),
  maxDifficulty: z.enum(DIFFICULTIES).optional(),
  maxPrepTimeMinutes: z.number().int().positive().optional(),
  maxCookTimeMinutes: z.number().int().positive().optional()
});

export const ConversationStateSchema = z.object({
  version: z.literal(1),
  turns: z.array(
    z.object({
      text: z.string(),
      delta: RequirementDeltaSchema,
      requirements: RequirementSetSchema
    })
  )
});

export const MenuNotesSchema = z.object({
  pairingNotes: z.array(z.string().min(1)).min(1).describe('Drink pairings and serving notes for the chosen courses')
});

export const RecipeTagsSchema = z.object({
  dietaryTags: z.array(z.enum(DIETARY_RESTRICTIONS)),
  allergens: z.array(z.string()),
  difficulty: z.enum(DIFFICULTIES),
  traditional: z.boolean()
});

export type RecipeRecord = z.infer<typeof RecipeRecordSchema>;
export type RequirementDelta = z.infer<typeof RequirementDeltaSchema>;
export type SerializedConversation = z.infer<typeof ConversationStateSchema>;
export type MenuNotes = z.infer<typeof MenuNotesSchema>;
export type RecipeTags = z.infer<typeof RecipeTagsSchema>;
