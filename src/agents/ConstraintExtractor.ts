import type { LanguageModel, RequirementSet, ToolCall, ToolDefinition } from '../types';
import { UNSPECIFIED_GUESTS } from '../types';
import { withTimeout } from '../lib/async';
import { ConversationState, isEmptyDelta } from '../lib/ConversationState';
import { describeError, ExtractionError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { RequirementDelta, RequirementDeltaSchema } from '../lib/schemas';

const logger = createLogger('ConstraintExtractor');

export interface ExtractionResult {
  requirements: RequirementSet;
  state: ConversationState;
}

export interface ConstraintExtractorOptions {
  timeoutMs: number;
  /** How many earlier turns are quoted back to the model. */
  historyTurns: number;
}

const RECORD_REQUIREMENTS_TOOL: ToolDefinition = {
  name: 'record_requirements',
  description: 'Record the dinner requirements stated or retracted in the latest user message.',
  parameters: RequirementDeltaSchema
};

// Maps free-form allergy wording onto the allergen names used by the corpus.
const ALLERGEN_SYNONYMS: Record<string, string> = {
  nut: 'nuts',
  'tree nuts': 'nuts',
  'tree nut': 'nuts',
  almonds: 'nuts',
  walnuts: 'nuts',
  hazelnuts: 'nuts',
  pistachios: 'nuts',
  peanut: 'peanuts',
  milk: 'dairy',
  lactose: 'dairy',
  cheese: 'dairy',
  egg: 'eggs',
  shrimp: 'shellfish',
  prawns: 'shellfish',
  crab: 'shellfish',
  lobster: 'shellfish',
  mussels: 'shellfish',
  soya: 'soy',
  'sesame seeds': 'sesame'
};

function canonicalAllergen(allergen: string): string {
  const lower = allergen.trim().toLowerCase();
  return ALLERGEN_SYNONYMS[lower] ?? lower;
}

export class ConstraintExtractor {
  private readonly options: ConstraintExtractorOptions;

  constructor(
    private readonly model: LanguageModel,
    options: Partial<ConstraintExtractorOptions> = {}
  ) {
    this.options = { timeoutMs: 30000, historyTurns: 5, ...options };
  }

  /**
   * Extracts the requirement delta of one user turn and merges it into the
   * prior state. The prior state is never modified.
   */
  async extract(text: string, prior: ConversationState): Promise<ExtractionResult> {
    const userInput = text.trim();
    if (!userInput) {
      throw new ExtractionError('Nothing to extract from an empty message');
    }

    logger.debug('Extracting requirements from input:', userInput);

    let toolCalls: ToolCall[];
    try {
      const response = await withTimeout(
        this.model.complete(
          { system: this.getSystemPrompt(), prompt: this.buildUserPrompt(userInput, prior) },
          [RECORD_REQUIREMENTS_TOOL],
          'forced-first-call'
        ),
        this.options.timeoutMs,
        'Requirement extraction'
      );
      toolCalls = response.toolCalls;
    } catch (error) {
      throw new ExtractionError(`Requirement extraction failed: ${describeError(error).message}`, error);
    }

    const call = toolCalls.find(candidate => candidate.toolName === RECORD_REQUIREMENTS_TOOL.name);
    if (!call) {
      throw new ExtractionError('The model did not record any requirements');
    }

    const parsed = RequirementDeltaSchema.safeParse(call.args);
    if (!parsed.success) {
      throw new ExtractionError(`Recorded requirements are malformed: ${parsed.error.message}`, parsed.error);
    }

    const delta = this.mapAllergens(parsed.data);
    if (isEmptyDelta(delta)) {
      throw new ExtractionError('No dinner requirements found in the message');
    }

    const state = prior.append(userInput, delta);
    logger.info('Merged requirements:', state.current);
    return { requirements: state.current, state };
  }

  /** Follow-up questions for information the planner would otherwise default. */
  describeMissing(requirements: RequirementSet): string[] {
    const questions: string[] = [];

    if (requirements.guestCount === UNSPECIFIED_GUESTS) {
      questions.push('How many guests are you expecting?');
    }

    if (requirements.restrictions.length === 0) {
      questions.push('Are there any vegetarian, vegan or other dietary needs among the guests?');
    }

    if (requirements.allergens.length === 0) {
      questions.push('Does anyone have food allergies I should be aware of?');
    }

    return questions;
  }

  private mapAllergens(delta: RequirementDelta): RequirementDelta {
    const dedupe = (values: string[] | undefined) =>
      values ? Array.from(new Set(values.map(canonicalAllergen))) : undefined;

    return {
      ...delta,
      addAllergens: dedupe(delta.addAllergens),
      removeAllergens: dedupe(delta.removeAllergens)
    };
  }

  private getSystemPrompt(): string {
    return `You are an experienced dinner party planner. Your job is to turn what the host says into structured requirements.

Record, using the record_requirements tool:
1. guestCount: total number of guests, only when stated
2. addRestrictions / restrictionGuests: dietary restrictions (vegan, vegetarian, gluten_free, dairy_free, nut_free) and how many guests follow them
3. addAllergens: ingredients that must not appear (nuts, peanuts, sesame, dairy, eggs, fish, shellfish, gluten, wheat, soy, or anything else named)
4. preferTraditional: whether classic festive dishes are preferred over modern ones
5. maxDifficulty / maxPrepTimeMinutes / maxCookTimeMinutes: limits on how hard or how long each recipe may be
6. notes: any other preference worth remembering

Rules:
- Only record what the LATEST message states; earlier requirements are already stored
- When the host takes something back ("not vegan anymore", "the nut allergy was a mistake"), put it in removeRestrictions / removeAllergens
- When the host says nobody follows a restriction, record it in restrictionGuests with 0
- When the host no longer minds how hard or long the cooking is, set liftLimits
- Never invent a guest count or an allergy
- Omit every field the message does not mention`;
  }

  private buildUserPrompt(userInput: string, prior: ConversationState): string {
    let prompt = '';

    if (prior.length > 0) {
      prompt += 'Conversation so far:\n';
      prior.turns.slice(-this.options.historyTurns).forEach(turn => {
        prompt += `Host: ${turn.text}\n`;
      });
      prompt += `\nRequirements recorded so far: ${JSON.stringify(prior.current)}\n\n`;
    }

    prompt += `Latest message from the host: ${userInput}\n\n`;
    prompt += 'Record the requirements this message adds, changes or retracts.';

    return prompt;
  }
}
