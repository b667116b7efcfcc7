import type { RequirementSet } from '../types';
import type { ConstraintExtractor } from '../agents/ConstraintExtractor';
import { ConversationState } from './ConversationState';

/**
 * One user conversation. Merges are queued so that a turn never starts
 * extracting against a state another turn is still producing; separate
 * Conversation instances do not wait on each other.
 */
export class Conversation {
  private state: ConversationState;
  private pending: Promise<void> = Promise.resolve();
  // Bumped by clear(); a turn that started before the bump does not write back.
  private generation = 0;

  constructor(
    private readonly extractor: ConstraintExtractor,
    initial: ConversationState = ConversationState.empty()
  ) {
    this.state = initial;
  }

  static restore(extractor: ConstraintExtractor, serialized: string): Conversation {
    return new Conversation(extractor, ConversationState.restore(serialized));
  }

  merge(text: string): Promise<RequirementSet> {
    const turn = this.pending.then(async () => {
      const generation = this.generation;
      const { requirements, state } = await this.extractor.extract(text, this.state);
      if (generation === this.generation) {
        this.state = state;
      }
      return requirements;
    });

    // The caller sees the rejection through `turn`; the queue itself moves on.
    this.pending = turn.then(
      () => undefined,
      () => undefined
    );

    return turn;
  }

  snapshot(): ConversationState {
    return this.state;
  }

  get requirements(): RequirementSet {
    return this.state.current;
  }

  /** Forgets every turn, including one still being extracted. */
  clear(): void {
    this.generation += 1;
    this.state = ConversationState.empty();
  }

  serialize(): string {
    return this.state.serialize();
  }
}
