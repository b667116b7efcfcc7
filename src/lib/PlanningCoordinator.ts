import type {
  Candidate,
  CategoryCandidates,
  CorpusSource,
  ErrorInfo,
  Menu,
  PlanResult,
  ProgressEvent,
  ProgressStatus,
  RecipeCategory,
  RecipeSource,
  RequirementSet,
  Retriever
} from '../types';
import { RECIPE_CATEGORIES, RunStage } from '../types';
import { CategoryRetriever, createCategoryRetrievers } from '../agents/CategoryRetriever';
import { Composer } from '../agents/Composer';
import { ConstraintExtractor } from '../agents/ConstraintExtractor';
import { DiscoveryAgent } from '../agents/DiscoveryAgent';
import type { Discoverer } from '../agents/DiscoveryAgent';
import { AsyncQueue } from './async';
import { ConfigManager } from './ConfigManager';
import { Conversation } from './Conversation';
import { DuckDuckGoSearch } from './DuckDuckGoSearch';
import { CancelledError, CompositionError, describeError } from './errors';
import { KnowledgeBase } from './KnowledgeBase';
import { createLogger } from './logger';
import { OpenAILanguageModel } from './OpenAIClient';

const logger = createLogger('Coordinator');

export interface EventSink {
  emit(event: ProgressEvent): void;
}

/** Sync mode: events are collected and returned with the result. */
export class BufferedSink implements EventSink {
  readonly events: ProgressEvent[] = [];

  emit(event: ProgressEvent): void {
    this.events.push(event);
  }
}

/** Stream mode: each event is pushed to the listener as the stage completes. */
export class CallbackSink implements EventSink {
  constructor(private readonly onEvent: (event: ProgressEvent) => void) {}

  emit(event: ProgressEvent): void {
    try {
      this.onEvent(event);
    } catch (error) {
      logger.warn('Progress listener threw, run continues:', describeError(error).message);
    }
  }
}

export type StreamItem = { kind: 'event'; event: ProgressEvent } | { kind: 'result'; result: PlanResult };

/** Async-stream mode: events go onto a queue drained by an async generator. */
export class QueueSink implements EventSink {
  constructor(private readonly queue: AsyncQueue<StreamItem>) {}

  emit(event: ProgressEvent): void {
    this.queue.push({ kind: 'event', event });
  }
}

export interface CoordinatorOptions {
  candidatesPerCategory: number;
  retrievalTimeoutMs: number;
  enableDiscovery: boolean;
  concurrentRetrieval: boolean;
}

export interface PlanningCoordinatorDeps {
  extractor: ConstraintExtractor;
  recipes: RecipeSource;
  composer: Composer;
  discovery?: Discoverer;
  retrievers?: Record<RecipeCategory, CategoryRetriever>;
  options?: Partial<CoordinatorOptions>;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Let the Composer call the retrievers itself. Same stages, same events. */
  nativeDispatch?: boolean;
  /** Defaults to the coordinator's own conversation. */
  conversation?: Conversation;
}

export interface SyncRunOutput {
  result: PlanResult;
  events: ProgressEvent[];
}

export type PlanRequest =
  | (RunOptions & { mode?: 'sync' })
  | (RunOptions & { mode: 'stream'; onEvent: (event: ProgressEvent) => void })
  | (RunOptions & { mode: 'async_stream' });

/** State shared by the stages of one run. */
class RunContext {
  stage: RunStage = RunStage.RECEIVED;

  constructor(
    private readonly sink: EventSink,
    readonly corpus: Retriever,
    readonly signal: AbortSignal | undefined
  ) {}

  checkCancelled(next: RunStage): void {
    if (this.signal?.aborted) {
      throw new CancelledError(next);
    }
  }

  /** Called at every transition. In-flight external calls are never aborted. */
  enter(stage: RunStage): void {
    this.checkCancelled(stage);
    this.stage = stage;
  }

  emit(stage: RunStage, status: ProgressStatus, message: string, data?: unknown, category?: RecipeCategory): void {
    this.sink.emit({ stage, status, category, payload: { message, data } });
  }

  forward(event: ProgressEvent): void {
    this.sink.emit(event);
  }
}

/**
 * Runs one planning request through
 * RECEIVED → EXTRACTING → RETRIEVING → [DISCOVERING] → COMPOSING → DONE | FAILED.
 *
 * The three execution modes share `execute` and differ only in the sink
 * their events go to. Native dispatch is a second entry into the same
 * stages: the Composer drives retrieval through the hooks built here.
 */
export class PlanningCoordinator {
  private readonly extractor: ConstraintExtractor;
  private readonly recipes: RecipeSource;
  private readonly composer: Composer;
  private readonly discovery?: Discoverer;
  private readonly retrievers: Record<RecipeCategory, CategoryRetriever>;
  private readonly options: CoordinatorOptions;
  private defaultConversation: Conversation;

  constructor(deps: PlanningCoordinatorDeps) {
    this.extractor = deps.extractor;
    this.recipes = deps.recipes;
    this.composer = deps.composer;
    this.discovery = deps.discovery;
    this.retrievers = deps.retrievers ?? createCategoryRetrievers();
    this.options = {
      candidatesPerCategory: 5,
      retrievalTimeoutMs: 8000,
      enableDiscovery: true,
      concurrentRetrieval: true,
      ...deps.options
    };
    this.defaultConversation = new Conversation(this.extractor);
  }

  /** Wires the OpenAI-backed agents, the JSON corpus and web discovery from configuration. */
  static async create(configManager: ConfigManager = ConfigManager.getInstance()): Promise<PlanningCoordinator> {
    const planner = configManager.getPlannerConfig();
    const recipes = await KnowledgeBase.fromSource(planner.recipeCorpusPath);

    const extractor = new ConstraintExtractor(
      new OpenAILanguageModel(configManager.getModelConfig('constraint_extraction')),
      { timeoutMs: planner.modelTimeoutMs }
    );
    const composer = new Composer(new OpenAILanguageModel(configManager.getModelConfig('menu_composition')), {
      planningInterval: planner.planningInterval,
      maxPlanningRounds: planner.maxPlanningRounds,
      defaultPartySize: planner.defaultPartySize,
      courseAllergenLimits: planner.courseAllergenLimits,
      timeoutMs: planner.modelTimeoutMs
    });
    const discovery = new DiscoveryAgent(new DuckDuckGoSearch(), { timeoutMs: planner.discoveryTimeoutMs });

    return new PlanningCoordinator({
      extractor,
      recipes,
      composer,
      discovery,
      options: {
        candidatesPerCategory: planner.candidatesPerCategory,
        retrievalTimeoutMs: planner.retrievalTimeoutMs,
        enableDiscovery: planner.enableDiscovery,
        concurrentRetrieval: planner.concurrentRetrieval
      }
    });
  }

  get conversation(): Conversation {
    return this.defaultConversation;
  }

  newConversation(): Conversation {
    return new Conversation(this.extractor);
  }

  restoreConversation(serialized: string): Conversation {
    this.defaultConversation = Conversation.restore(this.extractor, serialized);
    return this.defaultConversation;
  }

  followUpQuestions(requirements: RequirementSet): string[] {
    return this.extractor.describeMissing(requirements);
  }

  /** Swaps the corpus for runs that start after this resolves. */
  reload(source: CorpusSource): Promise<number> {
    return this.recipes.reload(source);
  }

  async run(text: string, options: RunOptions = {}): Promise<SyncRunOutput> {
    const sink = new BufferedSink();
    const result = await this.execute(text, sink, options);
    return { result, events: sink.events };
  }

  runStreaming(text: string, onEvent: (event: ProgressEvent) => void, options: RunOptions = {}): Promise<PlanResult> {
    return this.execute(text, new CallbackSink(onEvent), options);
  }

  /**
   * Yields every event as it happens, then the result. Leaving the loop early
   * cancels the run and waits for it to wind down.
   */
  async *runAsyncStreaming(text: string, options: RunOptions = {}): AsyncGenerator<StreamItem, void, undefined> {
    const queue = new AsyncQueue<StreamItem>();
    const controller = new AbortController();
    const parent = options.signal;
    const forwardAbort = () => controller.abort();

    if (parent?.aborted) {
      controller.abort();
    } else {
      parent?.addEventListener('abort', forwardAbort, { once: true });
    }

    const running = this.execute(text, new QueueSink(queue), { ...options, signal: controller.signal }).then(
      result => queue.push({ kind: 'result', result }),
      (error: unknown) =>
        queue.push({ kind: 'result', result: { status: 'failed', stage: RunStage.FAILED, error: describeError(error) } })
    );

    let finished = false;
    try {
      while (!finished) {
        const item = await queue.next();
        finished = item.kind === 'result';
        yield item;
      }
    } finally {
      if (!finished) {
        controller.abort();
      }
      await running;
      parent?.removeEventListener('abort', forwardAbort);
    }
  }

  plan(text: string, request: RunOptions & { mode: 'async_stream' }): AsyncGenerator<StreamItem, void, undefined>;
  plan(
    text: string,
    request: RunOptions & { mode: 'stream'; onEvent: (event: ProgressEvent) => void }
  ): Promise<PlanResult>;
  plan(text: string, request?: RunOptions & { mode?: 'sync' }): Promise<SyncRunOutput>;
  plan(
    text: string,
    request: PlanRequest = {}
  ): Promise<SyncRunOutput> | Promise<PlanResult> | AsyncGenerator<StreamItem, void, undefined> {
    switch (request.mode) {
      case 'async_stream':
        return this.runAsyncStreaming(text, request);
      case 'stream':
        return this.runStreaming(text, request.onEvent, request);
      default:
        return this.run(text, request);
    }
  }

  private async execute(text: string, sink: EventSink, options: RunOptions): Promise<PlanResult> {
    // The corpus is fixed for the whole run; a reload only affects later runs.
    const run = new RunContext(sink, this.recipes.snapshot(), options.signal);
    const conversation = options.conversation ?? this.defaultConversation;

    try {
      run.emit(RunStage.RECEIVED, 'succeeded', 'Request received');

      run.enter(RunStage.EXTRACTING);
      run.emit(RunStage.EXTRACTING, 'started', 'Reading your requirements');
      let requirements: RequirementSet;
      try {
        requirements = await conversation.merge(text);
      } catch (error) {
        run.checkCancelled(RunStage.RETRIEVING);
        return this.fail(run, RunStage.EXTRACTING, describeError(error));
      }
      run.emit(RunStage.EXTRACTING, 'succeeded', 'Requirements recorded', requirements);

      const menu = options.nativeDispatch
        ? await this.composer.planWithAgents(
            requirements,
            {
              retrieveAll: current => this.retrieveAll(current, run),
              beforeCompose: () => this.beginComposing(run)
            })
        : await this.relay(requirements, run);

      run.emit(RunStage.COMPOSING, 'succeeded', `Menu ready after ${menu.rounds} planning rounds`, {
        rounds: menu.rounds
      });

      run.enter(RunStage.DONE);
      const result: PlanResult =
        menu.unavailable.length > 0
          ? { status: 'partial', requirements, menu, unmet: menu.unavailable }
          : { status: 'success', requirements, menu, unmet: [] };
      run.emit(RunStage.DONE, 'succeeded', result.status === 'partial' ? 'Partial menu planned' : 'Menu planned', {
        status: result.status
      });
      return result;
    } catch (error) {
      if (error instanceof CancelledError) {
        logger.info(error.message);
        return { status: 'cancelled', stage: error.stage };
      }
      if (error instanceof CompositionError) {
        return this.fail(run, RunStage.COMPOSING, describeError(error));
      }
      logger.error(`Unexpected error during ${run.stage}:`, error);
      return this.fail(run, run.stage, describeError(error));
    }
  }

  private async relay(requirements: RequirementSet, run: RunContext): Promise<Menu> {
    const candidates = await this.retrieveAll(requirements, run);
    this.beginComposing(run);
    return this.composer.compose(requirements, candidates);
  }

  private beginComposing(run: RunContext): void {
    run.enter(RunStage.COMPOSING);
    run.emit(RunStage.COMPOSING, 'started', 'Composing the menu');
  }

  /** RETRIEVING: the four categories have no data dependency on each other. */
  private async retrieveAll(requirements: RequirementSet, run: RunContext): Promise<CategoryCandidates> {
    run.enter(RunStage.RETRIEVING);
    const courses: CategoryCandidates = { appetizer: [], main_dish: [], second_course: [], dessert: [] };

    const retrieveOne = async (category: RecipeCategory): Promise<void> => {
      courses[category] = await this.retrieveCategory(category, requirements, run);
    };

    if (this.options.concurrentRetrieval) {
      await Promise.all(RECIPE_CATEGORIES.map(retrieveOne));
    } else {
      for (const category of RECIPE_CATEGORIES) {
        await retrieveOne(category);
      }
    }

    return courses;
  }

  private async retrieveCategory(
    category: RecipeCategory,
    requirements: RequirementSet,
    run: RunContext
  ): Promise<Candidate[]> {
    const retriever = this.retrievers[category];
    run.emit(RunStage.RETRIEVING, 'started', `Looking for ${retriever.profile.label.toLowerCase()} recipes`, undefined, category);

    try {
      const candidates = await retriever.retrieve(requirements, this.options.candidatesPerCategory, {
        corpus: run.corpus,
        discovery: this.options.enableDiscovery ? this.discovery : undefined,
        timeoutMs: this.options.retrievalTimeoutMs,
        onProgress: event => run.forward(event)
      });
      run.emit(
        RunStage.RETRIEVING,
        'succeeded',
        `Found ${candidates.length} ${retriever.profile.label.toLowerCase()} candidates`,
        { count: candidates.length, ids: candidates.map(candidate => candidate.recipe.id) },
        category
      );
      return candidates;
    } catch (error) {
      const info = describeError(error);
      logger.warn(`Retrieval degraded for ${category}: ${info.message}`);
      run.emit(RunStage.RETRIEVING, 'failed', info.message, info, category);
      return [];
    }
  }

  private fail(run: RunContext, stage: RunStage, error: ErrorInfo): PlanResult {
    logger.warn(`Run failed at ${stage}: ${error.message}`);
    run.emit(stage, 'failed', error.message, error);
    run.emit(RunStage.FAILED, 'failed', error.message, { stage });
    return { status: 'failed', stage, error };
  }
}
