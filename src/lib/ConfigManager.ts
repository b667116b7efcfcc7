import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export type ModelPurpose =
  | 'constraint_extraction'
  | 'menu_composition'
  | 'recipe_tagging'
  | 'default';

export interface ModelConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  temperature: number;
  maxTokens?: number;
}

export interface PlannerConfig {
  candidatesPerCategory: number;
  retrievalTimeoutMs: number;
  discoveryTimeoutMs: number;
  modelTimeoutMs: number;
  planningInterval: number;
  maxPlanningRounds: number;
  defaultPartySize: number;
  enableDiscovery: boolean;
  concurrentRetrieval: boolean;
  courseAllergenLimits: Record<string, number>;
  recipeCorpusPath: string;
}

export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
  candidatesPerCategory: 5,
  retrievalTimeoutMs: 8000,
  discoveryTimeoutMs: 10000,
  modelTimeoutMs: 30000,
  planningInterval: 3,
  maxPlanningRounds: 10,
  defaultPartySize: 6,
  enableDiscovery: true,
  concurrentRetrieval: true,
  courseAllergenLimits: { nuts: 1 },
  recipeCorpusPath: './data/recipes.json'
};

type Env = Record<string, string | undefined>;

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return value.trim().toLowerCase() === 'true';
}

/** Parses `nuts:1,shellfish:2` into `{ nuts: 1, shellfish: 2 }`; malformed pairs are ignored. */
export function parseAllergenLimits(value: string | undefined, fallback: Record<string, number>): Record<string, number> {
  if (value === undefined) return { ...fallback };
  const limits: Record<string, number> = {};
  for (const pair of value.split(',')) {
    const [allergen, limit] = pair.split(':').map(part => part.trim());
    const parsed = parseInt(limit ?? '', 10);
    if (allergen && !Number.isNaN(parsed) && parsed >= 0) {
      limits[allergen.toLowerCase()] = parsed;
    }
  }
  return limits;
}

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private readonly env: Env;
  private config: {
    apiKey: string;
    baseURL?: string;
    defaultModel: string;
    defaultTemperature: number;
    defaultMaxTokens: number;
    planner: PlannerConfig;
  };

  constructor(env: Env = process.env) {
    this.env = env;
    this.config = {
      apiKey: env.OPENAI_API_KEY ?? '',
      baseURL: env.OPENAI_BASE_URL || undefined,
      defaultModel: env.OPENAI_MODEL || 'gpt-4o-mini',
      defaultTemperature: parseFloat(env.OPENAI_TEMPERATURE || '0.7'),
      defaultMaxTokens: parseInteger(env.OPENAI_MAX_TOKENS, 2000),
      planner: {
        candidatesPerCategory: parseInteger(env.CANDIDATES_PER_CATEGORY, DEFAULT_PLANNER_CONFIG.candidatesPerCategory),
        retrievalTimeoutMs: parseInteger(env.RETRIEVAL_TIMEOUT_MS, DEFAULT_PLANNER_CONFIG.retrievalTimeoutMs),
        discoveryTimeoutMs: parseInteger(env.DISCOVERY_TIMEOUT_MS, DEFAULT_PLANNER_CONFIG.discoveryTimeoutMs),
        modelTimeoutMs: parseInteger(env.MODEL_TIMEOUT_MS, DEFAULT_PLANNER_CONFIG.modelTimeoutMs),
        planningInterval: parseInteger(env.PLANNING_INTERVAL, DEFAULT_PLANNER_CONFIG.planningInterval),
        maxPlanningRounds: parseInteger(env.MAX_PLANNING_ROUNDS, DEFAULT_PLANNER_CONFIG.maxPlanningRounds),
        defaultPartySize: parseInteger(env.DEFAULT_PARTY_SIZE, DEFAULT_PLANNER_CONFIG.defaultPartySize),
        enableDiscovery: parseBoolean(env.ENABLE_DISCOVERY, DEFAULT_PLANNER_CONFIG.enableDiscovery),
        concurrentRetrieval: parseBoolean(env.CONCURRENT_RETRIEVAL, DEFAULT_PLANNER_CONFIG.concurrentRetrieval),
        courseAllergenLimits: parseAllergenLimits(env.COURSE_ALLERGEN_LIMITS, DEFAULT_PLANNER_CONFIG.courseAllergenLimits),
        recipeCorpusPath: env.RECIPE_CORPUS_PATH || DEFAULT_PLANNER_CONFIG.recipeCorpusPath
      }
    };
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  public getModelConfig(purpose: ModelPurpose): ModelConfig {
    const prefix = purpose.toUpperCase();
    const model = purpose === 'default' ? undefined : this.env[`${prefix}_MODEL`];
    const temperature = purpose === 'default' ? undefined : this.env[`${prefix}_TEMPERATURE`];

    return {
      apiKey: this.config.apiKey,
      baseURL: this.config.baseURL,
      model: model || this.config.defaultModel,
      temperature: temperature ? parseFloat(temperature) : this.config.defaultTemperature,
      maxTokens: this.config.defaultMaxTokens
    };
  }

  public getPlannerConfig(): PlannerConfig {
    return {
      ...this.config.planner,
      courseAllergenLimits: { ...this.config.planner.courseAllergenLimits }
    };
  }

  public describe(): string[] {
    return [
      `API Base URL: ${this.config.baseURL || 'https://api.openai.com/v1 (default)'}`,
      `Default Model: ${this.config.defaultModel}`,
      `Default Temperature: ${this.config.defaultTemperature}`,
      `Recipe corpus: ${this.config.planner.recipeCorpusPath}`,
      `Planning interval: ${this.config.planner.planningInterval} / max rounds: ${this.config.planner.maxPlanningRounds}`
    ];
  }

  public validateConfig(): { isValid: boolean; errors: string[] } {
    const errors: string[] = [];
    const planner = this.config.planner;

    if (!this.config.apiKey) {
      errors.push('OPENAI_API_KEY is required');
    }

    if (Number.isNaN(this.config.defaultTemperature) || this.config.defaultTemperature < 0 || this.config.defaultTemperature > 2) {
      errors.push('Temperature must be between 0 and 2');
    }

    if (this.config.defaultMaxTokens < 1 || this.config.defaultMaxTokens > 8192) {
      errors.push('Max tokens must be between 1 and 8192');
    }

    if (planner.candidatesPerCategory < 1) {
      errors.push('Candidates per category must be at least 1');
    }

    if (planner.planningInterval < 1) {
      errors.push('Planning interval must be at least 1');
    }

    if (planner.maxPlanningRounds < 1) {
      errors.push('Max planning rounds must be at least 1');
    }

    if (planner.defaultPartySize < 1) {
      errors.push('Default party size must be at least 1');
    }

    for (const [name, value] of [
      ['Retrieval timeout', planner.retrievalTimeoutMs],
      ['Discovery timeout', planner.discoveryTimeoutMs],
      ['Model timeout', planner.modelTimeoutMs]
    ] as const) {
      if (value < 1) {
        errors.push(`${name} must be positive`);
      }
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }
}
