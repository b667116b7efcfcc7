/**
 * Tests for ConfigManager
 */

import { describe, it, expect } from 'vitest';
import { ConfigManager, DEFAULT_PLANNER_CONFIG, parseAllergenLimits } from './ConfigManager';

describe('ConfigManager', () => {
  it('should fall back to the defaults', () => {
    const config = new ConfigManager({ OPENAI_API_KEY: 'test-secret' });

    expect(config.getPlannerConfig()).toEqual(DEFAULT_PLANNER_CONFIG);
    expect(config.getModelConfig('default')).toEqual({
      apiKey: 'test-secret',
      baseURL: undefined,
      model: 'gpt-4o-mini',
      temperature: 0.7,
      maxTokens: 2000
    });
  });

  it('should apply per-purpose model overrides', () => {
    const config = new ConfigManager({
      OPENAI_API_KEY: 'test-secret',
      OPENAI_BASE_URL: 'https://llm.test/v1',
      CONSTRAINT_EXTRACTION_MODEL: 'gpt-4o',
      CONSTRAINT_EXTRACTION_TEMPERATURE: '0.1'
    });

    expect(config.getModelConfig('constraint_extraction')).toMatchObject({
      baseURL: 'https://llm.test/v1',
      model: 'gpt-4o',
      temperature: 0.1
    });
    expect(config.getModelConfig('menu_composition').model).toBe('gpt-4o-mini');
  });

  it('should read planner settings from the environment', () => {
    const planner = new ConfigManager({
      PLANNING_INTERVAL: '2',
      ENABLE_DISCOVERY: 'false',
      CANDIDATES_PER_CATEGORY: 'lots',
      COURSE_ALLERGEN_LIMITS: 'nuts:1, Shellfish:2, bad, eggs:x',
      RECIPE_CORPUS_PATH: './fixtures/recipes.json'
    }).getPlannerConfig();

    expect(planner.planningInterval).toBe(2);
    expect(planner.enableDiscovery).toBe(false);
    expect(planner.candidatesPerCategory).toBe(5);
    expect(planner.courseAllergenLimits).toEqual({ nuts: 1, shellfish: 2 });
    expect(planner.recipeCorpusPath).toBe('./fixtures/recipes.json');
  });

  it('should hand out copies of the planner settings', () => {
    const config = new ConfigManager({});
    config.getPlannerConfig().courseAllergenLimits.nuts = 5;

    expect(config.getPlannerConfig().courseAllergenLimits).toEqual({ nuts: 1 });
  });

  it('should report every invalid setting', () => {
    const validation = new ConfigManager({ PLANNING_INTERVAL: '0', OPENAI_TEMPERATURE: '3' }).validateConfig();

    expect(validation.isValid).toBe(false);
    expect(validation.errors).toEqual([
      'OPENAI_API_KEY is required',
      'Temperature must be between 0 and 2',
      'Planning interval must be at least 1'
    ]);
  });

  it('should accept a complete configuration', () => {
    expect(new ConfigManager({ OPENAI_API_KEY: 'test-secret' }).validateConfig()).toEqual({ isValid: true, errors: [] });
  });
});

describe('parseAllergenLimits', () => {
  it('should keep the fallback when nothing is set', () => {
    expect(parseAllergenLimits(undefined, { nuts: 1 })).toEqual({ nuts: 1 });
  });

  it('should allow clearing every limit', () => {
    expect(parseAllergenLimits('', { nuts: 1 })).toEqual({});
  });
});
