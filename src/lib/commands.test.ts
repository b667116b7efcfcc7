/**
 * Tests for the slash commands shared by both front ends
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { handleCommand, HELP_TEXT, SessionSettings } from './commands';
import { PlanningCoordinator } from './PlanningCoordinator';
import { Composer } from '../agents/Composer';
import { ConstraintExtractor } from '../agents/ConstraintExtractor';
import { extractionModel } from '../__tests__/mocks/model.mock';
import { fullMenuRecipes, StaticRecipeSource } from '../__tests__/mocks/recipes.mock';

describe('handleCommand', () => {
  let tmpDir: string;
  let recipes: StaticRecipeSource;
  let coordinator: PlanningCoordinator;
  let settings: SessionSettings;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'menu-commands-'));
    recipes = StaticRecipeSource.of(fullMenuRecipes());
    coordinator = new PlanningCoordinator({
      extractor: new ConstraintExtractor(extractionModel({ guestCount: 4 })),
      recipes,
      composer: new Composer()
    });
    settings = { nativeDispatch: false };
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should ignore normal requests', async () => {
    await expect(handleCommand('dinner for four', coordinator, settings)).resolves.toBeUndefined();
  });

  it('should toggle native dispatch', async () => {
    await expect(handleCommand('/native', coordinator, settings)).resolves.toBe('Native dispatch on');
    expect(settings.nativeDispatch).toBe(true);
    await expect(handleCommand('/native', coordinator, settings)).resolves.toBe('Native dispatch off');
  });

  it('should save, reset and load the conversation', async () => {
    const file = path.join(tmpDir, 'conversation.json');
    await coordinator.run('dinner for four');

    await expect(handleCommand(`/save ${file}`, coordinator, settings)).resolves.toBe(`Conversation saved to ${file}`);
    await expect(handleCommand('/reset', coordinator, settings)).resolves.toBe(
      'Conversation cleared. Tell me about your dinner.'
    );
    expect(coordinator.conversation.requirements.guestCount).toBe('unspecified');

    await expect(handleCommand(`/load ${file}`, coordinator, settings)).resolves.toBe('Conversation restored (1 turns)');
    expect(coordinator.conversation.requirements.guestCount).toBe(4);
  });

  it('should reload the recipe corpus', async () => {
    await expect(handleCommand('/reload other.json', coordinator, settings)).resolves.toBe(
      'Recipe corpus reloaded: 0 recipes'
    );
    expect(recipes.reloads).toEqual(['other.json']);
  });

  it('should ask for a missing argument', async () => {
    await expect(handleCommand('/save', coordinator, settings)).resolves.toBe('Usage: /save <file>');
    await expect(handleCommand('/load', coordinator, settings)).resolves.toBe('Usage: /load <file>');
    await expect(handleCommand('/reload', coordinator, settings)).resolves.toBe('Usage: /reload <file>');
  });

  it('should report a failing command', async () => {
    const reply = await handleCommand(`/load ${path.join(tmpDir, 'missing.json')}`, coordinator, settings);

    expect(reply).toMatch(/^\/load failed: ENOENT/);
  });

  it('should answer help and unknown commands', async () => {
    await expect(handleCommand('/help', coordinator, settings)).resolves.toBe(HELP_TEXT);
    await expect(handleCommand('/dance', coordinator, settings)).resolves.toBe(
      'Unknown command /dance. Type /help for the list.'
    );
  });
});
