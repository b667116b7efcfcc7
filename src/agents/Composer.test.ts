/**
 * Tests for Composer
 */

import { describe, it, expect } from 'vitest';
import type { CategoryCandidates, Recipe } from '../types';
import { Composer, courseSlots } from './Composer';
import { CompositionError } from '../lib/errors';
import { ScriptedModel, toolCall } from '../__tests__/mocks/model.mock';
import { fullMenuRecipes, makeCandidate, makeRecipe, makeRequirements } from '../__tests__/mocks/recipes.mock';

function candidatesFrom(recipes: Recipe[]): CategoryCandidates {
  const courses: CategoryCandidates = { appetizer: [], main_dish: [], second_course: [], dessert: [] };
  recipes.forEach(recipe => courses[recipe.category].push(makeCandidate(recipe)));
  return courses;
}

const WALNUT_PASTA = makeRecipe({
  id: 'm-nut',
  category: 'main_dish',
  name: 'Walnut Pesto Pasta',
  allergens: ['nuts'],
  ingredients: ['basil', 'walnuts']
});
const WALNUT_CAKE = makeRecipe({
  id: 'd-nut',
  category: 'dessert',
  name: 'Walnut Cake',
  allergens: ['nuts'],
  ingredients: ['flour', 'walnuts']
});
const BAKED_APPLES = makeRecipe({ id: 'd-plain', category: 'dessert', name: 'Baked Apples', ingredients: ['apples'] });

describe('courseSlots', () => {
  it('should add a second appetizer for large parties', () => {
    expect(courseSlots(8).appetizer).toBe(1);
    expect(courseSlots(9)).toEqual({ appetizer: 2, main_dish: 1, second_course: 1, dessert: 1 });
  });
});

describe('Composer', () => {
  it('should compose a complete menu in one round when nothing conflicts', async () => {
    const menu = await new Composer().compose(makeRequirements(), candidatesFrom(fullMenuRecipes()));

    expect(menu.title).toBe('Dinner for 6');
    expect(menu.guestCount).toBe(6);
    expect(menu.rounds).toBe(1);
    expect(menu.unavailable).toEqual([]);
    expect(menu.courses.appetizer.map(candidate => candidate.recipe.id)).toEqual(['a1']);
    expect(menu.courses.dessert.map(candidate => candidate.recipe.id)).toEqual(['d1']);
    expect(menu.pairingNotes).toEqual([
      'Serve Olive Tapenade with sparkling wine as guests arrive.',
      'Pair Roast Squash with a medium-bodied red wine.',
      'Finish with Poached Pears and coffee.'
    ]);
    expect(menu.timeline).toEqual([
      '55 min before serving: start Roast Squash',
      '45 min before serving: start Pumpkin Risotto',
      '30 min before serving: start Poached Pears',
      '10 min before serving: start Olive Tapenade'
    ]);
    expect(menu.shoppingList).toEqual([
      'butter',
      'capers',
      'olives',
      'pears',
      'pumpkin',
      'red wine',
      'rice',
      'sage',
      'squash'
    ]);
  });

  it('should plan two appetizers for more than eight guests', async () => {
    const extra = makeRecipe({ id: 'a2', category: 'appetizer', name: 'Stuffed Peppers' });

    const menu = await new Composer().compose(
      makeRequirements({ guestCount: 10 }),
      candidatesFrom([...fullMenuRecipes(), extra])
    );

    expect(menu.title).toBe('Dinner for 10');
    expect(menu.courses.appetizer.map(candidate => candidate.recipe.id)).toEqual(['a1', 'a2']);
    expect(menu.pairingNotes[0]).toBe('Serve Olive Tapenade and Stuffed Peppers with sparkling wine as guests arrive.');
  });

  it('should pair a seafood second course with white wine', async () => {
    const fish = makeRecipe({ id: 's-fish', category: 'second_course', name: 'Baked Sea Bass', allergens: ['fish'] });

    const menu = await new Composer().compose(makeRequirements(), candidatesFrom([fish]));

    expect(menu.pairingNotes).toEqual(['Pair Baked Sea Bass with a crisp white wine.']);
  });

  it('should swap out a pick over the allergen limit at the next planning round', async () => {
    const menu = await new Composer().compose(
      makeRequirements(),
      candidatesFrom([WALNUT_PASTA, WALNUT_CAKE, BAKED_APPLES])
    );

    expect(menu.rounds).toBe(3);
    expect(menu.courses.main_dish.map(candidate => candidate.recipe.id)).toEqual(['m-nut']);
    expect(menu.courses.dessert.map(candidate => candidate.recipe.id)).toEqual(['d-plain']);
    expect(menu.unavailable).toEqual([
      { category: 'appetizer', reason: 'No compliant appetizer recipe found' },
      { category: 'second_course', reason: 'No compliant second course recipe found' }
    ]);
  });

  it('should mark a course unavailable when no candidate resolves the conflict', async () => {
    const menu = await new Composer().compose(makeRequirements(), candidatesFrom([WALNUT_PASTA, WALNUT_CAKE]));

    expect(menu.rounds).toBe(3);
    expect(menu.courses.dessert).toEqual([]);
    expect(menu.unavailable).toContainEqual({
      category: 'dessert',
      reason: 'Walnut Cake would put nuts in too many courses'
    });
  });

  it('should drop unresolved picks when the round limit is reached', async () => {
    const menu = await new Composer(undefined, { maxPlanningRounds: 2 }).compose(
      makeRequirements(),
      candidatesFrom([WALNUT_PASTA, WALNUT_CAKE, BAKED_APPLES])
    );

    expect(menu.rounds).toBe(2);
    expect(menu.courses.dessert).toEqual([]);
    expect(menu.unavailable).toContainEqual({
      category: 'dessert',
      reason: 'Walnut Cake would put nuts in too many courses'
    });
    expect(menu.shoppingList).toEqual(['basil', 'walnuts']);
  });

  it('should never keep a pick that contains an excluded allergen', async () => {
    const prawns = makeRecipe({ id: 's-prawn', category: 'second_course', name: 'Garlic Prawns', allergens: ['shellfish'] });
    const desserts = fullMenuRecipes().filter(recipe => recipe.category === 'dessert');

    const menu = await new Composer().compose(
      makeRequirements({ allergens: ['shellfish'] }),
      candidatesFrom([prawns, ...desserts])
    );

    expect(menu.courses.second_course).toEqual([]);
    expect(menu.unavailable).toContainEqual({ category: 'second_course', reason: 'Garlic Prawns contains shellfish' });
  });

  it('should avoid repeating the main ingredient of an earlier course', async () => {
    const linguine = makeRecipe({
      id: 'm-salmon',
      category: 'main_dish',
      name: 'Salmon Linguine',
      ingredients: ['salmon', 'linguine']
    });
    const bakedSalmon = makeRecipe({
      id: 's-salmon',
      category: 'second_course',
      name: 'Baked Salmon',
      ingredients: ['salmon', 'dill']
    });
    const beef = makeRecipe({ id: 's-beef', category: 'second_course', name: 'Braised Beef', ingredients: ['beef'] });

    const menu = await new Composer(undefined, { planningInterval: 1 }).compose(
      makeRequirements(),
      candidatesFrom([linguine, bakedSalmon, beef])
    );

    expect(menu.courses.second_course.map(candidate => candidate.recipe.id)).toEqual(['s-beef']);
  });

  it('should fail when no category has a usable recipe', async () => {
    const attempt = new Composer().compose(makeRequirements(), candidatesFrom([]));

    await expect(attempt).rejects.toBeInstanceOf(CompositionError);
    await expect(attempt).rejects.toThrow(
      'No course could be planned: every category came back without a usable recipe'
    );
  });

  it('should use the notes the model records', async () => {
    const model = new ScriptedModel([toolCall('record_menu_notes', { pairingNotes: ['Prosecco with the tapenade'] })]);

    const menu = await new Composer(model).compose(
      makeRequirements({
        guestCount: 4,
        allergens: ['sesame'],
        restrictions: ['vegetarian'],
        restrictionGuests: { vegetarian: 2 },
        maxPrepTimeMinutes: 20
      }),
      candidatesFrom(fullMenuRecipes())
    );

    expect(menu.pairingNotes).toEqual(['Prosecco with the tapenade']);
    expect(model.calls[0]?.policy).toBe('forced-first-call');
    const prompt = model.calls[0]?.request.prompt;
    expect(prompt).toContain('- Appetizer: Olive Tapenade');
    expect(prompt).toContain('Dietary restrictions: vegetarian (2 guests)');
    expect(prompt).toContain('Allergens excluded: sesame');
    expect(prompt).toContain('Cooking limits: prep under 20 min');
  });

  it('should leave a course out when its only recipe cooks too long', async () => {
    const menu = await new Composer().compose(
      makeRequirements({ maxCookTimeMinutes: 40 }),
      candidatesFrom(fullMenuRecipes())
    );

    expect(menu.courses.second_course).toEqual([]);
    expect(menu.unavailable).toEqual([
      { category: 'second_course', reason: 'Roast Squash takes 45 min to cook, over 40' }
    ]);
    expect(menu.courses.main_dish.map(candidate => candidate.recipe.id)).toEqual(['m1']);
  });

  it('should hand back a menu that cannot be changed', async () => {
    const menu = await new Composer().compose(makeRequirements(), candidatesFrom(fullMenuRecipes()));
    const extra = makeCandidate(makeRecipe({ id: 'x', category: 'appetizer' }));

    expect(() => Array.prototype.push.call(menu.courses.appetizer, extra)).toThrow(TypeError);
    expect(Object.isFrozen(menu.courses)).toBe(true);
    expect(Object.isFrozen(menu.unavailable)).toBe(true);
    expect(Object.isFrozen(menu.shoppingList)).toBe(true);
    expect(menu.courses.appetizer).toHaveLength(1);
  });

  it('should fall back to default notes when the model fails', async () => {
    const menu = await new Composer(new ScriptedModel([new Error('overloaded')])).compose(
      makeRequirements(),
      candidatesFrom(fullMenuRecipes())
    );

    expect(menu.pairingNotes).toHaveLength(3);
    expect(menu.pairingNotes[2]).toBe('Finish with Poached Pears and coffee.');
  });

  it('should fetch candidates through the dispatch hooks before composing', async () => {
    const calls: string[] = [];

    const menu = await new Composer().planWithAgents(makeRequirements({ guestCount: 2 }), {
      retrieveAll: async () => {
        calls.push('retrieveAll');
        return candidatesFrom(fullMenuRecipes());
      },
      beforeCompose: () => {
        calls.push('beforeCompose');
      }
    });

    expect(calls).toEqual(['retrieveAll', 'beforeCompose']);
    expect(menu.title).toBe('Dinner for 2');
  });
});
