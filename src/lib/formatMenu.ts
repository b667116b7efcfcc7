import type { Menu, PlanResult, ProgressEvent, RequirementSet } from '../types';
import { RECIPE_CATEGORIES } from '../types';
import { COURSE_PROFILES } from '../agents/CategoryRetriever';
import { describeLimits, describeRestrictions } from './ConversationState';

function formatTag(tag: string): string {
  return tag.replace('_', '-');
}

function requirementLines(requirements: RequirementSet): string[] {
  const lines: string[] = [];
  const restrictions = describeRestrictions(requirements);
  if (restrictions) lines.push(`Dietary needs: ${restrictions}`);
  if (requirements.allergens.length > 0) lines.push(`Free of: ${requirements.allergens.join(', ')}`);
  const limits = describeLimits(requirements);
  if (limits.length > 0) lines.push(`Limits: ${limits.join(', ')}`);
  return lines;
}

export function formatMenu(menu: Menu, requirements?: RequirementSet): string {
  const header = requirements ? requirementLines(requirements) : [];
  const lines: string[] = [`${menu.title} (${menu.guestCount} guests)`, ...header, ''];
  let prep = 0;
  let cook = 0;

  for (const category of RECIPE_CATEGORIES) {
    lines.push(`${COURSE_PROFILES[category].label}:`);
    const picks = menu.courses[category];

    if (picks.length === 0) {
      const reason = menu.unavailable.find(entry => entry.category === category)?.reason ?? 'no recipe found';
      lines.push(`  (unavailable: ${reason})`);
      continue;
    }

    picks.forEach(({ recipe, provenance }) => {
      const tags = recipe.dietaryTags.length > 0 ? ` (${recipe.dietaryTags.map(formatTag).join(', ')})` : '';
      const source = provenance === 'discovered' ? ' [found online]' : '';
      lines.push(`  - ${recipe.name}${tags}${source}`);
      prep += recipe.prepTimeMinutes ?? 0;
      cook += recipe.cookTimeMinutes ?? 0;
    });
  }

  const section = (title: string, entries: readonly string[]) => {
    if (entries.length === 0) return;
    lines.push('', `${title}:`, ...entries.map(entry => `  - ${entry}`));
  };

  section('Pairing notes', menu.pairingNotes);
  section('Timeline', menu.timeline);
  if (menu.shoppingList.length > 0) {
    lines.push('', 'Shopping list:', `  ${menu.shoppingList.join(', ')}`);
  }

  lines.push('', `Total time: ${prep} min prep, ${cook} min cook`);
  return lines.join('\n');
}

export function describeResult(result: PlanResult): string {
  switch (result.status) {
    case 'success':
      return formatMenu(result.menu, result.requirements);
    case 'partial': {
      const missing = result.unmet
        .map(entry => `${COURSE_PROFILES[entry.category].label} (${entry.reason})`)
        .join('; ');
      return `${formatMenu(result.menu, result.requirements)}\n\nStill missing: ${missing}`;
    }
    case 'failed':
      return `Could not plan a menu (${result.stage}): ${result.error.message}`;
    case 'cancelled':
      return `Planning cancelled before ${result.stage}.`;
  }
}

export function describeEvent(event: ProgressEvent): string {
  const scope = event.category ? `${event.stage}/${event.category}` : event.stage;
  return `[${scope}] ${event.status}: ${event.payload.message}`;
}
