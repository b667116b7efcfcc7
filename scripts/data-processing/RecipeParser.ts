import * as fs from 'fs/promises';
import * as path from 'path';
import * as crypto from 'crypto';
import { RawRecipe, RECIPE_CATEGORIES, RecipeCategory } from '../../src/types';

const CATEGORY_ALIASES: Record<string, RecipeCategory> = {
  appetizer: 'appetizer',
  appetizers: 'appetizer',
  starter: 'appetizer',
  starters: 'appetizer',
  main: 'main_dish',
  mains: 'main_dish',
  main_dish: 'main_dish',
  'main dish': 'main_dish',
  pasta: 'main_dish',
  second_course: 'second_course',
  'second course': 'second_course',
  secondi: 'second_course',
  dessert: 'dessert',
  desserts: 'dessert',
  sweet: 'dessert'
};

export function toCategory(value: string | undefined): RecipeCategory | undefined {
  if (!value) return undefined;
  const key = value.trim().toLowerCase().replace(/-/g, '_');
  return CATEGORY_ALIASES[key] ?? CATEGORY_ALIASES[key.replace(/_/g, ' ')] ?? RECIPE_CATEGORIES.find(category => category === key);
}

export function slugify(name: string): string {
  return name
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

function section(content: string, heading: string): string | undefined {
  const match = content.match(new RegExp(`^##\\s*${heading}\\s*\\n([\\s\\S]*?)(?=^##\\s|(?![\\s\\S]))`, 'im'));
  return match?.[1]?.trim();
}

function listItems(block: string | undefined): string[] {
  if (!block) return [];
  return block
    .split('\n')
    .map(line => line.replace(/^\s*(?:[-*+]|\d+[.)])\s*/, '').trim())
    .filter(line => line.length > 0);
}

function field(content: string, name: string): string | undefined {
  const match = content.match(new RegExp(`^${name}:\\s*(.+)$`, 'im'));
  return match?.[1]?.trim();
}

function numberField(content: string, name: string): number | undefined {
  const value = field(content, name);
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Parses one markdown recipe:
 *
 *     # Name
 *     Category: dessert
 *     Servings: 6
 *     Prep: 15
 *     Cook: 30
 *     Traditional: yes
 *
 *     Free description text.
 *
 *     ## Ingredients
 *     - ...
 *     ## Instructions
 *     1. ...
 *
 * Returns null when the title or a known category is missing.
 */
export function parseRecipeMarkdown(content: string, sourceFile: string, fallbackCategory?: string): RawRecipe | null {
  const name = content.match(/^#\s+(.+)$/m)?.[1]?.trim();
  const category = toCategory(field(content, 'Category') ?? fallbackCategory);
  if (!name || !category) {
    return null;
  }

  const header = content.split(/^##\s/m)[0] ?? '';
  const description = header
    .split('\n')
    .filter(line => !/^#\s/.test(line) && !/^\w+:\s/.test(line))
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim();

  const traditional = field(content, 'Traditional');

  return {
    id: `${category}-${slugify(name)}`,
    name,
    description,
    category,
    ingredients: listItems(section(content, 'Ingredients')),
    instructions: listItems(section(content, 'Instructions')),
    servings: numberField(content, 'Servings'),
    prepTimeMinutes: numberField(content, 'Prep'),
    cookTimeMinutes: numberField(content, 'Cook'),
    traditional: traditional === undefined ? undefined : /^(yes|true)$/i.test(traditional),
    sourceFile,
    contentHash: crypto.createHash('sha256').update(content, 'utf-8').digest('hex')
  };
}

export class RecipeParser {
  private readonly sourceDir: string;

  constructor(sourceDir: string = './recipes') {
    this.sourceDir = sourceDir;
  }

  /** Reads every .md file under the source directory; sub-directory names act as the default category. */
  async parseAllRecipes(): Promise<RawRecipe[]> {
    const items = await fs.readdir(this.sourceDir, { withFileTypes: true });
    const recipes: RawRecipe[] = [];

    for (const item of items) {
      const itemPath = path.join(this.sourceDir, item.name);
      if (item.isFile() && item.name.endsWith('.md')) {
        const recipe = await this.parseRecipeFile(itemPath);
        if (recipe) recipes.push(recipe);
      } else if (item.isDirectory() && !item.name.startsWith('.')) {
        console.log(`Processing category: ${item.name}`);
        const files = await fs.readdir(itemPath);
        for (const file of files.filter(name => name.endsWith('.md')).sort()) {
          const recipe = await this.parseRecipeFile(path.join(itemPath, file), item.name);
          if (recipe) recipes.push(recipe);
        }
      }
    }

    return recipes;
  }

  private async parseRecipeFile(filePath: string, fallbackCategory?: string): Promise<RawRecipe | null> {
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      const recipe = parseRecipeMarkdown(content, path.relative(this.sourceDir, filePath), fallbackCategory);
      if (!recipe) {
        console.warn(`Skipping ${filePath}: no title or unknown category`);
      }
      return recipe;
    } catch (error) {
      console.error(`Error parsing recipe file ${filePath}:`, error);
      return null;
    }
  }
}
