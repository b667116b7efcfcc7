import * as fs from 'fs/promises';
import * as path from 'path';
import { RecipeRecord, RecipeRecordSchema } from '../../src/lib/schemas';

export interface CorpusStatisticsFile {
  totalRecipes: number;
  categories: Record<string, number>;
  difficulty: Record<string, number>;
  dietaryTags: Record<string, number>;
  allergens: Record<string, number>;
  generatedAt: string;
}

function count(into: Record<string, number>, key: string): void {
  into[key] = (into[key] || 0) + 1;
}

export function buildStatistics(records: RecipeRecord[], generatedAt: Date = new Date()): CorpusStatisticsFile {
  const stats: CorpusStatisticsFile = {
    totalRecipes: records.length,
    categories: {},
    difficulty: {},
    dietaryTags: {},
    allergens: {},
    generatedAt: generatedAt.toISOString()
  };

  records.forEach(record => {
    count(stats.categories, record.category);
    count(stats.difficulty, record.difficulty);
    record.dietaryTags.forEach(tag => count(stats.dietaryTags, tag));
    record.allergens.forEach(allergen => count(stats.allergens, allergen));
  });

  return stats;
}

export class CorpusWriter {
  private readonly dataDir: string;

  constructor(dataDir: string = './data') {
    this.dataDir = dataDir;
  }

  get recipesPath(): string {
    return path.join(this.dataDir, 'recipes.json');
  }

  async write(records: RecipeRecord[]): Promise<void> {
    console.log(`Writing corpus with ${records.length} recipes...`);
    await fs.mkdir(this.dataDir, { recursive: true });

    const sorted = [...records].sort((a, b) => a.id.localeCompare(b.id));
    const statsPath = path.join(this.dataDir, 'statistics.json');

    await Promise.all([
      fs.writeFile(this.recipesPath, JSON.stringify(sorted, null, 2), 'utf-8'),
      fs.writeFile(statsPath, JSON.stringify(buildStatistics(sorted), null, 2), 'utf-8')
    ]);

    console.log(`- ${this.recipesPath} (${sorted.length} recipes)`);
    console.log(`- ${statsPath}`);
  }

  /** Previously built records keyed by id; an absent or unreadable corpus means a fresh build. */
  async loadExisting(): Promise<Record<string, RecipeRecord>> {
    let content: string;
    try {
      content = await fs.readFile(this.recipesPath, 'utf-8');
    } catch {
      console.log('No existing corpus found, starting fresh...');
      return {};
    }

    const data: unknown = JSON.parse(content);
    const records: Record<string, RecipeRecord> = {};
    if (Array.isArray(data)) {
      data.forEach(entry => {
        const parsed = RecipeRecordSchema.safeParse(entry);
        if (parsed.success) records[parsed.data.id] = parsed.data;
      });
    }
    return records;
  }
}
