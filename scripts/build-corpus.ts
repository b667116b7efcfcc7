import * as dotenv from 'dotenv';
import { RecipeParser } from './data-processing/RecipeParser';
import { CorpusWriter } from './data-processing/CorpusWriter';
import { RecipeTagger } from '../src/agents/RecipeTagger';
import { ConfigManager } from '../src/lib/ConfigManager';
import { createOpenAIProvider, getModelFromProvider } from '../src/lib/OpenAIClient';

dotenv.config();

async function main() {
  const [sourceDir = './recipes', dataDir = './data'] = process.argv.slice(2);

  console.log('=== Recipe Corpus Build ===\n');

  console.log(`📖 Step 1: Parsing markdown recipes from ${sourceDir}...`);
  const parser = new RecipeParser(sourceDir);
  const rawRecipes = await parser.parseAllRecipes();
  console.log(`Parsed ${rawRecipes.length} recipes\n`);

  console.log('🏷️  Step 2: Tagging recipes...');
  const configManager = ConfigManager.getInstance();
  const modelConfig = configManager.getModelConfig('recipe_tagging');
  const model = modelConfig.apiKey
    ? getModelFromProvider(createOpenAIProvider(modelConfig), modelConfig.model)
    : undefined;
  if (!model) {
    console.warn('OPENAI_API_KEY is not set, using keyword-based tags only');
  }
  const tagger = new RecipeTagger(model, { temperature: modelConfig.temperature });
  const writer = new CorpusWriter(dataDir);

  const existing = await writer.loadExisting();
  console.log(`Found ${Object.keys(existing).length} existing records`);
  const records = await tagger.tagRecipesIncremental(rawRecipes, existing);
  console.log(`Tagged ${records.length} recipes\n`);

  console.log('💾 Step 3: Writing the corpus...');
  await writer.write(records);

  console.log('\n✅ Corpus built. Start the planner with: npm start');
}

process.on('SIGINT', () => {
  console.log('\n\n🛑 Process interrupted by user');
  process.exit(0);
});

if (require.main === module) {
  main().catch(error => {
    console.error('❌ Error in corpus build:', error);
    process.exit(1);
  });
}
