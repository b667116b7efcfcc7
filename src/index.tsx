#!/usr/bin/env node

import React from 'react';
import { render } from 'ink';
import { ChatInterface } from './components/ChatInterface';
import { PlanningCoordinator } from './lib/PlanningCoordinator';
import { ConfigManager } from './lib/ConfigManager';

async function main() {
  try {
    console.log('🍽️ Starting the dinner menu planner...');

    const configManager = ConfigManager.getInstance();
    const validation = configManager.validateConfig();

    if (!validation.isValid) {
      console.error('❌ Configuration is invalid:');
      validation.errors.forEach(error => console.error(`  - ${error}`));
      process.exit(1);
    }
    configManager.describe().forEach(line => console.log(`   ${line}`));

    console.log('📚 Loading the recipe corpus...');
    const coordinator = await PlanningCoordinator.create(configManager);

    console.log('🚀 Ready.\n');
    render(<ChatInterface coordinator={coordinator} />);
  } catch (error) {
    console.error('❌ Startup failed:', error);
    console.error('   Build a corpus with: npm run build-corpus');
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  console.log('\n👋 Goodbye!');
  process.exit(0);
});

process.on('SIGTERM', () => {
  console.log('\n👋 Goodbye!');
  process.exit(0);
});

main().catch(error => {
  console.error('❌ Unhandled error:', error);
  process.exit(1);
});
