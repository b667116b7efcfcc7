#!/usr/bin/env node

import * as readline from 'readline';
import { PlanningCoordinator } from './lib/PlanningCoordinator';
import { ConfigManager } from './lib/ConfigManager';
import { handleCommand, SessionSettings } from './lib/commands';
import { describeEvent, describeResult } from './lib/formatMenu';

async function answer(input: string, coordinator: PlanningCoordinator, settings: SessionSettings): Promise<void> {
  const commandReply = await handleCommand(input, coordinator, settings);
  if (commandReply !== undefined) {
    console.log(`🤖 ${commandReply}\n`);
    return;
  }

  console.log('');
  // Async-stream mode: progress lines print as each stage finishes.
  for await (const item of coordinator.runAsyncStreaming(input, { nativeDispatch: settings.nativeDispatch })) {
    if (item.kind === 'event') {
      console.log(`   ${describeEvent(item.event)}`);
      continue;
    }

    const result = item.result;
    console.log(`\n🤖 ${describeResult(result)}\n`);
    if (result.status === 'success' || result.status === 'partial') {
      coordinator.followUpQuestions(result.requirements).forEach(question => console.log(`   • ${question}`));
      console.log('');
    }
  }
}

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

    const coordinator = await PlanningCoordinator.create(configManager);
    const settings: SessionSettings = { nativeDispatch: false };

    console.log('\n🎉 Ready! Tell me about your dinner: guests, dietary needs, allergies.');
    console.log('💡 Type /help for commands, "exit" or Ctrl+C to quit\n');

    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: '👤 You: '
    });

    rl.prompt();

    rl.on('line', input => {
      const userInput = input.trim();

      if (userInput === 'quit' || userInput === 'exit') {
        rl.close();
        return;
      }

      if (userInput === '') {
        rl.prompt();
        return;
      }

      rl.pause();
      void answer(userInput, coordinator, settings)
        .catch(error => {
          console.error(`\n❌ Request failed: ${error instanceof Error ? error.message : 'unknown error'}\n`);
        })
        .finally(() => {
          rl.resume();
          rl.prompt();
        });
    });

    rl.on('close', () => {
      console.log('\n👋 Goodbye!');
      process.exit(0);
    });
  } catch (error) {
    console.error('❌ Startup failed:', error);
    process.exit(1);
  }
}

main().catch(error => {
  console.error('❌ Unhandled error:', error);
  process.exit(1);
});
