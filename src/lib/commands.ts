import * as fs from 'fs/promises';
import type { PlanningCoordinator } from './PlanningCoordinator';

export interface SessionSettings {
  nativeDispatch: boolean;
}

export const HELP_TEXT = [
  'Commands:',
  '  /reset          forget everything said so far',
  '  /save <file>    save the conversation',
  '  /load <file>    restore a saved conversation',
  '  /reload <file>  load a different recipe corpus',
  '  /native         toggle native dispatch (the Composer calls the retrievers)',
  '  /help           show this list'
].join('\n');

/**
 * Runs a slash command typed into one of the front ends. Returns the reply,
 * or undefined when the input is a normal planning request.
 */
export async function handleCommand(
  input: string,
  coordinator: PlanningCoordinator,
  settings: SessionSettings
): Promise<string | undefined> {
  if (!input.startsWith('/')) {
    return undefined;
  }

  const [command = '', ...rest] = input.trim().split(/\s+/);
  const argument = rest.join(' ');

  try {
    switch (command) {
      case '/reset':
        coordinator.conversation.clear();
        return 'Conversation cleared. Tell me about your dinner.';

      case '/save':
        if (!argument) return 'Usage: /save <file>';
        await fs.writeFile(argument, coordinator.conversation.serialize(), 'utf-8');
        return `Conversation saved to ${argument}`;

      case '/load': {
        if (!argument) return 'Usage: /load <file>';
        const content = await fs.readFile(argument, 'utf-8');
        const conversation = coordinator.restoreConversation(content);
        return `Conversation restored (${conversation.snapshot().length} turns)`;
      }

      case '/reload': {
        if (!argument) return 'Usage: /reload <file>';
        const count = await coordinator.reload(argument);
        return `Recipe corpus reloaded: ${count} recipes`;
      }

      case '/native':
        settings.nativeDispatch = !settings.nativeDispatch;
        return `Native dispatch ${settings.nativeDispatch ? 'on' : 'off'}`;

      case '/help':
        return HELP_TEXT;

      default:
        return `Unknown command ${command}. Type /help for the list.`;
    }
  } catch (error) {
    return `${command} failed: ${error instanceof Error ? error.message : String(error)}`;
  }
}
