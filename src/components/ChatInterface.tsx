import React, { useState, useCallback, useRef } from 'react';
import { Box, Text, useInput, useApp } from 'ink';
import TextInput from 'ink-text-input';
import { Message, ProgressEvent } from '../types';
import { PlanningCoordinator } from '../lib/PlanningCoordinator';
import { handleCommand, SessionSettings } from '../lib/commands';
import { describeEvent, describeResult } from '../lib/formatMenu';

interface ChatInterfaceProps {
  coordinator: PlanningCoordinator;
}

const WELCOME =
  "🍽️ Welcome! I'll plan a four-course dinner for you.\n\n" +
  'Tell me about your dinner, for example:\n' +
  '- How many guests are coming?\n' +
  '- Is anyone vegetarian, vegan or gluten-free?\n' +
  '- Any allergies I should avoid?\n\n' +
  'Type /help for commands.';

export const ChatInterface: React.FC<ChatInterfaceProps> = ({ coordinator }) => {
  const { exit } = useApp();
  const [messages, setMessages] = useState<Message[]>([
    { role: 'assistant', content: WELCOME, timestamp: new Date() }
  ]);
  const [input, setInput] = useState('');
  const [isLoading, setIsLoading] = useState(false);
  const [progress, setProgress] = useState<string[]>([]);
  const settings = useRef<SessionSettings>({ nativeDispatch: false }).current;
  const [statusMessage, setStatusMessage] = useState('Describe your dinner to get started...');

  useInput((value, key) => {
    if (key.escape || (key.ctrl && value === 'c')) {
      exit();
    }
  });

  const reply = (content: string) => {
    setMessages(prev => [...prev, { role: 'assistant', content, timestamp: new Date() }]);
  };

  const handleSubmit = useCallback(async () => {
    const text = input.trim();
    if (text === '' || isLoading) return;

    setMessages(prev => [...prev, { role: 'user', content: text, timestamp: new Date() }]);
    setInput('');
    setIsLoading(true);
    setProgress([]);

    try {
      const commandReply = await handleCommand(text, coordinator, settings);
      if (commandReply !== undefined) {
        reply(commandReply);
        setStatusMessage(`Native dispatch: ${settings.nativeDispatch ? 'on' : 'off'}`);
        return;
      }

      setStatusMessage('Planning...');
      const onEvent = (event: ProgressEvent) => {
        setProgress(prev => [...prev, describeEvent(event)]);
      };
      const result = await coordinator.runStreaming(text, onEvent, { nativeDispatch: settings.nativeDispatch });

      let content = describeResult(result);
      if (result.status === 'success' || result.status === 'partial') {
        const questions = coordinator.followUpQuestions(result.requirements);
        if (questions.length > 0) {
          content += `\n\nTo refine the menu:\n${questions.map(question => `• ${question}`).join('\n')}`;
        }
      }
      reply(content);
      setStatusMessage(result.status === 'failed' ? 'Something went wrong, please try again...' : 'Ready');
    } catch (error) {
      reply(`Sorry, something went wrong: ${error instanceof Error ? error.message : 'unknown error'}`);
      setStatusMessage('Something went wrong, please try again...');
    } finally {
      setIsLoading(false);
    }
  }, [input, isLoading, coordinator, settings]);

  const formatMessage = (message: Message): string => {
    const time = message.timestamp.toLocaleTimeString('en-GB', {
      hour: '2-digit',
      minute: '2-digit'
    });
    const prefix = message.role === 'user' ? '👤 You' : '🤖 Planner';
    return `[${time}] ${prefix}: ${message.content}`;
  };

  return (
    <Box flexDirection="column" height="100%">
      <Box borderStyle="double" borderColor="green" padding={1} marginBottom={1}>
        <Text bold color="green">
          🍽️ Dinner Menu Planner
        </Text>
      </Box>

      <Box flexDirection="column" flexGrow={1} marginBottom={1} paddingX={1}>
        {messages.map((message, index) => (
          <Box key={index} marginBottom={1}>
            <Text wrap="wrap" color={message.role === 'user' ? 'cyan' : 'white'}>
              {formatMessage(message)}
            </Text>
          </Box>
        ))}
        {isLoading && (
          <Box flexDirection="column">
            {progress.map((line, index) => (
              <Text key={index} color="yellow">
                {line}
              </Text>
            ))}
          </Box>
        )}
      </Box>

      <Box borderStyle="single" borderColor="blue" padding={1}>
        <Box flexDirection="column" width="100%">
          <Box marginBottom={1}>
            <Text color="blue" bold>
              Message:{' '}
            </Text>
            <TextInput
              value={input}
              onChange={setInput}
              onSubmit={() => {
                void handleSubmit();
              }}
              placeholder="e.g. 8 guests, two vegetarians, no nuts"
              focus={!isLoading}
            />
          </Box>
          <Box>
            <Text color="gray" dimColor>
              Status: {statusMessage} | Esc or Ctrl+C to quit
            </Text>
          </Box>
        </Box>
      </Box>
    </Box>
  );
};

export default ChatInterface;
