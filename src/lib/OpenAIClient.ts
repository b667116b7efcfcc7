import { createOpenAI, type OpenAIProvider } from '@ai-sdk/openai';
import { generateText, tool, type LanguageModel as SdkLanguageModel, type Tool } from 'ai';
import type { LanguageModel, ModelRequest, ModelResponse, ToolDefinition, ToolPolicy } from '../types';
import { ModelConfig } from './ConfigManager';

export function createOpenAIProvider(config: ModelConfig): OpenAIProvider {
  // If baseURL is provided, create a custom provider
  if (config.baseURL) {
    return createOpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });
  }

  return createOpenAI({
    apiKey: config.apiKey,
  });
}

export function getModelFromProvider(provider: OpenAIProvider, modelName: string): SdkLanguageModel {
  return provider(modelName);
}

function selectTools(tools: readonly ToolDefinition[], policy: ToolPolicy): readonly ToolDefinition[] {
  if (typeof policy === 'object') {
    return tools.filter(definition => policy.restrictTo.includes(definition.name));
  }
  return tools;
}

/**
 * LanguageModel backed by the Vercel AI SDK. Tools are declared without
 * `execute`, so the calls come back to the agent instead of being run here.
 */
export class OpenAILanguageModel implements LanguageModel {
  private readonly model: SdkLanguageModel;

  constructor(private readonly config: ModelConfig) {
    this.model = getModelFromProvider(createOpenAIProvider(config), config.model);
  }

  async complete(
    request: ModelRequest,
    tools: readonly ToolDefinition[],
    policy: ToolPolicy
  ): Promise<ModelResponse> {
    const offered = selectTools(tools, policy);
    const toolSet: Record<string, Tool> = {};
    for (const definition of offered) {
      toolSet[definition.name] = tool({
        description: definition.description,
        parameters: definition.parameters,
      });
    }
    const hasTools = offered.length > 0;

    const result = await generateText({
      model: this.model,
      system: request.system,
      prompt: request.prompt,
      tools: hasTools ? toolSet : undefined,
      toolChoice: hasTools ? (policy === 'forced-first-call' ? 'required' : 'auto') : undefined,
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
    });

    return {
      text: result.text,
      toolCalls: result.toolCalls.map(call => ({ toolName: call.toolName, args: call.args })),
    };
  }
}
