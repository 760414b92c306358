import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { ChatMessage } from '../../types/provider';
import { ServiceError } from '../../utils/errors';
import { BaseAIAdapter, Completion, CompletionOptions, ProviderConfig } from './ai.adapter';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

export interface OpenAIAdapterConfig extends ProviderConfig {
  apiKey: string;
  organization?: string;
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}

export class OpenAIAdapter extends BaseAIAdapter {
  readonly name = 'openai';
  private client: OpenAI;

  constructor(config: OpenAIAdapterConfig) {
    super(DEFAULT_OPENAI_MODEL, config);
    if (!config.apiKey) {
      throw new ServiceError('openai', 'init', new Error('Missing OpenAI API key'), false);
    }
    // Retries are handled by the base adapter.
    this.client = new OpenAI({ apiKey: config.apiKey, organization: config.organization, maxRetries: 0 });
  }

  protected async complete(messages: ChatMessage[], options: CompletionOptions, signal: AbortSignal): Promise<Completion> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: messages.map(toOpenAIMessage),
        temperature: options.temperature,
        max_tokens: options.maxTokens,
      },
      { signal }
    );

    return {
      content: response.choices[0]?.message?.content ?? '',
      tokensUsed: response.usage?.total_tokens ?? 0,
    };
  }

  protected async ping(signal: AbortSignal): Promise<void> {
    await this.client.models.retrieve(this.model, { signal });
  }
}
