import Anthropic from '@anthropic-ai/sdk';
import { ChatMessage } from '../../types/provider';
import { ServiceError } from '../../utils/errors';
import { BaseAIAdapter, Completion, CompletionOptions, ProviderConfig } from './ai.adapter';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-latest';

export interface AnthropicAdapterConfig extends ProviderConfig {
  apiKey: string;
}

export class AnthropicAdapter extends BaseAIAdapter {
  readonly name = 'anthropic';
  private client: Anthropic;

  constructor(config: AnthropicAdapterConfig) {
    super(DEFAULT_ANTHROPIC_MODEL, config);
    if (!config.apiKey) {
      throw new ServiceError('anthropic', 'init', new Error('Missing Anthropic API key'), false);
    }
    this.client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
  }

  protected async complete(messages: ChatMessage[], options: CompletionOptions, signal: AbortSignal): Promise<Completion> {
    // System text travels as its own parameter; turns are user/assistant only.
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const turns: Anthropic.MessageParam[] = messages
      .filter((m) => m.role !== 'system')
      .map((m) => ({ role: m.role === 'assistant' ? 'assistant' : 'user', content: m.content }));

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        system: system || undefined,
        messages: turns,
      },
      { signal }
    );

    const content = response.content.map((block) => (block.type === 'text' ? block.text : '')).join('');
    return {
      content,
      tokensUsed: response.usage.input_tokens + response.usage.output_tokens,
    };
  }

  protected async ping(signal: AbortSignal): Promise<void> {
    await this.client.messages.create(
      { model: this.model, max_tokens: 1, messages: [{ role: 'user', content: 'ping' }] },
      { signal }
    );
  }
}
