import { AIProvider } from '../../types/provider';
import { ProviderConfig } from './ai.adapter';
import { AnthropicAdapter } from './anthropic.adapter';
import { OpenAIAdapter } from './openai.adapter';

export type AIProviderName = 'openai' | 'anthropic';

export interface AIFactoryConfig extends ProviderConfig {
  apiKey?: string;
  organization?: string;
}

export class AIFactory {
  static create(provider: string, config: AIFactoryConfig): AIProvider {
    switch (provider) {
      case 'openai':
        return new OpenAIAdapter({ ...config, apiKey: config.apiKey ?? '' });
      case 'anthropic':
        return new AnthropicAdapter({ ...config, apiKey: config.apiKey ?? '' });
      default:
        throw new Error(`Unsupported AI provider: ${provider}`);
    }
  }
}
