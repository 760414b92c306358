import { MessageRole } from './conversation';
import { ExtractedData, ExtractionSchema } from './qualification';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface GenerateOptions {
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface ModelInfo {
  provider: string;
  model: string;
  capabilities: {
    chat: boolean;
    extraction: boolean;
  };
}

export interface ProviderStats {
  provider: string;
  model: string;
  totalRequests: number;
  totalTokens: number;
  errors: number;
}

export interface AIProvider {
  readonly name: string;
  readonly model: string;
  generateResponse(messages: ChatMessage[], options?: GenerateOptions): Promise<string>;
  extractStructuredData(text: string, schema: ExtractionSchema, options?: GenerateOptions): Promise<ExtractedData>;
  healthCheck(): Promise<boolean>;
  getModelInfo(): ModelInfo;
  getStats(): ProviderStats;
}
