import { AIProvider, ChatMessage, GenerateOptions, ModelInfo, ProviderStats } from '../../types/provider';
import { ExtractedData, ExtractionSchema } from '../../types/qualification';
import { ProviderError, ProviderTimeoutError, toError } from '../../utils/errors';
import { emptyExtraction, parseExtractedData } from '../../utils/extraction';
import { EXTRACTION_SYSTEM_PROMPT } from '../../utils/prompts';
import { Semaphore } from '../../utils/semaphore';
import { logger } from '../../utils/logger';

export interface ProviderConfig {
  model?: string;
  timeoutMs?: number;
  retryDelayMs?: number;
  maxConcurrency?: number;
  /** Share one ceiling across several adapters. */
  limiter?: Semaphore;
}

export interface Completion {
  content: string;
  tokensUsed: number;
}

export interface CompletionOptions {
  maxTokens: number;
  temperature: number;
}

export const MAX_RESPONSE_LENGTH = 10000;
const MAX_ATTEMPTS = 2;
const DEFAULT_TIMEOUT_MS = 15000;
const DEFAULT_RETRY_DELAY_MS = 1000;
const DEFAULT_MAX_CONCURRENCY = 4;

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Shared plumbing for text-generation backends: concurrency ceiling, per-call
 * timeout, one retry for transient failures, response validation and
 * degrade-to-null structured extraction. Subclasses only talk to their SDK.
 */
export abstract class BaseAIAdapter implements AIProvider {
  abstract readonly name: string;
  readonly model: string;

  protected readonly timeoutMs: number;
  protected readonly retryDelayMs: number;
  private readonly limiter: Semaphore;
  private stats = { totalRequests: 0, totalTokens: 0, errors: 0 };

  constructor(defaultModel: string, config: ProviderConfig = {}) {
    this.model = config.model ?? defaultModel;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryDelayMs = config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.limiter = config.limiter ?? new Semaphore(config.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
  }

  protected abstract complete(
    messages: ChatMessage[],
    options: CompletionOptions,
    signal: AbortSignal
  ): Promise<Completion>;

  protected abstract ping(signal: AbortSignal): Promise<void>;

  async generateResponse(messages: ChatMessage[], options: GenerateOptions = {}): Promise<string> {
    const completionOptions: CompletionOptions = {
      maxTokens: options.maxTokens ?? 150,
      temperature: options.temperature ?? 0.7,
    };

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      this.stats.totalRequests++;

      try {
        const completion = await this.limiter.run(() =>
          this.withTimeout((signal) => this.complete(messages, completionOptions, signal), options.signal)
        );
        this.stats.totalTokens += completion.tokensUsed;

        const content = completion.content.trim();
        if (!this.validateResponse(content)) {
          throw new ProviderError(
            this.name,
            'generateResponse',
            new Error(`Invalid response (${content.length} chars)`),
            'invalid_response',
            attempt
          );
        }

        logger.debug(`${this.name} response generated`, { model: this.model, attempt, tokens: completion.tokensUsed });
        return content;
      } catch (error) {
        this.stats.errors++;

        // Malformed output is not a transport problem; retrying would not help.
        if (error instanceof ProviderError) throw error;

        const cause = toError(error);
        const kind = error instanceof ProviderTimeoutError ? 'timeout' : 'transport';
        const retryable = this.isRetryable(error) && !options.signal?.aborted;

        if (!retryable || attempt >= MAX_ATTEMPTS) {
          logger.error(`${this.name} generateResponse failed`, { model: this.model, attempt, kind, error: cause.message });
          throw new ProviderError(this.name, 'generateResponse', cause, kind, attempt, retryable);
        }

        logger.warn(`${this.name} call failed, retrying`, { attempt, delay: this.retryDelayMs, kind, error: cause.message });
        await sleep(this.retryDelayMs);
      }
    }

    throw new ProviderError(this.name, 'generateResponse', new Error('Retry loop exhausted'), 'transport', MAX_ATTEMPTS);
  }

  async extractStructuredData(
    text: string,
    schema: ExtractionSchema,
    options: GenerateOptions = {}
  ): Promise<ExtractedData> {
    let raw: string;
    try {
      raw = await this.generateResponse(
        [
          { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
          { role: 'user', content: text },
        ],
        { maxTokens: 500, temperature: 0.1, signal: options.signal }
      );
    } catch (error) {
      if (error instanceof ProviderError && error.kind === 'invalid_response') {
        logger.warn(`${this.name} extraction returned an unusable reply`, { error: error.message });
        return emptyExtraction(schema);
      }
      throw error;
    }

    const data = parseExtractedData(raw, schema);
    if (!data) {
      logger.warn(`${this.name} extraction reply is not a JSON object`, { preview: raw.slice(0, 120) });
      return emptyExtraction(schema);
    }

    return data;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.withTimeout((signal) => this.ping(signal));
      return true;
    } catch (error) {
      logger.warn(`${this.name} health check failed`, { model: this.model, error: toError(error).message });
      return false;
    }
  }

  getModelInfo(): ModelInfo {
    return {
      provider: this.name,
      model: this.model,
      capabilities: { chat: true, extraction: true },
    };
  }

  getStats(): ProviderStats {
    return { provider: this.name, model: this.model, ...this.stats };
  }

  protected validateResponse(content: string): boolean {
    return content.length > 0 && content.length <= MAX_RESPONSE_LENGTH;
  }

  protected isRetryable(error: unknown): boolean {
    const status = statusOf(error);
    if (status === undefined) return true;
    return status === 408 || status === 409 || status === 429 || status >= 500;
  }

  private async withTimeout<T>(task: (signal: AbortSignal) => Promise<T>, outer?: AbortSignal): Promise<T> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();

    if (outer?.aborted) {
      controller.abort();
    } else {
      outer?.addEventListener('abort', forwardAbort, { once: true });
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ProviderTimeoutError(this.timeoutMs));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([task(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener('abort', forwardAbort);
    }
  }
}
