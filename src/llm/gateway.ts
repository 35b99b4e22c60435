/**
 * Model Gateway
 *
 * Front door for every model call in a research run. Retries transient
 * provider failures with exponential backoff and, when more than one
 * connection profile is configured, rotates round-robin across them on every
 * attempt. Exhausting the retry budget is fatal for the run.
 */
import type { ResearchConfig } from '../config/settings.js';
import { FatalProviderError, ModelError, TransientProviderError, UnexpectedProviderError, errorMessage } from '../utils/errors.js';
import { gatewayLogger, preview, type Logger } from '../utils/logger.js';
import { OllamaProvider } from './ollama.js';
import type { ChatProvider, GenerateRequest, ImageBlock, ModelClient, ModelResponse } from './types.js';
import { messageText } from './types.js';

export const IMAGE_DESCRIBER_PROMPT =
  'You describe images and documents for a research assistant. Give a factual, detailed description of what is shown, including any text, numbers, chart values and labels you can read.';

export interface GatewayOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  visionModel?: string;
  maxTokens?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export function computeBackoffDelay(retryCount: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** retryCount);
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class ModelGateway implements ModelClient {
  private readonly providers: readonly ChatProvider[];
  private readonly options: GatewayOptions;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private cursor = 0;

  constructor(providers: readonly ChatProvider[], options: GatewayOptions) {
    if (providers.length === 0) {
      throw new ModelError('ModelGateway needs at least one provider');
    }
    this.providers = providers;
    this.options = options;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? gatewayLogger;
  }

  get profileCount(): number {
    return this.providers.length;
  }

  /**
   * Picks the provider for the next attempt. Selection and cursor update
   * happen in one synchronous step, so concurrent callers on the event loop
   * never receive the same slot twice in a row.
   */
  private nextProvider(): ChatProvider {
    const provider = this.providers[this.cursor % this.providers.length];
    this.cursor = (this.cursor + 1) % this.providers.length;
    return provider;
  }

  async generateResponse(request: GenerateRequest): Promise<ModelResponse> {
    const { maxRetries, baseDelayMs, maxDelayMs } = this.options;
    let retryCount = 0;

    this.logger.debug(
      {
        model: request.modelId,
        systemPrompt: request.systemPrompt,
        messages: request.messages,
        inference: request.inference,
        tools: request.tools?.map((t) => t.name),
      },
      'Model request'
    );

    for (;;) {
      const provider = this.nextProvider();
      if (this.providers.length > 1) {
        this.logger.warn({ profile: provider.profile, attempt: retryCount + 1 }, 'Using connection profile');
      }

      try {
        const response = await provider.chat(request);
        this.logger.debug(
          {
            model: request.modelId,
            profile: provider.profile,
            stopReason: response.stopReason,
            usage: response.usage,
            text: preview(messageText(response.message), 2000),
            content: response.message.content,
          },
          'Model response'
        );
        return response;
      } catch (error) {
        if (!(error instanceof TransientProviderError)) {
          this.logger.error({ model: request.modelId, profile: provider.profile, error: errorMessage(error) }, 'Model call failed');
          throw error instanceof ModelError
            ? error
            : new UnexpectedProviderError(`Unexpected error: ${errorMessage(error)}`, { cause: error });
        }

        if (retryCount >= maxRetries) {
          this.logger.error({ model: request.modelId, maxRetries }, 'Maximum retries exceeded');
          throw new FatalProviderError(`Maximum retries (${maxRetries}) exceeded`, { cause: error });
        }

        const delay = computeBackoffDelay(retryCount, baseDelayMs, maxDelayMs);
        this.logger.warn(
          { model: request.modelId, profile: provider.profile, code: error.code, retry: retryCount + 1, delayMs: delay },
          'Transient provider error, backing off'
        );
        await this.sleep(delay);
        retryCount++;
      }
    }
  }

  /**
   * Asks the vision model to describe an image. Used when fetched content is
   * binary and cannot go through text extraction.
   */
  async describeImage(image: ImageBlock, name: string): Promise<string> {
    const model = this.options.visionModel;
    if (!model) {
      throw new ModelError('No vision model configured');
    }

    const response = await this.generateResponse({
      modelId: model,
      systemPrompt: IMAGE_DESCRIBER_PROMPT,
      messages: [
        {
          role: 'user',
          content: [image, { type: 'text', text: `Describe this file: ${name}` }],
        },
      ],
      inference: { temperature: 0, maxTokens: this.options.maxTokens },
    });

    return messageText(response.message).trim();
  }
}

export function createModelGateway(config: ResearchConfig, logger?: Logger): ModelGateway {
  const providers = config.connection.profiles.map(
    (profile) => new OllamaProvider(profile, { timeoutMs: config.connection.timeoutMs })
  );

  return new ModelGateway(providers, {
    maxRetries: config.connection.maxRetries,
    baseDelayMs: config.connection.baseDelayMs,
    maxDelayMs: config.connection.maxDelayMs,
    visionModel: config.models.vision,
    maxTokens: config.inference.maxTokens,
    logger,
  });
}
