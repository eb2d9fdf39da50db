import Anthropic from '@anthropic-ai/sdk';

import type { AppConfig } from '../config';
import { InferenceUnavailableError } from '../errors';
import type { EncodedImage } from '../image/encoder';

export interface VisionRequest {
  prompt: string;
  image: EncodedImage;
}

/** A hosted multimodal model: image and prompt in, text out. */
export interface VisionClient {
  complete(request: VisionRequest): Promise<string>;
}

export interface VisionModelSettings {
  model: string;
  temperature: number;
  maxTokens: number;
}

interface CompletionBlock {
  type: string;
  text?: string;
}

/** The slice of the SDK's `messages` resource this client calls. */
export interface MessagesApi {
  create(body: Anthropic.MessageCreateParamsNonStreaming): PromiseLike<{ content: CompletionBlock[] }>;
}

export class AnthropicVisionClient implements VisionClient {
  constructor(
    private readonly messages: MessagesApi,
    private readonly settings: VisionModelSettings,
  ) {}

  async complete({ prompt, image }: VisionRequest): Promise<string> {
    let message: { content: CompletionBlock[] };
    try {
      message = await this.messages.create({
        model: this.settings.model,
        max_tokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
        messages: [
          {
            role: 'user',
            content: [
              {
                type: 'image',
                source: { type: 'base64', media_type: image.mediaType, data: image.data },
              },
              { type: 'text', text: prompt },
            ],
          },
        ],
      });
    } catch (error) {
      throw toInferenceError(error);
    }

    return message.content
      .map((block) => (block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
      .join('')
      .trim();
  }
}

export function toInferenceError(error: unknown): InferenceUnavailableError {
  if (error instanceof InferenceUnavailableError) return error;

  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new InferenceUnavailableError('timeout', 'Vision model request timed out', { cause: error });
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new InferenceUnavailableError('network', 'Could not reach the vision model', { cause: error });
  }
  if (error instanceof Anthropic.APIError) {
    switch (error.status) {
      case 401:
      case 403:
        return new InferenceUnavailableError('authentication', 'Vision model rejected the API credentials', {
          cause: error,
        });
      case 429:
        return new InferenceUnavailableError('rate_limited', 'Vision model rate limit reached', { cause: error });
      default:
        return new InferenceUnavailableError(
          'upstream',
          `Vision model request failed${error.status ? ` with status ${error.status}` : ''}`,
          { cause: error },
        );
    }
  }
  return new InferenceUnavailableError('upstream', 'Vision model request failed', { cause: error });
}

/**
 * One SDK client per process. The SDK's own retries are switched off: a
 * failed call fails the request.
 */
export function createAnthropicVisionClient(
  config: Pick<AppConfig, 'anthropicApiKey' | 'vision'>,
): AnthropicVisionClient {
  const anthropic = new Anthropic({
    apiKey: config.anthropicApiKey,
    maxRetries: 0,
    timeout: config.vision.timeoutMs,
  });
  return new AnthropicVisionClient(anthropic.messages, {
    model: config.vision.model,
    temperature: config.vision.temperature,
    maxTokens: config.vision.maxTokens,
  });
}
