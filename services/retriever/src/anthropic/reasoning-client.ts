/**
 * Anthropic Reasoning Client
 * Single-shot completion used by the strategy classifier
 */

import Anthropic from '@anthropic-ai/sdk';
import type { RetrieverLogger } from '../utils/logger.js';

export interface ReasoningRequest {
  system: string;
  prompt: string;
}

export interface ReasoningCallOptions {
  signal?: AbortSignal;
  timeoutMs: number;
}

/**
 * Anything that turns a reasoning request into response text
 */
export interface ReasoningService {
  complete(request: ReasoningRequest, options: ReasoningCallOptions): Promise<string>;
}

export interface AnthropicReasoningClientOptions {
  apiKey: string | undefined;
  model: string;
  logger: RetrieverLogger;
  /** Transport-level retries performed by the SDK */
  maxRetries?: number;
  maxTokens?: number;
}

export class AnthropicReasoningClient implements ReasoningService {
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly logger: RetrieverLogger;

  constructor(options: AnthropicReasoningClientOptions) {
    if (!options.apiKey) {
      options.logger.warn('ANTHROPIC_API_KEY not set, strategy classification will fall back to defaults');
    }

    this.client = new Anthropic({
      apiKey: options.apiKey ?? '',
      maxRetries: options.maxRetries ?? 1,
    });
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 300;
    this.logger = options.logger;
  }

  async complete(request: ReasoningRequest, options: ReasoningCallOptions): Promise<string> {
    const startTime = Date.now();

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: 0.0, // Deterministic classification
        system: request.system,
        messages: [
          {
            role: 'user',
            content: request.prompt,
          },
        ],
      },
      {
        timeout: options.timeoutMs,
        ...(options.signal && { signal: options.signal }),
      }
    );

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();

    const tokensUsed = response.usage.input_tokens + response.usage.output_tokens;
    this.logger.debug('Reasoning call completed', {
      model: this.model,
      latencyMs: Date.now() - startTime,
      tokensUsed,
    });

    return text;
  }
}
