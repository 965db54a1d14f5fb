/**
 * OpenAI chat-completions model for SQL generation.
 */

import OpenAI from 'openai';
import { UpstreamError } from '../errors.js';
import type { ChatMessage, CompletionOptions, LanguageModel } from './types.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';

export interface OpenAIModelOptions {
  apiKey: string;
  model?: string;
  /** Transport timeout handed to the SDK */
  timeoutMs?: number;
}

function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

function toUpstreamError(err: unknown): UpstreamError {
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new UpstreamError('OpenAI request timed out', { cause: err, timedOut: true });
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status ?? undefined;
    return new UpstreamError(
      status !== undefined ? `OpenAI request failed with status ${status}` : 'OpenAI request failed',
      { cause: err, status },
    );
  }
  return new UpstreamError('OpenAI request failed', { cause: err });
}

export class OpenAIModel implements LanguageModel {
  readonly name: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIModelOptions) {
    this.name = options.model ?? DEFAULT_MODEL;
    // Retries belong to the pipeline, so the SDK's own are off.
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.name,
          messages: messages.map(toOpenAIMessage),
          temperature: 0,
          max_tokens: 500,
        },
        { signal: options.signal },
      );
    } catch (err: unknown) {
      throw toUpstreamError(err);
    }

    return response.choices[0]?.message?.content ?? '';
  }
}
