/**
 * Language-model collaborator types.
 */

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  /** Aborted when the caller's deadline passes */
  signal?: AbortSignal;
}

/**
 * A chat model that turns a prompt into free text.
 * Implementations raise UpstreamError for transport, auth and rate-limit failures.
 */
export interface LanguageModel {
  readonly name: string;
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}
