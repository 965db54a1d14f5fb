/**
 * LLM module barrel export.
 */

export type { ChatMessage, CompletionOptions, LanguageModel } from './types.js';
export { OpenAIModel, DEFAULT_MODEL } from './openai.js';
export type { OpenAIModelOptions } from './openai.js';
export { buildPrompt, buildMessages, CANNOT_ANSWER } from './prompt.js';
export { extractCandidateSql } from './extract.js';
export { Translator } from './translator.js';
export type { TranslatorOptions } from './translator.js';
