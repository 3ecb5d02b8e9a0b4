/**
 * LLM Provider abstraction
 * Defines interface for language model providers
 */

/**
 * Message role in conversation
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Chat message
 */
export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * Completion options
 */
export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  /** Ask the model for a single JSON object */
  jsonMode?: boolean;
}

/**
 * Completion result
 */
export interface CompletionResult {
  content: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  finishReason: string | null;
}

/**
 * Provider configuration
 */
export interface ProviderConfig {
  apiKey: string;
  timeout?: number;
}

/**
 * LLM Provider interface
 */
export interface LLMProvider {
  name: string;

  /**
   * Complete a chat conversation
   */
  chat(messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResult>;
}

/**
 * Default completion options
 * Low temperature keeps pair synthesis close to deterministic
 */
export const DEFAULT_OPTIONS: Required<CompletionOptions> = {
  maxTokens: 1024,
  temperature: 0.1,
  topP: 0.1,
  jsonMode: false,
};

/**
 * Validate provider config
 */
export function validateProviderConfig(config: ProviderConfig): void {
  if (!config.apiKey) {
    throw new Error('API key is required');
  }
}

/**
 * Merge options with defaults
 */
export function mergeOptions(
  options?: CompletionOptions,
  defaults: Partial<CompletionOptions> = {}
): Required<CompletionOptions> {
  return {
    maxTokens: options?.maxTokens ?? defaults.maxTokens ?? DEFAULT_OPTIONS.maxTokens,
    temperature: options?.temperature ?? defaults.temperature ?? DEFAULT_OPTIONS.temperature,
    topP: options?.topP ?? defaults.topP ?? DEFAULT_OPTIONS.topP,
    jsonMode: options?.jsonMode ?? defaults.jsonMode ?? DEFAULT_OPTIONS.jsonMode,
  };
}

/**
 * Characters per token used for budget estimates
 */
export const CHARS_PER_TOKEN = 4;

/**
 * Count approximate tokens (rough estimate)
 * For accurate counting, use a proper tokenizer
 */
export function estimateTokens(text: string): number {
  // Rough approximation: ~4 chars per token for English
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Build messages array with optional system prompt
 */
export function buildMessages(
  prompt: string,
  systemPrompt?: string
): ChatMessage[] {
  const messages: ChatMessage[] = [];

  if (systemPrompt) {
    messages.push({ role: 'system', content: systemPrompt });
  }

  messages.push({ role: 'user', content: prompt });

  return messages;
}
