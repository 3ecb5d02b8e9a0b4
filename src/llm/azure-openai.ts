/**
 * Azure OpenAI LLM Provider
 * Chat completions against a model deployment
 */

import { z } from 'zod';
import {
  AuthenticationError,
  DataQualityError,
  PipelineError,
  RateLimitError,
  TransientError,
  classifyError,
  errorMessage,
} from '../errors/index.js';
import { parseRetryAfter } from '../http/retry.js';
import type {
  LLMProvider,
  ChatMessage,
  CompletionOptions,
  CompletionResult,
  ProviderConfig,
} from './provider.js';
import { mergeOptions, validateProviderConfig } from './provider.js';

/**
 * Azure OpenAI provider configuration
 */
export interface AzureOpenAIConfig extends ProviderConfig {
  endpoint: string;
  deployment: string;
  apiVersion?: string;
  defaults?: CompletionOptions;
}

/**
 * Chat completion request body
 */
interface ChatCompletionRequest {
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
  top_p: number;
  n: 1;
  response_format?: { type: 'json_object' };
}

/**
 * Chat completion response
 */
const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
          })
          .passthrough(),
        finish_reason: z.string().nullish(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

/**
 * Error response
 */
const ErrorResponseSchema = z.object({
  error: z
    .object({
      code: z.string().nullish(),
      message: z.string().nullish(),
    })
    .passthrough(),
});

/**
 * Default Azure OpenAI configuration
 */
const AZURE_DEFAULTS = {
  apiVersion: '2024-06-01',
  timeout: 60000,
};

/**
 * Azure rate-limit messages read "Please retry after N seconds"
 */
export function parseRetryAfterMessage(message: string): number | undefined {
  const match = /retry after (\d+)/i.exec(message);
  return match ? parseInt(match[1], 10) * 1000 : undefined;
}

/**
 * Azure OpenAI Provider implementation
 */
export class AzureOpenAIProvider implements LLMProvider {
  readonly name = 'azure-openai';
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly deployment: string;
  private readonly apiVersion: string;
  private readonly timeout: number;
  private readonly defaults: CompletionOptions;

  constructor(config: AzureOpenAIConfig) {
    validateProviderConfig(config);

    this.apiKey = config.apiKey;
    this.endpoint = config.endpoint.replace(/\/+$/, '');
    this.deployment = config.deployment;
    this.apiVersion = config.apiVersion ?? AZURE_DEFAULTS.apiVersion;
    this.timeout = config.timeout ?? AZURE_DEFAULTS.timeout;
    this.defaults = config.defaults ?? {};
  }

  /**
   * Chat completions URL of the deployment
   */
  get url(): string {
    const deployment = encodeURIComponent(this.deployment);
    const apiVersion = encodeURIComponent(this.apiVersion);
    return `${this.endpoint}/openai/deployments/${deployment}/chat/completions?api-version=${apiVersion}`;
  }

  /**
   * Complete a chat conversation
   */
  async chat(messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResult> {
    const opts = mergeOptions(options, this.defaults);

    const request: ChatCompletionRequest = {
      messages,
      max_tokens: opts.maxTokens,
      temperature: opts.temperature,
      top_p: opts.topP,
      n: 1,
    };

    if (opts.jsonMode) {
      request.response_format = { type: 'json_object' };
    }

    const data = await this.makeRequest(request);
    const parsed = ChatCompletionResponseSchema.safeParse(data);

    if (!parsed.success) {
      throw new DataQualityError('Unexpected chat completion response shape', {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const response = parsed.data;
    const choice = response.choices[0];

    return {
      content: choice.message.content ?? '',
      model: response.model ?? this.deployment,
      inputTokens: response.usage?.prompt_tokens ?? 0,
      outputTokens: response.usage?.completion_tokens ?? 0,
      finishReason: choice.finish_reason ?? null,
    };
  }

  /**
   * Get request headers
   */
  private getHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'api-key': this.apiKey,
    };
  }

  /**
   * Make API request
   */
  private async makeRequest(body: ChatCompletionRequest): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      if (classifyError(error) === 'transient') {
        throw new TransientError(
          error instanceof Error && error.name === 'TimeoutError'
            ? 'Request timed out'
            : `Completion request failed: ${errorMessage(error)}`,
          { cause: error }
        );
      }
      throw new PipelineError(`Completion request failed: ${errorMessage(error)}`, 'fatal', { cause: error });
    }

    if (!response.ok) {
      throw await this.handleApiError(response);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new DataQualityError('Completion response is not JSON', {}, { cause: error });
    }
  }

  /**
   * Handle API error response
   */
  private async handleApiError(response: Response): Promise<PipelineError> {
    const statusCode = response.status;
    const { code, message } = await readError(response);

    switch (statusCode) {
      case 401:
      case 403:
        return new AuthenticationError(`Azure OpenAI rejected the API key: ${message}`, { statusCode });
      case 404:
        return new PipelineError(
          `Azure OpenAI deployment "${this.deployment}" not found: ${message}`,
          'fatal',
          { statusCode }
        );
      case 429: {
        const retryAfterMs =
          msHeader(response.headers.get('retry-after-ms'))
          ?? parseRetryAfter(response.headers.get('retry-after'))
          ?? parseRetryAfterMessage(message);
        return new RateLimitError(`Azure OpenAI rate limit exceeded: ${message}`, retryAfterMs);
      }
      default:
        if (statusCode === 408 || statusCode >= 500) {
          return new TransientError(`Azure OpenAI request failed with ${statusCode}: ${message}`, { statusCode });
        }
        // content_filter, context_length_exceeded and other per-request rejections
        return new DataQualityError(
          `Azure OpenAI rejected the request (${code ?? statusCode}): ${message}`,
          { statusCode, code }
        );
    }
  }
}

function msHeader(value: string | null): number | undefined {
  if (!value) return undefined;
  const ms = Number(value);
  return Number.isFinite(ms) && ms >= 0 ? Math.round(ms) : undefined;
}

async function readError(response: Response): Promise<{ code?: string; message: string }> {
  let text = '';
  try {
    text = await response.text();
  } catch (error) {
    return { message: `${response.statusText || 'error'} (body unreadable: ${errorMessage(error)})` };
  }

  try {
    const parsed = ErrorResponseSchema.safeParse(JSON.parse(text));
    if (parsed.success && parsed.data.error.message) {
      return {
        code: parsed.data.error.code ?? undefined,
        message: parsed.data.error.message,
      };
    }
  } catch {
    // Not JSON; fall through to the raw text
  }

  return { message: text.trim() || response.statusText || 'Unknown API error' };
}

/**
 * Create Azure OpenAI provider from narrowed settings
 */
export function createAzureOpenAIProvider(
  settings: { apiKey: string; endpoint: string; deployment: string; apiVersion: string },
  options: { timeout?: number; defaults?: CompletionOptions } = {}
): AzureOpenAIProvider {
  return new AzureOpenAIProvider({ ...settings, ...options });
}
