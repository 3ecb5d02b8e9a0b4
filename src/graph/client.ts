/**
 * Microsoft Graph channel client
 * Paginated reads of channel messages and their replies
 */

import {
  AuthenticationError,
  DataQualityError,
  PipelineError,
  RateLimitError,
  TransientError,
  classifyError,
  errorMessage,
} from '../errors/index.js';
import { RetryPolicy, parseRetryAfter } from '../http/retry.js';
import { createLogger } from '../utils/logger.js';
import {
  GraphErrorSchema,
  MessagePageSchema,
  type ChannelRef,
  type ChannelSource,
  type MessagePage,
} from './types.js';

/**
 * Graph client configuration
 */
export interface GraphClientConfig {
  accessToken: string;
  baseUrl?: string;
  timeout?: number;
  pageSize?: number;
  retry?: RetryPolicy;
}

/**
 * Default Graph configuration
 */
const GRAPH_DEFAULTS = {
  baseUrl: 'https://graph.microsoft.com/beta',
  timeout: 30000,
  // Graph caps channel message pages at 50
  pageSize: 50,
};

/**
 * Graph client implementation
 */
export class GraphClient implements ChannelSource {
  readonly name = 'graph';
  private readonly accessToken: string;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly pageSize: number;
  private readonly retry: RetryPolicy;

  constructor(config: GraphClientConfig) {
    if (!config.accessToken) {
      throw new AuthenticationError('Graph access token is required');
    }

    this.accessToken = config.accessToken;
    this.baseUrl = (config.baseUrl ?? GRAPH_DEFAULTS.baseUrl).replace(/\/+$/, '');
    this.timeout = config.timeout ?? GRAPH_DEFAULTS.timeout;
    this.pageSize = config.pageSize ?? GRAPH_DEFAULTS.pageSize;
    this.retry = config.retry ?? new RetryPolicy();
  }

  /**
   * URL of the first page of root messages
   */
  messagesUrl(channel: ChannelRef): string {
    return `${this.channelUrl(channel)}/messages?$top=${this.pageSize}`;
  }

  /**
   * URL of the first page of replies to one message
   */
  repliesUrl(channel: ChannelRef, messageId: string): string {
    return `${this.channelUrl(channel)}/messages/${encodeURIComponent(messageId)}/replies?$top=${this.pageSize}`;
  }

  /**
   * Iterate pages of root messages until no continuation link remains
   */
  async *listMessagePages(channel: ChannelRef): AsyncGenerator<MessagePage> {
    const log = createLogger({ module: 'graph', channelId: channel.channelId });
    let url: string | null = this.messagesUrl(channel);
    let pageNumber = 0;

    while (url) {
      const page: MessagePage = await this.getPage(url);
      pageNumber++;
      log.debug({ page: pageNumber, messages: page.value.length }, 'Fetched message page');

      yield page;
      url = page['@odata.nextLink'] ?? null;
    }
  }

  /**
   * Collect every reply to a message, following continuation links
   */
  async listReplies(channel: ChannelRef, messageId: string): Promise<unknown[]> {
    const replies: unknown[] = [];
    let url: string | null = this.repliesUrl(channel, messageId);

    while (url) {
      const page: MessagePage = await this.getPage(url);
      replies.push(...page.value);
      url = page['@odata.nextLink'] ?? null;
    }

    return replies;
  }

  private channelUrl(channel: ChannelRef): string {
    return `${this.baseUrl}/teams/${encodeURIComponent(channel.groupId)}/channels/${encodeURIComponent(channel.channelId)}`;
  }

  /**
   * Get request headers
   */
  private getHeaders(): Record<string, string> {
    return {
      Accept: 'application/json',
      Authorization: `Bearer ${this.accessToken}`,
    };
  }

  /**
   * Fetch one page through the retry policy
   */
  private getPage(url: string): Promise<MessagePage> {
    return this.retry.execute('graph.get', () => this.request(url), { url });
  }

  /**
   * Make API request
   */
  private async request(url: string): Promise<MessagePage> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: this.getHeaders(),
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      if (classifyError(error) === 'transient') {
        throw new TransientError(`Graph request failed: ${errorMessage(error)}`, { cause: error });
      }
      throw new PipelineError(`Graph request failed: ${errorMessage(error)}`, 'fatal', { cause: error });
    }

    if (!response.ok) {
      throw await this.handleApiError(response, url);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new DataQualityError('Graph returned a body that is not JSON', { url }, { cause: error });
    }

    const page = MessagePageSchema.safeParse(data);
    if (!page.success) {
      throw new DataQualityError('Graph returned an unexpected page shape', {
        url,
        issues: page.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    return page.data;
  }

  /**
   * Handle API error response
   */
  private async handleApiError(response: Response, url: string): Promise<PipelineError> {
    const statusCode = response.status;
    const message = await readErrorMessage(response);

    switch (statusCode) {
      case 401:
        return new AuthenticationError(
          `Graph rejected the access token (expired or invalid): ${message}`,
          { statusCode }
        );
      case 403:
        return new AuthenticationError(
          `Graph denied access to the channel: ${message}`,
          { statusCode }
        );
      case 404:
        return new DataQualityError(`Graph resource not found: ${message}`, { url, statusCode });
      case 429:
        return new RateLimitError(
          `Graph throttled the request: ${message}`,
          parseRetryAfter(response.headers.get('retry-after'))
        );
      default:
        if (statusCode === 408 || statusCode >= 500) {
          return new TransientError(`Graph request failed with ${statusCode}: ${message}`, { statusCode });
        }
        return new PipelineError(`Graph request failed with ${statusCode}: ${message}`, 'fatal', { statusCode });
    }
  }
}

/**
 * Best-effort message from a Graph error response
 */
async function readErrorMessage(response: Response): Promise<string> {
  let text = '';
  try {
    text = await response.text();
  } catch (error) {
    return `${response.statusText || 'error'} (body unreadable: ${errorMessage(error)})`;
  }

  try {
    const parsed = GraphErrorSchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const { code, message } = parsed.data.error;
      if (message) return code ? `${code}: ${message}` : message;
    }
  } catch {
    // Not JSON; fall through to the raw text
  }

  return text.trim() || response.statusText || 'Unknown API error';
}

/**
 * Create a Graph client from narrowed settings
 */
export function createGraphClient(
  settings: { accessToken: string; baseUrl: string },
  options: { timeout?: number; retry?: RetryPolicy } = {}
): GraphClient {
  return new GraphClient({
    accessToken: settings.accessToken,
    baseUrl: settings.baseUrl,
    timeout: options.timeout,
    retry: options.retry,
  });
}
