/**
 * Configuration module
 * Loads and validates configuration from the environment once at startup.
 * The resulting value is passed explicitly to every component that needs it.
 */

import { z, ZodError } from 'zod';
import dotenv from 'dotenv';
import { resolve } from 'path';

/**
 * Configuration schema with zod validation
 * Credentials are optional here; each command narrows what it needs
 */
export const ConfigSchema = z.object({
  // Microsoft Graph
  graphAccessToken: z
    .string()
    .min(1)
    .optional()
    .describe('Bearer token for Microsoft Graph'),
  graphGroupId: z
    .string()
    .min(1)
    .optional()
    .describe('Team (group) id that owns the channel'),
  graphChannelId: z
    .string()
    .min(1)
    .optional()
    .describe('Channel id to extract'),
  graphBaseUrl: z
    .string()
    .url()
    .default('https://graph.microsoft.com/beta')
    .describe('Graph API base URL'),

  // Azure OpenAI
  azureOpenaiApiKey: z
    .string()
    .min(1)
    .optional()
    .describe('Azure OpenAI API key'),
  azureOpenaiEndpoint: z
    .string()
    .url()
    .optional()
    .describe('Azure OpenAI resource endpoint'),
  azureOpenaiDeployment: z
    .string()
    .min(1)
    .optional()
    .describe('Chat model deployment name'),
  azureOpenaiApiVersion: z
    .string()
    .min(1)
    .optional()
    .describe('Azure OpenAI API version'),

  // Generation
  maxTokens: z
    .coerce
    .number()
    .int()
    .min(1)
    .max(16384)
    .default(1024)
    .describe('Maximum tokens for each model response'),
  temperature: z
    .coerce
    .number()
    .min(0)
    .max(2)
    .default(0.1)
    .describe('Sampling temperature'),
  topP: z
    .coerce
    .number()
    .min(0)
    .max(1)
    .default(0.1)
    .describe('Nucleus sampling'),
  promptTokenBudget: z
    .coerce
    .number()
    .int()
    .min(100)
    .default(6000)
    .describe('Token budget for the serialized thread'),

  // Network
  requestTimeoutMs: z
    .coerce
    .number()
    .int()
    .min(1000)
    .default(30000)
    .describe('Timeout for each HTTP request'),
  maxAttempts: z
    .coerce
    .number()
    .int()
    .min(1)
    .max(10)
    .default(5)
    .describe('Attempts per request before giving up'),
  replyConcurrency: z
    .coerce
    .number()
    .int()
    .min(1)
    .max(16)
    .default(4)
    .describe('Reply fetches in flight'),
  synthesisConcurrency: z
    .coerce
    .number()
    .int()
    .min(1)
    .max(16)
    .default(4)
    .describe('Completion requests in flight'),
  requestsPerMinute: z
    .coerce
    .number()
    .positive()
    .default(60)
    .describe('Aggregate completion request rate'),

  // Logging Configuration
  logLevel: z
    .enum(['debug', 'info', 'warn', 'error', 'silent'])
    .default('info')
    .describe('Logging verbosity level'),
  logFormat: z
    .enum(['json', 'pretty'])
    .default('pretty')
    .describe('Log output format'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Settings needed to talk to Microsoft Graph
 */
export interface GraphSettings {
  accessToken: string;
  groupId: string;
  channelId: string;
  baseUrl: string;
}

/**
 * Settings needed to talk to the Azure OpenAI deployment
 */
export interface CompletionSettings {
  apiKey: string;
  endpoint: string;
  deployment: string;
  apiVersion: string;
}

/**
 * Configuration error with helpful messages
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromZodError(error: ZodError): ConfigError {
    const messages = error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    return new ConfigError(
      `Configuration validation failed:\n${messages.join('\n')}`,
      error.issues
    );
  }
}

/**
 * Environment variable for each config field
 */
export const ENV_VARS: Record<keyof Config, string> = {
  graphAccessToken: 'ACCESS_TOKEN',
  graphGroupId: 'GROUP_ID',
  graphChannelId: 'CHANNEL_ID',
  graphBaseUrl: 'GRAPH_BASE_URL',
  azureOpenaiApiKey: 'AZURE_OPENAI_API_KEY',
  azureOpenaiEndpoint: 'AZURE_OPENAI_ENDPOINT',
  azureOpenaiDeployment: 'AZURE_OPENAI_DEPLOYMENT_NAME',
  azureOpenaiApiVersion: 'AZURE_OPENAI_API_VERSION',
  maxTokens: 'QNA_MAX_TOKENS',
  temperature: 'QNA_TEMPERATURE',
  topP: 'QNA_TOP_P',
  promptTokenBudget: 'QNA_PROMPT_TOKEN_BUDGET',
  requestTimeoutMs: 'QNA_REQUEST_TIMEOUT_MS',
  maxAttempts: 'QNA_MAX_ATTEMPTS',
  replyConcurrency: 'QNA_REPLY_CONCURRENCY',
  synthesisConcurrency: 'QNA_SYNTH_CONCURRENCY',
  requestsPerMinute: 'QNA_REQUESTS_PER_MINUTE',
  logLevel: 'QNA_LOG_LEVEL',
  logFormat: 'QNA_LOG_FORMAT',
};

/**
 * Load .env file from specified path or default locations
 */
export function loadEnvFile(envPath?: string): void {
  if (envPath) {
    dotenv.config({ path: resolve(envPath) });
  } else {
    dotenv.config({ path: resolve(process.cwd(), '.env') });
    dotenv.config({ path: resolve(process.cwd(), '.env.local') });
  }
}

/**
 * Build raw config object from environment variables
 * Empty values count as unset
 */
export function buildRawConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const raw: Record<string, unknown> = {};

  for (const [field, name] of Object.entries(ENV_VARS)) {
    const value = env[name];
    raw[field] = value === undefined || value.trim() === '' ? undefined : value.trim();
  }

  return raw;
}

/**
 * Load and validate configuration from environment
 * @param envPath Optional path to .env file
 * @throws ConfigError if validation fails
 */
export function loadConfig(envPath?: string): Config {
  loadEnvFile(envPath);
  return validateConfig(buildRawConfig());
}

/**
 * Validate a partial config object
 */
export function validateConfig(config: unknown): Config {
  const result = ConfigSchema.safeParse(config);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

function missingError(command: string, fields: Array<keyof Config>): ConfigError {
  const names = fields.map((field) => ENV_VARS[field]);
  return new ConfigError(
    `Missing required environment variables for ${command}: ${names.join(', ')}`
  );
}

/**
 * Narrow config to the Graph settings the extractor needs
 * @throws ConfigError listing every missing variable
 */
export function requireGraphSettings(config: Config): GraphSettings {
  const { graphAccessToken, graphGroupId, graphChannelId } = config;

  if (!graphAccessToken || !graphGroupId || !graphChannelId) {
    const missing: Array<keyof Config> = [];
    if (!graphAccessToken) missing.push('graphAccessToken');
    if (!graphGroupId) missing.push('graphGroupId');
    if (!graphChannelId) missing.push('graphChannelId');
    throw missingError('extract', missing);
  }

  return {
    accessToken: graphAccessToken,
    groupId: graphGroupId,
    channelId: graphChannelId,
    baseUrl: config.graphBaseUrl,
  };
}

/**
 * Narrow config to the Azure OpenAI settings the synthesizer needs
 * @throws ConfigError listing every missing variable
 */
export function requireCompletionSettings(config: Config): CompletionSettings {
  const { azureOpenaiApiKey, azureOpenaiEndpoint, azureOpenaiDeployment, azureOpenaiApiVersion } =
    config;

  if (!azureOpenaiApiKey || !azureOpenaiEndpoint || !azureOpenaiDeployment || !azureOpenaiApiVersion) {
    const missing: Array<keyof Config> = [];
    if (!azureOpenaiApiKey) missing.push('azureOpenaiApiKey');
    if (!azureOpenaiEndpoint) missing.push('azureOpenaiEndpoint');
    if (!azureOpenaiDeployment) missing.push('azureOpenaiDeployment');
    if (!azureOpenaiApiVersion) missing.push('azureOpenaiApiVersion');
    throw missingError('synthesize', missing);
  }

  return {
    apiKey: azureOpenaiApiKey,
    endpoint: azureOpenaiEndpoint,
    deployment: azureOpenaiDeployment,
    apiVersion: azureOpenaiApiVersion,
  };
}
