import type { LlmSettings } from '@newscheck/schemas/src/settings.schema.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { ConfigurationError, LlmError } from '@newscheck/shared/src/utils/errors.js';

const log = createChildLogger('llm:client');

const MAX_TRANSIENT_RETRIES = 3;
const BASE_DELAY_MS = 1000;

export type LlmPurpose = 'classification' | 'summary' | 'education' | 'verdict';

export interface GenerationConfig {
  readonly temperature: number;
  readonly maxOutputTokens: number;
  readonly topP?: number;
  readonly topK?: number;
}

export interface LlmRequest {
  readonly purpose: LlmPurpose;
  readonly prompt: string;
  readonly generation: GenerationConfig;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

const MOCK_RESPONSES: Readonly<Record<LlmPurpose, string>> = {
  classification: 'News Type: Evergreen News, Misinformation Domain: Health',
  summary:
    'Trusted sources agree that weight gain depends on overall calorie balance rather than any single food.',
  education: [
    '1. Check whether a claim cites primary research or official guidance.',
    '2. Compare several independent, reputable sources before sharing.',
    '3. Be wary of absolute statements about single foods or products.',
  ].join('\n'),
  verdict:
    'Potentially Misleading. The trusted sources indicate the claim oversimplifies the evidence.',
};

function createMockClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ purpose: request.purpose, promptLength: request.prompt.length }, 'Mock LLM invocation');

      return Promise.resolve({
        content: MOCK_RESPONSES[request.purpose],
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

function readStatusCode(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode = readStatusCode(error);
  if (statusCode !== undefined && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  const transientPatterns = [
    '429', 'rate limit', 'too many requests', 'resource exhausted',
    '500', '502', '503', 'internal server error', 'bad gateway', 'service unavailable',
    'econnreset', 'etimedout', 'timeout', 'network',
    'socket hang up', 'econnrefused',
  ];

  return transientPatterns.some((pattern) => message.includes(pattern));
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function computeBackoffMs(attempt: number): number {
  const exponential = BASE_DELAY_MS * Math.pow(2, attempt);
  const jitter = Math.random() * BASE_DELAY_MS;
  return exponential + jitter;
}

async function createGeminiClient(settings: LlmSettings): Promise<LlmClient> {
  const { apiKey, model } = settings;

  if (!apiKey) {
    throw new ConfigurationError('GEMINI_API_KEY environment variable is required for the Gemini LLM client');
  }

  const { GoogleGenAI } = await import('@google/genai');
  const client = new GoogleGenAI({ apiKey });

  log.info({ model }, 'Using Gemini LLM client');

  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug(
        { purpose: request.purpose, promptLength: request.prompt.length },
        'Gemini LLM invocation',
      );

      let lastError: Error | undefined;

      for (let attempt = 0; attempt < MAX_TRANSIENT_RETRIES; attempt++) {
        try {
          const response = await client.models.generateContent({
            model,
            contents: request.prompt,
            config: {
              temperature: request.generation.temperature,
              maxOutputTokens: request.generation.maxOutputTokens,
              topP: request.generation.topP,
              topK: request.generation.topK,
            },
          });

          const content = (response.text ?? '').trim();
          if (!content) {
            throw new LlmError(`Gemini returned an empty ${request.purpose} response`, false);
          }

          const usage = response.usageMetadata;
          return {
            content,
            tokenUsage: usage
              ? {
                  input: usage.promptTokenCount ?? 0,
                  output: usage.candidatesTokenCount ?? 0,
                }
              : undefined,
          };
        } catch (error) {
          if (error instanceof LlmError) {
            throw error;
          }
          lastError = error instanceof Error ? error : new Error(String(error));

          if (!isTransientError(error)) {
            throw new LlmError(
              `Gemini invocation failed: ${lastError.message}`,
              false,
              lastError,
            );
          }

          log.warn(
            { attempt: attempt + 1, maxRetries: MAX_TRANSIENT_RETRIES, error: lastError.message },
            'Transient LLM error, retrying',
          );

          if (attempt < MAX_TRANSIENT_RETRIES - 1) {
            await sleep(computeBackoffMs(attempt));
          }
        }
      }

      throw new LlmError(
        `Gemini invocation failed after ${String(MAX_TRANSIENT_RETRIES)} retries: ${lastError?.message ?? 'unknown error'}`,
        true,
        lastError,
      );
    },
  };
}

export async function createLlmClient(settings: LlmSettings): Promise<LlmClient> {
  if (settings.mock) {
    return createMockClient();
  }

  return createGeminiClient(settings);
}
