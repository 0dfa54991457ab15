import OpenAI, { APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai';
import type { AppConfig } from './config.js';
import type { ProviderErrorCode } from './types/errors.js';

/**
 * Single provider client shared by the transcriber and the translator.
 * Rate limits and 5xx responses are retried by the SDK with exponential
 * backoff, up to `providerMaxRetries` times.
 */
export function createOpenAIClient(config: AppConfig): OpenAI {
  return new OpenAI({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl,
    timeout: config.providerTimeoutMs,
    maxRetries: config.providerMaxRetries,
  });
}

export interface ProviderFailure {
  code: ProviderErrorCode;
  message: string;
  status?: number;
}

export function classifyProviderError(error: unknown, signal?: AbortSignal): ProviderFailure {
  if (signal?.aborted || error instanceof APIUserAbortError) {
    return { code: 'CANCELLED', message: 'Request was cancelled' };
  }
  if (error instanceof APIConnectionTimeoutError) {
    return { code: 'TIMEOUT', message: 'Request to the provider timed out' };
  }
  if (error instanceof APIError) {
    return {
      code: 'PROVIDER_ERROR',
      message: error.message,
      status: error.status,
    };
  }
  return {
    code: 'PROVIDER_ERROR',
    message: error instanceof Error ? error.message : 'Unknown provider error',
  };
}
