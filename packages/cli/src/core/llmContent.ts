/**
 * OpenAI-compatible content provider
 *
 * Calls the chat completions endpoint over fetch. Rate limits, server errors
 * and network failures are retried with exponential backoff; anything else
 * fails fast. An aborted caller signal ends the request and any pending
 * retry. Every failure surfaces as ExternalProviderFailure, which the
 * generation context turns into static fallback text.
 */

import { z } from 'zod';
import { ExternalProviderFailure, type ContentProvider, type TextRequest } from '@orgsim/core';

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_MODEL = 'gpt-4o-mini';

const SYSTEM_PROMPT =
  'You write short, realistic text for a project-management tool. ' +
  'Answer with the requested text only, in one or two sentences, without quotes.';

/**
 * Configuration for retry logic on transient failures
 */
export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
}

export const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 2000,
  jitter: true,
};

const CompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
  })).min(1),
});

export interface OpenAIContentOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  /** Per-request timeout */
  requestTimeoutMs?: number;
  retry?: RetryConfig;
  fetch?: typeof fetch;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Sleep for a given number of milliseconds, cut short by `signal`
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Share of an overall deadline given to each attempt, so a slow first
 * request leaves room for the retries.
 */
export function attemptTimeout(totalMs: number, retry: RetryConfig = DEFAULT_RETRY): number {
  return Math.max(1, Math.floor(totalMs / Math.max(1, retry.maxAttempts)));
}

/**
 * Calculate delay with exponential backoff and optional jitter
 */
export function calculateDelay(attempt: number, config: RetryConfig): number {
  let delay = config.baseDelayMs * Math.pow(2, attempt);
  delay = Math.min(delay, config.maxDelayMs);

  if (config.jitter) {
    delay = delay + Math.random() * delay * 0.5;
  }

  return Math.round(delay);
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ExternalProviderFailure('content', 'Content request cancelled by caller', { cause: signal.reason });
  }
}

class NonRetryable extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NonRetryable';
  }
}

export class OpenAIContentProvider implements ContentProvider {
  private readonly endpoint: string;
  private readonly model: string;
  private readonly requestTimeoutMs: number;
  private readonly retry: RetryConfig;
  private readonly fetchImpl: typeof fetch;
  private readonly sleepImpl: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly options: OpenAIContentOptions) {
    this.endpoint = `${(options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')}/chat/completions`;
    this.model = options.model ?? DEFAULT_MODEL;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleepImpl = options.sleep ?? sleep;
  }

  async text(request: TextRequest): Promise<string> {
    const { signal } = request;
    let lastError: unknown;

    for (let attempt = 0; attempt < this.retry.maxAttempts; attempt++) {
      throwIfCancelled(signal);
      try {
        return await this.complete(request.prompt, signal);
      } catch (err) {
        if (err instanceof NonRetryable) {
          throw new ExternalProviderFailure('content', err.message, { cause: err });
        }
        throwIfCancelled(signal);
        lastError = err;
      }

      if (attempt < this.retry.maxAttempts - 1) {
        try {
          await this.sleepImpl(calculateDelay(attempt, this.retry), signal);
        } catch (err) {
          throwIfCancelled(signal);
          throw err;
        }
      }
    }

    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new ExternalProviderFailure(
      'content',
      `Content request failed after ${this.retry.maxAttempts} attempts: ${reason}`,
      { cause: lastError }
    );
  }

  private async complete(prompt: string, cancel?: AbortSignal): Promise<string> {
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    const response = await this.fetchImpl(this.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.options.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        temperature: 0.7,
        max_tokens: 120,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
      }),
      signal: cancel ? AbortSignal.any([timeout, cancel]) : timeout,
    });

    if (!response.ok) {
      const message = `Content request returned HTTP ${response.status}`;
      if (isRetryableStatus(response.status)) throw new Error(message);
      throw new NonRetryable(message);
    }

    const parsed = CompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new NonRetryable(`Unexpected completion payload: ${parsed.error.message}`);
    }

    const content = parsed.data.choices[0].message.content?.trim() ?? '';
    return content.replace(/^["']|["']$/g, '');
  }
}
