import { ExternalProviderFailure, type ProviderKind } from '../errors.js';

/**
 * Race `operation` against a hard deadline. When the deadline fires the
 * signal handed to `operation` is aborted and a late result is discarded.
 */
export async function withTimeout<T>(
  provider: ProviderKind,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new ExternalProviderFailure(provider, `${provider} provider timed out after ${timeoutMs}ms`);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
