/**
 * Provider Errors
 *
 * Embedding and generation failures are fatal to the current top-level
 * call (retrieve, agent run). They are wrapped once here, with the
 * original error as `cause`, and never retried.
 */

import { CLIError } from '../errors/index.js';

export type ProviderOperation = 'embed' | 'generate' | 'stream' | 'tools' | 'summarize';

/**
 * Thrown when an embedding or generation provider call fails or returns
 * a response that cannot be interpreted.
 *
 * Exit code 8: Provider error
 */
export class ProviderError extends CLIError {
  public readonly provider: string;
  public readonly operation: ProviderOperation;
  /** The original SDK/network error */
  public readonly cause?: Error;

  constructor(provider: string, operation: ProviderOperation, message: string, cause?: Error) {
    super(
      `${provider} ${operation} failed: ${message}`,
      'Check the provider API key, model name and network access, then retry',
      8
    );
    this.name = 'ProviderError';
    this.provider = provider;
    this.operation = operation;
    this.cause = cause;
  }

  /**
   * Wrap an unknown thrown value, passing ProviderErrors through unchanged.
   */
  static wrap(provider: string, operation: ProviderOperation, error: unknown): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    if (error instanceof Error) {
      return new ProviderError(provider, operation, error.message, error);
    }
    return new ProviderError(provider, operation, String(error));
  }
}

/**
 * True for the error a cancelled fetch/SDK call rejects with.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError');
}
