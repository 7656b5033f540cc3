import { ApiError, ValidationError, isAbortError } from '../utils/errors.js';

export interface RetryOptions {
  maxRetries?: number;
  retryDelayMs?: number;
}

export abstract class BaseAIProvider {
  abstract readonly name: string;
  protected maxRetries: number;
  protected retryDelayMs: number;

  constructor(options: RetryOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  /**
   * Handle API errors with retry logic
   */
  protected async withRetry<T>(operation: () => Promise<T>): Promise<T> {
    let lastError: Error = new Error('Operation was not attempted');

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        lastError = error instanceof Error ? error : new Error(String(error));

        // Don't retry on authentication errors
        if (this.isAuthError(error)) {
          throw new ApiError(`Authentication failed: ${lastError.message}`, this.name);
        }

        if (attempt === this.maxRetries) {
          break;
        }

        // Exponential backoff
        const waitTime = this.retryDelayMs * Math.pow(2, attempt - 1);
        await this.sleep(waitTime);
      }
    }

    throw new ApiError(`Operation failed after ${this.maxRetries} attempts: ${lastError.message}`, this.name);
  }

  protected isAuthError(error: unknown): boolean {
    const errorMessage = String(error).toLowerCase();
    return errorMessage.includes('unauthorized') ||
           errorMessage.includes('api key') ||
           errorMessage.includes('authentication');
  }

  protected sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Validate text input for embedding generation
   */
  protected validateText(text: string): void {
    if (!text || text.trim().length === 0) {
      throw new ValidationError('Text cannot be empty');
    }

    if (text.length > 100000) {
      throw new ValidationError('Text is too long for processing');
    }
  }

  protected validateBatchTexts(texts: string[], maxBatch: number = 2048): void {
    if (texts.length === 0) {
      throw new ValidationError('Texts array cannot be empty');
    }

    if (texts.length > maxBatch) {
      throw new ValidationError('Too many texts in batch request');
    }

    texts.forEach((text, index) => {
      try {
        this.validateText(text);
      } catch (error) {
        throw new ValidationError(`Invalid text at index ${index}: ${String(error)}`);
      }
    });
  }
}
