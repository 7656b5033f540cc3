import { ChatMessage, GenerateOptions, GenerationProvider, ProviderHealth } from '../types/provider.js';
import { ProviderHealthRegistry } from './provider-health.js';
import {
  NoProviderAvailableError,
  StreamInterruptedError,
  errorMessage,
  isAbortError,
} from '../utils/errors.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';

export interface ModelRouterOptions {
  healthCheckTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Streams a completion from the first usable provider in priority order.
 *
 * Fallback happens at most once per provider and only before anything has been yielded:
 * after the first fragment a failure surfaces as `StreamInterruptedError`, since the caller
 * has already seen part of the answer.
 */
export class ModelRouter {
  private log: Logger;
  private healthCheckTimeoutMs: number;

  constructor(
    private providers: GenerationProvider[],
    private health: ProviderHealthRegistry,
    options: ModelRouterOptions = {}
  ) {
    this.log = (options.logger ?? rootLogger).child({ component: 'model-router' });
    this.healthCheckTimeoutMs = options.healthCheckTimeoutMs ?? 5_000;
  }

  get providerNames(): string[] {
    return this.providers.map(provider => provider.name);
  }

  async *generate(messages: ChatMessage[], options: GenerateOptions = {}): AsyncGenerator<string, void, undefined> {
    const { signal } = options;
    const attempted: string[] = [];
    const failures: string[] = [];

    for (const provider of this.candidates()) {
      signal?.throwIfAborted();
      attempted.push(provider.name);

      // Each attempt gets its own controller so an abandoned stream is always torn down.
      const controller = new AbortController();
      const forwardAbort = () => controller.abort(signal?.reason);
      signal?.addEventListener('abort', forwardAbort, { once: true });

      let emitted = false;
      let partial = '';
      const startedAt = Date.now();

      try {
        for await (const fragment of provider.stream(messages, { ...options, signal: controller.signal })) {
          if (fragment.length === 0) continue;
          if (!emitted) {
            emitted = true;
            this.health.markAvailable(provider.name);
            this.log.debug('router.first_fragment', { provider: provider.name, latencyMs: Date.now() - startedAt });
          }
          partial += fragment;
          yield fragment;
        }

        if (!emitted) {
          this.health.markAvailable(provider.name);
        }
        this.log.info('router.completed', {
          provider: provider.name,
          chars: partial.length,
          durationMs: Date.now() - startedAt,
        });
        return;
      } catch (error) {
        if (signal?.aborted || isAbortError(error)) {
          throw error;
        }

        const message = errorMessage(error);
        this.health.markUnavailable(provider.name, message);

        if (emitted) {
          this.log.error('router.stream_interrupted', { provider: provider.name, error: message, chars: partial.length });
          throw new StreamInterruptedError(
            `Provider ${provider.name} failed mid-stream: ${message}`,
            provider.name,
            partial
          );
        }

        this.log.warn('router.provider_failed', { provider: provider.name, error: message });
        failures.push(`${provider.name}: ${message}`);
      } finally {
        signal?.removeEventListener('abort', forwardAbort);
        controller.abort();
      }
    }

    const detail = failures.length > 0 ? failures.join('; ') : 'no providers configured';
    this.log.error('router.no_provider', { attempted, detail });
    throw new NoProviderAvailableError(`No generation provider available (${detail})`, attempted);
  }

  /**
   * Providers to try for one request, in priority order. Providers in cooldown are left out
   * while another one can still serve; when all of them are cooling down they are all tried
   * again, so a recovered backend is picked up on the next request.
   */
  private candidates(): GenerationProvider[] {
    const ready = this.providers.filter(provider => this.health.shouldAttempt(provider.name));
    const skipped = this.providers.filter(provider => !ready.includes(provider)).map(provider => provider.name);

    if (ready.length > 0) {
      if (skipped.length > 0) {
        this.log.debug('router.skip', { providers: skipped, reason: 'cooldown' });
      }
      return ready;
    }

    this.log.info('router.retry_cooling', { providers: skipped });
    return this.providers;
  }

  /**
   * Probe every provider and return the refreshed health snapshot.
   */
  async checkHealth(): Promise<ProviderHealth[]> {
    await Promise.all(
      this.providers.map(async provider => {
        try {
          const ok = await provider.checkHealth(AbortSignal.timeout(this.healthCheckTimeoutMs));
          if (ok) {
            this.health.markAvailable(provider.name);
          } else {
            this.health.markUnavailable(provider.name, 'Health check failed');
          }
        } catch (error) {
          this.health.markUnavailable(provider.name, errorMessage(error));
        }
      })
    );
    return this.health.snapshot();
  }

  healthSnapshot(): ProviderHealth[] {
    return this.health.snapshot();
  }
}
