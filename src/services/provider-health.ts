import { ProviderHealth } from '../types/provider.js';

export type Clock = () => number;

interface HealthState {
  available: boolean;
  lastChecked: number | null;
  lastError: string | null;
}

/**
 * Availability of each generation provider, held in memory and rebuilt on start.
 *
 * A provider marked unavailable is skipped until `cooldownMs` has passed since the failure;
 * after that the next request probes it again.
 */
export class ProviderHealthRegistry {
  private states = new Map<string, HealthState>();

  constructor(
    names: string[],
    private cooldownMs: number = 30_000,
    private clock: Clock = Date.now
  ) {
    names.forEach(name => this.states.set(name, { available: true, lastChecked: null, lastError: null }));
  }

  markAvailable(name: string): void {
    this.states.set(name, { available: true, lastChecked: this.clock(), lastError: null });
  }

  markUnavailable(name: string, error: string): void {
    this.states.set(name, { available: false, lastChecked: this.clock(), lastError: error });
  }

  shouldAttempt(name: string): boolean {
    const state = this.states.get(name);
    if (!state || state.available) return true;
    return state.lastChecked === null || this.clock() - state.lastChecked >= this.cooldownMs;
  }

  get(name: string): ProviderHealth {
    const state = this.states.get(name) ?? { available: true, lastChecked: null, lastError: null };
    return {
      name,
      available: state.available,
      lastChecked: state.lastChecked === null ? null : new Date(state.lastChecked).toISOString(),
      lastError: state.lastError,
    };
  }

  snapshot(): ProviderHealth[] {
    return [...this.states.keys()].map(name => this.get(name));
  }
}
