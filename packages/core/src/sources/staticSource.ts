import type { JwksSource } from '../interfaces/jwksSource.js';
import { JsonWebKeySet } from '../keySet.js';

/**
 * In-memory key set source returning a preconfigured key set or error.
 *
 * Useful for tests and for services whose keys are provisioned out of band. The outcome
 * can be swapped at any time to simulate key rotation or an outage.
 */
export class StaticSource implements JwksSource {
  private outcome: { keySet: JsonWebKeySet } | { error: unknown };
  private calls = 0;

  constructor(initial: JsonWebKeySet | Error = JsonWebKeySet.empty()) {
    this.outcome = initial instanceof Error ? { error: initial } : { keySet: initial };
  }

  /** Number of times {@link fetchKeys} has been called. */
  get fetchCount(): number {
    return this.calls;
  }

  setKeySet(keySet: JsonWebKeySet): void {
    this.outcome = { keySet };
  }

  setError(error: unknown): void {
    this.outcome = { error };
  }

  // oxlint-disable-next-line require-await
  async fetchKeys(): Promise<JsonWebKeySet> {
    this.calls += 1;
    if ('error' in this.outcome) {
      throw this.outcome.error;
    }
    return this.outcome.keySet;
  }
}
