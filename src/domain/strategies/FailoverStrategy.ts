import type { BaseLogger } from 'pino';
import { BackendKind } from '../models.js';
import { IRetailStore } from '../../infrastructure/stores/IRetailStore.js';
import { BackendUnavailableError, UnknownEntityError } from '../errors/index.js';

export interface Served<T> {
  value: T;
  backend: BackendKind;
  degraded: boolean;
}

export interface Attempt {
  backend: BackendKind;
  // the other backend while it can still answer reads; null during an outage
  peer: IRetailStore | null;
}

export interface BackendStats {
  persistentConfigured: boolean;
  persistentCalls: number;
  degradedCalls: number;
  failedCalls: number;
}

// which outcomes of the persistent store send the call to the fallback
function shouldFallBack(error: unknown): boolean {
  return error instanceof BackendUnavailableError || error instanceof UnknownEntityError;
}

/**
 * Runs one logical operation against the persistent store and, when that store
 * is unavailable or does not know the addressed entity, runs the same operation
 * again against the in-memory fallback. Fallback writes are never copied back.
 */
export class FailoverStrategy {
  private counters = { persistentCalls: 0, degradedCalls: 0, failedCalls: 0 };

  constructor(
    private readonly primary: IRetailStore | null,
    private readonly fallback: IRetailStore,
    private readonly logger: BaseLogger
  ) {}

  async execute<T>(
    operation: string,
    task: (store: IRetailStore, attempt: Attempt) => Promise<T>
  ): Promise<Served<T>> {
    let primaryError: unknown = null;

    if (this.primary) {
      try {
        const value = await task(this.primary, {
          backend: this.primary.kind,
          peer: this.fallback,
        });
        this.counters.persistentCalls++;
        return { value, backend: this.primary.kind, degraded: false };
      } catch (error) {
        if (!shouldFallBack(error)) throw error;
        primaryError = error;

        if (error instanceof BackendUnavailableError) {
          this.logger.warn(
            { operation, err: error.cause ?? error },
            'Persistent store unavailable; serving from fallback'
          );
        }
      }
    }

    try {
      const value = await task(this.fallback, {
        backend: this.fallback.kind,
        // a "not found" means the primary answered, so it is still readable
        peer: primaryError instanceof UnknownEntityError ? this.primary : null,
      });
      this.counters.degradedCalls++;
      this.logger.info({ operation, backend: this.fallback.kind }, 'Degraded result');
      return { value, backend: this.fallback.kind, degraded: true };
    } catch (error) {
      if (error instanceof BackendUnavailableError) {
        this.counters.failedCalls++;
        this.logger.error({ operation, err: error }, 'Both backends failed');
        // the primary's "not found" is the more useful answer when it had one
        if (primaryError instanceof UnknownEntityError) throw primaryError;
      }
      throw error;
    }
  }

  stats(): BackendStats {
    return { persistentConfigured: this.primary !== null, ...this.counters };
  }
}
