import { describeError } from './errors';
import { logger } from './logger';

/** A context the coordinator can tell to stop and then wait for. */
export interface Subordinate {
  name: string;
  stop(): void | Promise<void>;
  done(): Promise<void>;
}

export interface JoinOutcome {
  name: string;
  outcome: 'stopped' | 'timeout' | 'failed';
  error?: string;
}

const TIMED_OUT = Symbol('timeout');

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });
  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}

/**
 * Cooperative process-wide termination. `signal` is the cancellation token the
 * accept loop listens on; `requestShutdown` may be called from any session and
 * fans out to every registered subordinate exactly once.
 */
export class ShutdownCoordinator {
  private readonly controller = new AbortController();
  private readonly subordinates: Subordinate[] = [];
  private reason = 'shutdown';
  private readonly requested = new Promise<string>((resolve) => {
    this.controller.signal.addEventListener('abort', () => resolve(this.reason), { once: true });
  });

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isShuttingDown(): boolean {
    return this.controller.signal.aborted;
  }

  register(subordinate: Subordinate): void {
    this.subordinates.push(subordinate);
    if (this.isShuttingDown) {
      this.stopOne(subordinate);
    }
  }

  requestShutdown(reason: string): void {
    if (this.isShuttingDown) return;
    this.reason = reason;
    logger.info('[SHUTDOWN]', `Requested: ${reason}`);
    this.controller.abort();
    for (const subordinate of this.subordinates) {
      this.stopOne(subordinate);
    }
  }

  /** Resolves with the reason once shutdown has been requested. */
  waitForShutdown(): Promise<string> {
    return this.requested;
  }

  /**
   * Wait for every subordinate, each bounded by `timeoutMs`. A stuck context
   * is reported and abandoned, not awaited forever.
   */
  async join(timeoutMs: number): Promise<JoinOutcome[]> {
    return Promise.all(
      this.subordinates.map(async (subordinate): Promise<JoinOutcome> => {
        try {
          const result = await withTimeout(subordinate.done(), timeoutMs);
          if (result === TIMED_OUT) {
            logger.warn('[SHUTDOWN]', `${subordinate.name} did not stop within ${timeoutMs}ms`);
            return { name: subordinate.name, outcome: 'timeout' };
          }
          return { name: subordinate.name, outcome: 'stopped' };
        } catch (err) {
          logger.error('[SHUTDOWN]', `${subordinate.name} failed while stopping`, describeError(err));
          return { name: subordinate.name, outcome: 'failed', error: describeError(err) };
        }
      })
    );
  }

  private stopOne(subordinate: Subordinate): void {
    try {
      const pending = subordinate.stop();
      if (pending) {
        pending.catch((err: unknown) =>
          logger.error('[SHUTDOWN]', `stop() of ${subordinate.name} rejected`, describeError(err))
        );
      }
    } catch (err) {
      logger.error('[SHUTDOWN]', `stop() of ${subordinate.name} threw`, describeError(err));
    }
  }
}
