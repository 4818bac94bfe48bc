/**
 * Execution context for one pipeline run.
 *
 * The phase graph is flattened into a single interceptor list when the
 * context is created. Interceptors advance the chain themselves:
 *
 *   proceed()        run the next interceptor, resolve when it returns
 *   proceedWith(x)   same, after replacing the subject with x
 *   finish()         end the whole run successfully
 *
 * An interceptor that returns without advancing ends the run. Errors
 * unwind through the nested proceed() calls unchanged, so an earlier
 * interceptor can catch what a later one threw.
 *
 * Cancellation (external signal or timeout) rejects the pending
 * proceed() with a CancellationError, even while an interceptor is
 * suspended, and poisons the context so nothing can resume it.
 */

import { CancellationError, ExecutionStateError } from '../pipeline-error.js';
import { createLogger } from '../logger.js';
import type { Cleanup, ExecuteOptions, Interceptor, PipelineState } from './types.js';

const logger = createLogger('pipeline');

export class PipelineContext<TSubject, TCall> {
  /** The call this run belongs to. */
  readonly call: TCall;

  private currentSubject: TSubject;
  private readonly interceptors: readonly Interceptor<TSubject, TCall>[];
  private readonly options: ExecuteOptions;
  private readonly controller = new AbortController();
  private readonly cleanups: Cleanup[] = [];

  private index = 0;
  private finished = false;
  private runState: PipelineState = 'not-started';
  private cancellation: CancellationError | null = null;
  private detach: (() => void) | null = null;

  constructor(
    call: TCall,
    subject: TSubject,
    interceptors: readonly Interceptor<TSubject, TCall>[],
    options: ExecuteOptions = {},
  ) {
    this.call = call;
    this.currentSubject = subject;
    this.interceptors = interceptors;
    this.options = options;
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  /** The current subject; replaced by `proceedWith()`. */
  get subject(): TSubject {
    return this.currentSubject;
  }

  get state(): PipelineState {
    return this.runState;
  }

  /** Aborts when this run is cancelled; pass it to cancellable I/O. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Number of interceptors in the flattened chain. */
  get size(): number {
    return this.interceptors.length;
  }

  /** Index of the next interceptor to run. */
  get position(): number {
    return this.index;
  }

  /** Whether the chain has ended (finish(), exhaustion or a stop). */
  get isFinished(): boolean {
    return this.finished;
  }

  // -------------------------------------------------------------------------
  // Run
  // -------------------------------------------------------------------------

  /**
   * Run the chain from the first interceptor and resolve with the final
   * subject. A context can be executed once.
   */
  async execute(): Promise<TSubject> {
    if (this.runState !== 'not-started') {
      throw new ExecutionStateError(`Pipeline context already executed (state: ${this.runState})`);
    }

    this.runState = 'running';
    this.arm();

    try {
      await this.proceed();
      // An interceptor may have caught the cancellation; it still fails the run.
      if (this.cancellation) {
        throw this.cancellation;
      }
      this.runState = 'finished';
      return this.currentSubject;
    } catch (error: unknown) {
      this.runState = 'failed';
      throw error;
    } finally {
      this.disarm();
      await this.runCleanups();
    }
  }

  /**
   * Invoke the next interceptor with the current subject and resolve with
   * the subject once it returns. Resolves immediately once the run is
   * finished.
   */
  async proceed(): Promise<TSubject> {
    this.assertResumable('proceed');

    if (this.finished) {
      return this.currentSubject;
    }
    if (this.index >= this.interceptors.length) {
      this.finished = true;
      return this.currentSubject;
    }

    const interceptor = this.interceptors[this.index];
    this.index += 1;
    const position = this.index;

    const pending = (async () => interceptor(this, this.currentSubject))();
    await this.untilCancelled(pending);

    if (this.cancellation) {
      throw this.cancellation;
    }
    // Returned without advancing: nothing after it runs.
    if (this.index === position) {
      this.finished = true;
    }

    return this.currentSubject;
  }

  /** Replace the subject for every later interceptor, then proceed. */
  async proceedWith(subject: TSubject): Promise<TSubject> {
    this.assertResumable('proceedWith');
    this.currentSubject = subject;
    return this.proceed();
  }

  /** End the whole run successfully; remaining interceptors are skipped. */
  finish(): void {
    this.finished = true;
  }

  /**
   * Register a cleanup to run once this run settles, whatever the
   * outcome. Cleanups run in reverse registration order.
   */
  defer(cleanup: Cleanup): void {
    if (this.runState === 'finished' || this.runState === 'failed') {
      throw new ExecutionStateError('Cannot defer a cleanup on a settled pipeline run');
    }
    this.cleanups.push(cleanup);
  }

  // -------------------------------------------------------------------------
  // Cancellation
  // -------------------------------------------------------------------------

  private assertResumable(operation: string): void {
    if (this.cancellation) {
      throw this.cancellation;
    }
    if (this.controller.signal.aborted) {
      throw this.markCancelled(this.controller.signal.reason);
    }
    if (this.runState !== 'running') {
      throw new ExecutionStateError(`${operation}() called on a ${this.runState} pipeline run`);
    }
  }

  private markCancelled(reason: unknown): CancellationError {
    this.cancellation ??= new CancellationError(reason);
    return this.cancellation;
  }

  /** Settle with the interceptor, or reject as soon as the run is aborted. */
  private untilCancelled(pending: Promise<void>): Promise<void> {
    const signal = this.controller.signal;

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        reject(this.markCancelled(signal.reason));
      };

      pending.then(
        () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );

      // The interceptor may have aborted before returning its promise.
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Chain the external signal and the timeout to this run's controller. */
  private arm(): void {
    const { signal, timeoutMs } = this.options;
    const teardown: Array<() => void> = [];

    if (signal) {
      if (signal.aborted) {
        this.controller.abort(signal.reason);
      } else {
        const onAbort = (): void => this.controller.abort(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
        teardown.push(() => signal.removeEventListener('abort', onAbort));
      }
    }

    if (timeoutMs !== undefined) {
      const timer = setTimeout(() => {
        this.controller.abort(new Error(`timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      teardown.push(() => clearTimeout(timer));
    }

    this.detach = () => {
      for (const fn of teardown) fn();
    };
  }

  private disarm(): void {
    this.detach?.();
    this.detach = null;
  }

  private async runCleanups(): Promise<void> {
    while (this.cleanups.length > 0) {
      const cleanup = this.cleanups.pop();
      if (!cleanup) break;
      try {
        await cleanup();
      } catch (error: unknown) {
        logger.warn('pipeline cleanup failed', { error });
      }
    }
  }
}
