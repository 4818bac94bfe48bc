import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Pipeline } from './pipeline.js';
import { PipelinePhase } from './phase.js';
import { PipelineContext } from './context.js';
import type { Interceptor } from './types.js';
import { CancellationError, ExecutionStateError } from '../pipeline-error.js';
import { captureLogs } from '../../testing/log-capture.js';
import type { LogCapture } from '../../testing/log-capture.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const Main = new PipelinePhase('Main');

type Log = string[];

function pipelineOf(...interceptors: Interceptor<Log, string>[]): Pipeline<Log, string> {
  const pipeline = new Pipeline<Log, string>(Main);
  for (const interceptor of interceptors) {
    pipeline.intercept(Main, interceptor);
  }
  return pipeline;
}

function record(label: string): Interceptor<Log, string> {
  return async (context, log) => {
    log.push(label);
    await context.proceed();
  };
}

/** A promise that never settles, standing in for I/O that ignores the signal. */
function hang(): Promise<void> {
  return new Promise<void>(() => undefined);
}

// ---------------------------------------------------------------------------
// proceed / proceedWith / finish
// ---------------------------------------------------------------------------

describe('PipelineContext chaining', () => {
  it('runs code after proceed() once later interceptors returned', async () => {
    const pipeline = pipelineOf(
      async (context, log) => {
        log.push('a:before');
        await context.proceed();
        log.push('a:after');
      },
      record('b'),
    );

    expect(await pipeline.execute('call', [])).toEqual(['a:before', 'b', 'a:after']);
  });

  it('replaces the subject for later interceptors with proceedWith()', async () => {
    const pipeline = pipelineOf(
      async (context) => {
        await context.proceedWith(['replaced']);
      },
      record('b'),
    );

    expect(await pipeline.execute('call', ['original'])).toEqual(['replaced', 'b']);
  });

  it('stops the run when an interceptor returns without proceeding', async () => {
    const pipeline = pipelineOf(
      (_context, log) => {
        log.push('a');
      },
      record('b'),
    );

    expect(await pipeline.execute('call', [])).toEqual(['a']);
  });

  it('skips every remaining interceptor after finish()', async () => {
    const pipeline = pipelineOf(
      async (context, log) => {
        await context.proceed();
        log.push('a:after');
      },
      (context, log) => {
        log.push('b');
        context.finish();
      },
      record('c'),
    );

    expect(await pipeline.execute('call', [])).toEqual(['b', 'a:after']);
  });

  it('makes proceed() a no-op after finish()', async () => {
    const pipeline = pipelineOf(
      async (context, log) => {
        context.finish();
        const subject = await context.proceed();
        log.push(`same:${subject === log}`);
      },
      record('b'),
    );

    expect(await pipeline.execute('call', [])).toEqual(['same:true']);
  });

  it('exposes the position and size of the run', async () => {
    const positions: number[] = [];
    const pipeline = pipelineOf(
      async (context) => {
        positions.push(context.position, context.size);
        await context.proceed();
      },
      (context) => {
        positions.push(context.position);
      },
    );

    await pipeline.execute('call', []);

    expect(positions).toEqual([1, 2, 2]);
  });

  it('keeps interceptors in order across suspension points', async () => {
    const pipeline = pipelineOf(
      async (context, log) => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        log.push('slow');
        await context.proceed();
      },
      record('fast'),
    );

    expect(await pipeline.execute('call', [])).toEqual(['slow', 'fast']);
  });
});

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

describe('PipelineContext state', () => {
  it('moves from not-started through running to finished', async () => {
    const states: string[] = [];
    const pipeline = pipelineOf(async (context) => {
      states.push(context.state);
      await context.proceed();
    });
    const context = pipeline.createContext('call', []);

    states.push(context.state);
    await context.execute();
    states.push(context.state);

    expect(states).toEqual(['not-started', 'running', 'finished']);
  });

  it('moves to failed when an error escapes', async () => {
    const context = pipelineOf(() => {
      throw new Error('boom');
    }).createContext('call', []);

    await expect(context.execute()).rejects.toThrow('boom');
    expect(context.state).toBe('failed');
  });

  it('refuses to execute twice', async () => {
    const context = pipelineOf(record('a')).createContext('call', []);
    await context.execute();

    await expect(context.execute()).rejects.toThrow(ExecutionStateError);
    await expect(context.execute()).rejects.toThrow('Pipeline context already executed (state: finished)');
  });

  it('refuses proceed() before the run started', async () => {
    const context = new PipelineContext<Log, string>('call', [], []);
    await expect(context.proceed()).rejects.toThrow('proceed() called on a not-started pipeline run');
  });

  it('finishes an empty run with the initial subject', async () => {
    const subject: Log = ['x'];
    expect(await pipelineOf().execute('call', subject)).toBe(subject);
  });
});

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

describe('PipelineContext errors', () => {
  it('propagates an error unchanged to earlier interceptors', async () => {
    const failure = new Error('handler failed');
    let caught: unknown = null;

    const pipeline = pipelineOf(
      async (context, log) => {
        try {
          await context.proceed();
        } catch (error: unknown) {
          caught = error;
          log.push('recovered');
        }
      },
      record('b'),
      () => {
        throw failure;
      },
    );

    expect(await pipeline.execute('call', [])).toEqual(['b', 'recovered']);
    expect(caught).toBe(failure);
  });

  it('rejects execute() with the thrown error when nobody catches it', async () => {
    const failure = new TypeError('bad subject');
    const pipeline = pipelineOf(record('a'), () => {
      throw failure;
    });

    await expect(pipeline.execute('call', [])).rejects.toBe(failure);
  });
});

// ---------------------------------------------------------------------------
// Cancellation
// ---------------------------------------------------------------------------

describe('PipelineContext cancellation', () => {
  it('rejects a suspended run when the signal aborts', async () => {
    const controller = new AbortController();
    const context = pipelineOf(record('a'), async () => {
      controller.abort(new Error('client gone'));
      await hang();
    }).createContext('call', [], { signal: controller.signal });

    const error = await context.execute().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CancellationError);
    expect(error).toHaveProperty('message', 'Pipeline execution cancelled: client gone');
    expect(context.state).toBe('failed');
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort('shutdown');
    const log: Log = [];

    await expect(pipelineOf(record('a')).execute('call', log, { signal: controller.signal })).rejects.toThrow(
      'Pipeline execution cancelled: shutdown',
    );
    expect(log).toEqual([]);
  });

  it('cancels a run that outlives its timeout', async () => {
    const pipeline = pipelineOf(async () => {
      await hang();
    });

    await expect(pipeline.execute('call', [], { timeoutMs: 10 })).rejects.toThrow(
      'Pipeline execution cancelled: timed out after 10ms',
    );
  });

  it('blocks every later proceed() once cancelled', async () => {
    const controller = new AbortController();
    const attempts: unknown[] = [];
    let resume: () => void = () => undefined;

    const pipeline = pipelineOf(
      async (context) => {
        await new Promise<void>((resolve) => {
          resume = resolve;
        });
        try {
          await context.proceed();
        } catch (error: unknown) {
          attempts.push(error);
        }
      },
      record('never'),
    );
    const context = pipeline.createContext('call', [], { signal: controller.signal });
    const run = context.execute();

    controller.abort(new Error('stop'));
    await expect(run).rejects.toBeInstanceOf(CancellationError);

    resume();
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(attempts).toHaveLength(1);
    expect(attempts[0]).toBeInstanceOf(CancellationError);
    expect(context.subject).toEqual([]);
  });

  it('fails the run even when an interceptor swallows the cancellation', async () => {
    const controller = new AbortController();
    const pipeline = pipelineOf(
      async (context) => {
        try {
          await context.proceed();
        } catch {
          // swallowed on purpose
        }
      },
      async () => {
        controller.abort(new Error('stop'));
        await hang();
      },
    );

    await expect(pipeline.execute('call', [], { signal: controller.signal })).rejects.toBeInstanceOf(
      CancellationError,
    );
  });

  it('aborts the context signal handed to interceptors', async () => {
    const controller = new AbortController();
    let seen: AbortSignal | null = null;

    const pipeline = pipelineOf(async (context) => {
      seen = context.signal;
      controller.abort(new Error('stop'));
      await hang();
    });

    await expect(pipeline.execute('call', [], { signal: controller.signal })).rejects.toBeInstanceOf(
      CancellationError,
    );
    expect(seen).not.toBeNull();
    expect(seen).toHaveProperty('aborted', true);
  });
});

// ---------------------------------------------------------------------------
// defer
// ---------------------------------------------------------------------------

describe('PipelineContext.defer', () => {
  let logs: LogCapture;

  beforeEach(() => {
    logs = captureLogs('warn');
  });

  afterEach(() => {
    logs.restore();
  });

  it('runs cleanups in reverse order after success', async () => {
    const order: string[] = [];
    const pipeline = pipelineOf(async (context) => {
      context.defer(() => {
        order.push('first');
      });
      context.defer(async () => {
        order.push('second');
      });
      await context.proceed();
      order.push('body');
    });

    await pipeline.execute('call', []);

    expect(order).toEqual(['body', 'second', 'first']);
  });

  it('runs cleanups after a failure and cancellation', async () => {
    const order: string[] = [];
    const failing = pipelineOf((context) => {
      context.defer(() => {
        order.push('failed');
      });
      throw new Error('boom');
    });
    await expect(failing.execute('call', [])).rejects.toThrow('boom');

    const controller = new AbortController();
    const cancelled = pipelineOf(async (context) => {
      context.defer(() => {
        order.push('cancelled');
      });
      controller.abort(new Error('stop'));
      await hang();
    });
    await expect(cancelled.execute('call', [], { signal: controller.signal })).rejects.toBeInstanceOf(
      CancellationError,
    );

    expect(order).toEqual(['failed', 'cancelled']);
  });

  it('logs a failing cleanup without changing the outcome', async () => {
    const pipeline = pipelineOf(async (context, log) => {
      context.defer(() => {
        throw new Error('cleanup broke');
      });
      log.push('done');
      await context.proceed();
    });

    expect(await pipeline.execute('call', [])).toEqual(['done']);

    const warnings = logs.of('pipeline', 'pipeline cleanup failed');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].meta?.['error']).toMatchObject({ message: 'cleanup broke' });
  });

  it('refuses a cleanup once the run settled', async () => {
    const context = pipelineOf(record('a')).createContext('call', []);
    await context.execute();

    expect(() => context.defer(() => undefined)).toThrow(
      'Cannot defer a cleanup on a settled pipeline run',
    );
  });
});

// ---------------------------------------------------------------------------
// Nested runs
// ---------------------------------------------------------------------------

describe('nested runs', () => {
  it('gives a nested run its own position', async () => {
    const inner = pipelineOf(record('inner-1'), record('inner-2'));
    const outer = pipelineOf(
      async (context, log) => {
        const nested = await inner.execute(context.call, []);
        log.push(...nested);
        await context.proceed();
      },
      record('outer-2'),
    );

    expect(await outer.execute('call', [])).toEqual(['inner-1', 'inner-2', 'outer-2']);
  });

  it('cancels a nested run through the parent signal', async () => {
    const controller = new AbortController();
    const inner = pipelineOf(async () => {
      controller.abort(new Error('stop'));
      await hang();
    });
    let innerError: unknown = null;

    const outer = pipelineOf(async (context) => {
      try {
        await inner.execute(context.call, [], { signal: context.signal });
      } catch (error: unknown) {
        innerError = error;
        throw error;
      }
    });

    await expect(outer.execute('call', [], { signal: controller.signal })).rejects.toBeInstanceOf(
      CancellationError,
    );
    expect(innerError).toBeInstanceOf(CancellationError);
  });
});
