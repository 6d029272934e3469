import { performance } from 'node:perf_hooks';
import { describeError } from '../utils/errors.js';
import type { Operation, OperationResult, TimingOptions, TimingResult } from './types.js';

async function attempt(operation: Operation): Promise<OperationResult> {
  try {
    return await operation();
  } catch (error) {
    return { ok: false, detail: describeError(error) };
  }
}

/**
 * Mean wall-clock cost of `operation`: `warmup` discarded runs, then
 * `iterations` timed runs. The first failed timed run aborts the measurement;
 * warmup failures are ignored.
 */
export async function measure(operation: Operation, options: TimingOptions): Promise<TimingResult> {
  const { warmup, iterations } = options;
  const clock = options.clock ?? (() => performance.now());

  if (!Number.isInteger(iterations) || iterations < 1) {
    return { ok: false, detail: `invalid iteration count: ${iterations}` };
  }

  for (let i = 0; i < warmup; i++) {
    await attempt(operation);
  }

  let totalMs = 0;
  for (let i = 0; i < iterations; i++) {
    const started = clock();
    const result = await attempt(operation);
    totalMs += clock() - started;
    if (!result.ok) {
      return result;
    }
  }

  if (totalMs <= 0) {
    return { ok: false, detail: 'measured no elapsed time' };
  }

  return { ok: true, averageSeconds: totalMs / 1000 / iterations };
}
