import type { BenchmarkConfig } from '../../config/settings.js';
import type { ToolDescriptor, ToolHandle } from '../../tools/types.js';
import { ToolInvocationError, describeError, truncateDetail } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { runProcess, type ProcessOptions, type ProcessResult, type ProcessRunner } from '../../utils/runProcess.js';
import { measure } from '../TimingProtocol.js';
import type { BenchmarkAdapter, BenchmarkOutcome, Operation, SampleInput, TimingResult } from '../types.js';

export type AdapterConfig = Pick<
  BenchmarkConfig,
  'iterations' | 'warmup' | 'multiStepDivisor' | 'multiStepWarmupCap' | 'errorDetailLimit'
>;

export interface AdapterOptions {
  config: AdapterConfig;
  runner?: ProcessRunner;
  clock?: () => number;
}

export interface Measurement {
  timing: TimingResult;
  iterations: number;
}

export type ExecutableHandle = Extract<ToolHandle, { kind: 'executable' }>;

export function processFailureDetail(result: ProcessResult): string {
  const stderr = result.stderr.trim();
  return stderr.length > 0 ? stderr : `exited with status ${result.code}`;
}

export abstract class BaseAdapter<T extends ToolDescriptor> implements BenchmarkAdapter<T> {
  protected readonly config: AdapterConfig;
  protected readonly runner: ProcessRunner;
  protected readonly log = logger.child('adapter');
  private readonly clock?: () => number;

  constructor(options: AdapterOptions) {
    this.config = options.config;
    this.runner = options.runner ?? runProcess;
    this.clock = options.clock;
  }

  async run(tool: T, handle: ToolHandle, sample: SampleInput): Promise<BenchmarkOutcome> {
    const { input, simplified } = this.selectInput(tool, sample);
    try {
      const { timing, iterations } = await this.execute(tool, handle, input);
      if (timing.ok) {
        return this.outcome(tool, { averageSeconds: timing.averageSeconds, simplified, iterations });
      }
      return this.outcome(tool, { error: timing.detail, simplified, iterations });
    } catch (error) {
      this.log.debug(`${tool.name} failed outside the timed loop`, error);
      return this.outcome(tool, { error: describeError(error), simplified, iterations: 0 });
    }
  }

  protected abstract execute(tool: T, handle: ToolHandle, input: string): Promise<Measurement>;

  protected timeIt(operation: Operation, warmup = this.config.warmup, iterations = this.config.iterations): Promise<Measurement> {
    return measure(operation, { warmup, iterations, clock: this.clock }).then(timing => ({ timing, iterations }));
  }

  /** An operation that succeeds when the process exits with status 0. */
  protected processOperation(command: string, args: readonly string[], options: ProcessOptions = {}): Operation {
    return async () => {
      const result = await this.runner(command, args, options);
      return result.code === 0 ? { ok: true } : { ok: false, detail: processFailureDetail(result) };
    };
  }

  protected requireExecutable(tool: T, handle: ToolHandle): ExecutableHandle {
    if (handle.kind !== 'executable') {
      throw new ToolInvocationError(`${tool.name} needs an executable, got library ${handle.module}`, handle.module);
    }
    return handle;
  }

  private selectInput(tool: T, sample: SampleInput): { input: string; simplified: boolean } {
    if (tool.input === 'simplified' && sample.simplified !== undefined) {
      return { input: sample.simplified, simplified: true };
    }
    return { input: sample.text, simplified: false };
  }

  private outcome(
    tool: T,
    result: { averageSeconds?: number; error?: string; simplified: boolean; iterations: number }
  ): BenchmarkOutcome {
    return Object.freeze({
      toolName: tool.name,
      averageSeconds: result.averageSeconds ?? null,
      error: result.error === undefined ? null : truncateDetail(result.error, this.config.errorDetailLimit) || 'unknown error',
      simplifiedInput: result.simplified,
      iterations: result.iterations,
    });
  }
}
