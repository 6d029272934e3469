import type { ToolDescriptor, ToolHandle } from '../tools/types.js';

export interface SampleInput {
  path: string;
  text: string;
  /** Reduced-feature document for tools with weaker parsers. */
  simplified?: string;
}

export interface BenchmarkOutcome {
  readonly toolName: string;
  readonly averageSeconds: number | null;
  readonly error: string | null;
  readonly simplifiedInput: boolean;
  readonly iterations: number;
}

export type ResultSet = ReadonlyMap<string, BenchmarkOutcome>;

export type OperationResult = { ok: true } | { ok: false; detail: string };

export type Operation = () => Promise<OperationResult> | OperationResult;

export type TimingResult = { ok: true; averageSeconds: number } | { ok: false; detail: string };

export interface TimingOptions {
  warmup: number;
  iterations: number;
  /** Milliseconds; defaults to `performance.now`. */
  clock?: () => number;
}

export interface BenchmarkAdapter<T extends ToolDescriptor = ToolDescriptor> {
  run(tool: T, handle: ToolHandle, sample: SampleInput): Promise<BenchmarkOutcome>;
}

export interface Speedup {
  toolName: string;
  ratio: number;
}
