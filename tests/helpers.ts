import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import type { AdapterConfig } from '../src/benchmark/adapters/index.js';
import type { BenchmarkOutcome } from '../src/benchmark/types.js';
import type { ProcessOptions, ProcessResult } from '../src/utils/runProcess.js';

export const adapterConfig: AdapterConfig = {
  iterations: 100,
  warmup: 5,
  multiStepDivisor: 10,
  multiStepWarmupCap: 2,
  errorDetailLimit: 200,
};

/** Advances one millisecond per reading, so each timed call costs exactly 1 ms. */
export function steppingClock(stepMs = 1): () => number {
  let now = 0;
  return () => {
    now += stepMs;
    return now;
  };
}

export function fakeRunner(respond: (command: string, args: readonly string[], options?: ProcessOptions) => ProcessResult | Promise<ProcessResult> = () => ok()) {
  return vi.fn(async (command: string, args: readonly string[], options?: ProcessOptions): Promise<ProcessResult> =>
    respond(command, args, options)
  );
}

export function ok(stdout = '<p>ok</p>'): ProcessResult {
  return { code: 0, stdout, stderr: '' };
}

export function failed(code: number, stderr = ''): ProcessResult {
  return { code, stdout: '', stderr };
}

export function success(toolName: string, averageSeconds: number, simplifiedInput = false): BenchmarkOutcome {
  return { toolName, averageSeconds, error: null, simplifiedInput, iterations: 100 };
}

export function failure(toolName: string, error: string): BenchmarkOutcome {
  return { toolName, averageSeconds: null, error, simplifiedInput: false, iterations: 100 };
}

export async function makeTempDir(prefix = 'rst-bench-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeExecutable(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, '#!/bin/sh\nexit 0\n', { mode: 0o755 });
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function collectingSink(): { write(text: string): void; text(): string; lines(): string[] } {
  const chunks: string[] = [];
  return {
    write: text => {
      chunks.push(text);
    },
    text: () => chunks.join(''),
    lines: () => chunks.join('').split('\n'),
  };
}
