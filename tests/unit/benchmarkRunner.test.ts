import fs from 'node:fs/promises';
import path from 'node:path';
import { beforeEach, describe, it, expect } from 'vitest';
import { BenchmarkRunner } from '../../src/benchmark/BenchmarkRunner.js';
import { loadConfig, type BenchmarkConfig } from '../../src/config/settings.js';
import { docutils, nimRst2html, pandoc, rst2htmlFast } from '../../src/tools/catalog.js';
import type { SubprocessTool, ToolDescriptor, ToolHandle } from '../../src/tools/types.js';
import { FatalPreconditionError } from '../../src/utils/errors.js';
import { collectingSink, failed, fakeRunner, makeTempDir, ok } from '../helpers.js';

function found(tool: SubprocessTool, command: string): SubprocessTool {
  const handle: ToolHandle = { kind: 'executable', command, prefixArgs: [] };
  return { ...tool, locate: async () => handle };
}

function missing<T extends ToolDescriptor>(tool: T): T {
  return { ...tool, locate: async () => null };
}

/**
 * A clock that only moves when a fake converter "runs", so each tool's
 * average equals the cost assigned to its command.
 */
function simulatedTools(costMs: Record<string, number>, failures: Record<string, string> = {}) {
  let now = 0;
  const clock = () => now;
  const runner = fakeRunner(command => {
    now += costMs[command] ?? 0;
    const stderr = failures[command];
    return stderr === undefined ? ok() : failed(1, stderr);
  });
  return { clock, runner };
}

describe('BenchmarkRunner', () => {
  let root: string;
  let config: BenchmarkConfig;

  beforeEach(async () => {
    root = await makeTempDir('rst-bench-runner-');
    config = loadConfig({ projectRoot: root, iterations: 10, warmup: 1 }, {});
  });

  async function writeSamples(): Promise<void> {
    await fs.mkdir(path.join(root, 'benchmarks'), { recursive: true });
    await fs.writeFile(path.join(root, 'benchmarks', 'sample.rst'), 'Title\n=====\n\nBody.\n');
    await fs.writeFile(path.join(root, 'benchmarks', 'sample-basic.rst'), 'Title\n=====\n');
  }

  it('fails before printing anything when the sample is missing', async () => {
    const sink = collectingSink();
    const runner = new BenchmarkRunner(config, { tools: [found(pandoc, 'pandoc')], sink, runner: fakeRunner() });

    await expect(runner.run()).rejects.toBeInstanceOf(FatalPreconditionError);
    expect(sink.text()).toBe('');
  });

  it('exits with status 1 when no tool is installed', async () => {
    await writeSamples();
    const sink = collectingSink();
    const processRunner = fakeRunner();
    const runner = new BenchmarkRunner(config, {
      tools: [missing(rst2htmlFast), missing(pandoc)],
      sink,
      runner: processRunner,
    });

    const summary = await runner.run();

    expect(summary.exitCode).toBe(1);
    expect(summary.results.size).toBe(0);
    expect(processRunner).not.toHaveBeenCalled();
    expect(sink.lines()).toContain('No tools found. Install at least one to run benchmarks.');
    expect(sink.lines()).not.toContain('Running benchmarks...');
  });

  it('benchmarks the detected tools and reports the speedup over the primary', async () => {
    await writeSamples();
    const sink = collectingSink();
    const { clock, runner: processRunner } = simulatedTools(
      { '/fake/rst2html': 1, '/fake/pandoc': 100, '/fake/docutils': 5 },
      { '/fake/docutils': 'docutils: boom\n' }
    );
    const runner = new BenchmarkRunner(config, {
      tools: [
        found(pandoc, '/fake/pandoc'),
        found(docutils, '/fake/docutils'),
        found(rst2htmlFast, '/fake/rst2html'),
        missing(nimRst2html),
      ],
      sink,
      runner: processRunner,
      clock,
    });

    const summary = await runner.run();

    expect(summary.exitCode).toBe(0);
    expect([...summary.results.keys()]).toEqual(['rst2html-fast', 'docutils', 'Pandoc']);
    expect(summary.results.has('Nim rst2html')).toBe(false);
    expect(summary.results.get('rst2html-fast')?.averageSeconds).toBeCloseTo(0.001, 10);
    expect(summary.results.get('Pandoc')?.averageSeconds).toBeCloseTo(0.1, 10);
    expect(summary.results.get('docutils')?.error).toBe('docutils: boom');

    // benchmarks run one at a time in display order
    expect(processRunner.mock.calls[0][0]).toBe('/fake/rst2html');
    expect(processRunner.mock.calls[11][0]).toBe('/fake/docutils');

    const lines = sink.lines();
    expect(lines).toContain('  Iterations: 10');
    expect(lines).toContain(`  [--] ${'Nim rst2html'.padEnd(16)} (install: brew install nim)`);
    expect(lines).toContain(`  ${'docutils'.padEnd(14)}... error: docutils: boom`);
    expect(lines).toContain('  rst2html-fast is 100x faster than Pandoc');
    expect(lines).not.toContain('  rst2html-fast is 5x faster than docutils');
  });

  it('still reports the other tools when the primary fails', async () => {
    await writeSamples();
    const sink = collectingSink();
    const { clock, runner: processRunner } = simulatedTools(
      { '/fake/rst2html': 1, '/fake/pandoc': 100 },
      { '/fake/rst2html': 'panicked at src/main.rs' }
    );
    const runner = new BenchmarkRunner(config, {
      tools: [found(rst2htmlFast, '/fake/rst2html'), found(pandoc, '/fake/pandoc')],
      sink,
      runner: processRunner,
      clock,
    });

    const summary = await runner.run();

    expect(summary.exitCode).toBe(0);
    expect(summary.results.get('Pandoc')?.averageSeconds).toBeCloseTo(0.1, 10);
    expect(sink.lines()).not.toContain('Summary:');
  });
});
