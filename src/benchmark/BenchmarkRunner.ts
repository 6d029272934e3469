import { performance } from 'node:perf_hooks';
import { multiStepIterations, resolveFromRoot, type BenchmarkConfig } from '../config/settings.js';
import { DEFAULT_TOOLS } from '../tools/catalog.js';
import { ToolRegistry, availableOnly, createProbeContext } from '../tools/ToolRegistry.js';
import type { AvailableDetection, Detection, ToolDescriptor } from '../tools/types.js';
import { logger } from '../utils/logger.js';
import type { ProcessRunner } from '../utils/runProcess.js';
import { createAdapters, runDetected, type AdapterSet } from './adapters/index.js';
import { Reporter, type ReportSink } from './Reporter.js';
import { aggregate } from './ResultAggregator.js';
import { loadSample } from './SampleLoader.js';
import type { BenchmarkOutcome, ResultSet } from './types.js';

const log = logger.child('runner');

export interface BenchmarkRunnerOptions {
  tools?: readonly ToolDescriptor[];
  registry?: ToolRegistry;
  adapters?: AdapterSet;
  sink?: ReportSink;
  runner?: ProcessRunner;
  clock?: () => number;
}

export interface RunSummary {
  exitCode: number;
  detections: Detection[];
  results: ResultSet;
  durationMs: number;
}

/**
 * One pass: load the sample, detect tools, benchmark the available ones one
 * at a time, then report. Throws FatalPreconditionError when the sample is
 * missing, before anything is printed.
 */
export class BenchmarkRunner {
  private readonly tools: readonly ToolDescriptor[];
  private readonly registry: ToolRegistry;
  private readonly adapters: AdapterSet;
  private readonly reporter: Reporter;

  constructor(private readonly config: BenchmarkConfig, options: BenchmarkRunnerOptions = {}) {
    this.tools = options.tools ?? DEFAULT_TOOLS;
    const probeOverrides = options.runner ? { runner: options.runner } : {};
    this.registry = options.registry ?? new ToolRegistry(createProbeContext(config, probeOverrides));
    this.adapters = options.adapters ?? createAdapters({ config, runner: options.runner, clock: options.clock });
    this.reporter = new Reporter({
      primaryTool: config.primaryTool,
      displayOrder: config.displayOrder,
      tools: this.tools,
      sink: options.sink,
    });
  }

  async run(): Promise<RunSummary> {
    const started = performance.now();
    const sample = await loadSample(
      resolveFromRoot(this.config, this.config.sampleFile),
      resolveFromRoot(this.config, this.config.simplifiedSampleFile)
    );

    this.reporter.header(sample, this.config.iterations, this.reducedIterations());

    const detections = await this.registry.detectAll(this.tools);
    this.reporter.detection(detections);

    const available = this.benchmarkOrder(availableOnly(detections));
    if (available.length === 0) {
      this.reporter.noToolsFound();
      return { exitCode: 1, detections, results: new Map(), durationMs: performance.now() - started };
    }

    this.reporter.benchmarksStarting();
    const outcomes: BenchmarkOutcome[] = [];
    for (const detection of available) {
      this.reporter.progressStart(detection.tool.name);
      const outcome = await runDetected(this.adapters, detection, sample);
      log.debug(`${detection.tool.name} finished`, outcome);
      this.reporter.progressEnd(outcome);
      outcomes.push(outcome);
    }

    const results = aggregate(outcomes);
    this.reporter.results(results);

    return { exitCode: 0, detections, results, durationMs: performance.now() - started };
  }

  private reducedIterations(): Map<string, number> {
    const reduced = new Map<string, number>();
    for (const tool of this.tools) {
      if (tool.kind === 'multi-step-dir') {
        reduced.set(tool.name, multiStepIterations(this.config));
      }
    }
    return reduced;
  }

  private benchmarkOrder(available: AvailableDetection[]): AvailableDetection[] {
    const { displayOrder } = this.config;
    const rank = (detection: AvailableDetection) => {
      const index = displayOrder.indexOf(detection.tool.name);
      return index === -1 ? displayOrder.length : index;
    };
    // Array.prototype.sort is stable, so unlisted tools keep catalog order.
    return [...available].sort((a, b) => rank(a) - rank(b));
  }
}
