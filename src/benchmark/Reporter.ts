import path from 'node:path';
import type { Detection, ToolDescriptor } from '../tools/types.js';
import { truncateDetail } from '../utils/errors.js';
import { countLines, formatBytes, formatTime } from './format.js';
import { baseline, orderedNames, relativeLabel, speedups, succeeded } from './ResultAggregator.js';
import type { BenchmarkOutcome, ResultSet, SampleInput } from './types.js';

export interface ReportSink {
  write(text: string): void;
}

export interface ReporterOptions {
  primaryTool: string;
  displayOrder: readonly string[];
  tools: readonly ToolDescriptor[];
  sink?: ReportSink;
}

const WIDTH = 70;
const PROGRESS_ERROR_LIMIT = 120;
const TABLE_ERROR_LIMIT = 40;

/** Plain-text report on stdout, written section by section as the run progresses. */
export class Reporter {
  private readonly sink: ReportSink;
  private readonly toolsByName: Map<string, ToolDescriptor>;

  constructor(private readonly options: ReporterOptions) {
    this.sink = options.sink ?? process.stdout;
    this.toolsByName = new Map(options.tools.map(tool => [tool.name, tool]));
  }

  header(sample: SampleInput, iterations: number, reducedIterations: ReadonlyMap<string, number>): void {
    this.line('='.repeat(WIDTH));
    this.line(`  ${this.options.primaryTool} benchmark suite`);
    this.line('='.repeat(WIDTH));
    this.line();

    const bytes = Buffer.byteLength(sample.text, 'utf8');
    this.line(`  Document: ${path.basename(sample.path)} (${countLines(sample.text)} lines, ${formatBytes(bytes)} bytes)`);
    const reduced = [...reducedIterations].map(([name, count]) => `${name}: ${count}`).join(', ');
    this.line(`  Iterations: ${iterations}${reduced ? ` (${reduced})` : ''}`);
    this.line();
  }

  detection(detections: readonly Detection[]): void {
    this.line('Detecting tools...');
    for (const detection of detections) {
      if (detection.status === 'available' && detection.handle.kind === 'executable' && detection.handle.warning) {
        this.line(`  WARNING: ${detection.handle.warning}`);
      }
    }
    for (const detection of detections) {
      if (detection.status === 'available') {
        this.line(`  [ok] ${detection.tool.name}`);
      }
    }
    for (const detection of detections) {
      if (detection.status === 'unavailable') {
        this.line(`  [--] ${detection.tool.name.padEnd(16)} (install: ${detection.installHint})`);
      }
    }
  }

  noToolsFound(): void {
    this.line();
    this.line('No tools found. Install at least one to run benchmarks.');
  }

  benchmarksStarting(): void {
    this.line();
    this.line('-'.repeat(WIDTH));
    this.line('Running benchmarks...');
    this.line('-'.repeat(WIDTH));
    this.line();
  }

  progressStart(toolName: string): void {
    this.sink.write(`  ${toolName.padEnd(14)}... `);
  }

  progressEnd(outcome: BenchmarkOutcome): void {
    if (succeeded(outcome)) {
      const note = outcome.simplifiedInput ? '  (simplified input*)' : '';
      this.line(`${formatTime(outcome.averageSeconds)}${note}`);
    } else {
      this.line(`error: ${truncateDetail(outcome.error ?? 'not attempted', PROGRESS_ERROR_LIMIT)}`);
    }
  }

  results(results: ResultSet): void {
    const { primaryTool, displayOrder } = this.options;
    this.line();

    const names = orderedNames(results, displayOrder);
    if (!names.some(name => succeeded(results.get(name)))) {
      this.line('No benchmarks completed successfully.');
      return;
    }

    const base = baseline(results, primaryTool);
    this.table(results, names, base);
    this.summary(results, base);
    this.footnotes(results, names);
    this.line();
  }

  private table(results: ResultSet, names: readonly string[], base: number | null): void {
    const { primaryTool } = this.options;
    this.line('='.repeat(WIDTH));
    this.line(`  ${'Tool'.padEnd(20)} ${'Language'.padEnd(12)} ${'Time'.padStart(12)} ${`vs ${primaryTool}`.padStart(16)}`);
    this.line('='.repeat(WIDTH));

    for (const name of names) {
      const outcome = results.get(name);
      if (!outcome) continue;
      const language = this.toolsByName.get(name)?.language ?? '';
      const prefix = `  ${name.padEnd(20)} ${language.padEnd(12)}`;

      if (succeeded(outcome)) {
        const time = formatTime(outcome.averageSeconds).padStart(12);
        const relative = relativeLabel(outcome, base, primaryTool).padStart(16);
        this.line(`${prefix} ${time} ${relative}`);
      } else {
        this.line(`${prefix} error: ${truncateDetail(outcome.error ?? 'not attempted', TABLE_ERROR_LIMIT)}`);
      }
    }

    this.line('='.repeat(WIDTH));
    this.line();
  }

  private summary(results: ResultSet, base: number | null): void {
    const { primaryTool, displayOrder } = this.options;
    const rows = speedups(results, base, primaryTool, orderedNames(results, displayOrder));
    if (rows.length === 0) {
      return;
    }
    this.line('Summary:');
    for (const { toolName, ratio } of rows) {
      this.line(`  ${primaryTool} is ${ratio.toFixed(0)}x faster than ${toolName}`);
    }
  }

  private footnotes(results: ResultSet, names: readonly string[]): void {
    const notes: string[] = [];
    for (const name of names) {
      const outcome = results.get(name);
      const footnote = this.toolsByName.get(name)?.footnote;
      if (!footnote || !succeeded(outcome)) continue;
      const tool = this.toolsByName.get(name);
      // A simplified-input disclosure only applies when the simplified document was actually used.
      if (tool?.input === 'simplified' && !outcome.simplifiedInput) continue;
      notes.push(`  * ${footnote}`);
    }

    if (notes.length === 0) {
      return;
    }
    this.line();
    notes.forEach(note => this.line(note));
  }

  private line(text = ''): void {
    this.sink.write(`${text}\n`);
  }
}
