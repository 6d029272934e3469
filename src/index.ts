#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { BenchmarkRunner } from './benchmark/BenchmarkRunner.js';
import { PRIMARY_TOOL, loadConfig } from './config/settings.js';
import { describeError, isFatalError } from './utils/errors.js';
import { isLogLevel, logger } from './utils/logger.js';

interface CliOptions {
  iterations?: number;
  warmup?: number;
  projectRoot?: string;
  logLevel?: string;
}

function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Not a whole number.');
  }
  return parsed;
}

function buildProgram(): Command {
  return new Command()
    .name('rst-bench')
    .description(`Compare ${PRIMARY_TOOL} against other RST-to-HTML converters`)
    .version('0.1.0')
    .option('-n, --iterations <count>', 'measured iterations per tool', parseCount)
    .option('-w, --warmup <count>', 'discarded warmup iterations per tool', parseCount)
    .option('--project-root <dir>', 'directory holding target/ and benchmarks/')
    .option('--log-level <level>', 'silent | error | warn | info | debug | trace');
}

async function main(argv: string[]): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      console.error(`Error: unknown log level ${options.logLevel}`);
      return 1;
    }
    logger.setLevel(options.logLevel);
  }

  try {
    const config = loadConfig({
      iterations: options.iterations,
      warmup: options.warmup,
      projectRoot: options.projectRoot,
    });
    const summary = await new BenchmarkRunner(config).run();
    return summary.exitCode;
  } catch (error) {
    if (isFatalError(error)) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

main(process.argv)
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('Benchmark failed:', error instanceof Error ? error.stack : describeError(error));
    process.exit(1);
  });
