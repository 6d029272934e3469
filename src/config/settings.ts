import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// src/config and dist/config both sit two levels below the package root.
export const PACKAGE_ROOT = path.resolve(__dirname, '../..');

export const PRIMARY_TOOL = 'rst2html-fast';

export const DEFAULT_DISPLAY_ORDER = [
  PRIMARY_TOOL,
  'docutils',
  'Pandoc',
  'Sphinx',
  'Nim rst2html',
  'Gregwar/RST',
  'restructured',
] as const;

const positiveInt = z.coerce.number().int().positive();

const ConfigSchema = z.object({
  iterations: positiveInt.default(100),
  warmup: z.coerce.number().int().nonnegative().default(5),
  multiStepDivisor: positiveInt.default(10),
  multiStepWarmupCap: z.coerce.number().int().nonnegative().default(2),
  errorDetailLimit: positiveInt.default(200),
  primaryTool: z.string().min(1).default(PRIMARY_TOOL),
  displayOrder: z.array(z.string().min(1)).default([...DEFAULT_DISPLAY_ORDER]),
  projectRoot: z.string().min(1).default(PACKAGE_ROOT),
  sampleFile: z.string().min(1).default('benchmarks/sample.rst'),
  simplifiedSampleFile: z.string().min(1).default('benchmarks/sample-basic.rst'),
  vendorDir: z.string().min(1).default('benchmarks/vendor'),
});

/** Raw values from the environment or CLI; the schema coerces and validates them. */
export type BenchmarkConfigInput = Partial<Record<keyof z.input<typeof ConfigSchema>, unknown>>;

export interface BenchmarkConfig extends Readonly<Omit<z.output<typeof ConfigSchema>, 'displayOrder'>> {
  readonly displayOrder: readonly string[];
}

/** Environment variables that override defaults; CLI flags override these in turn. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): BenchmarkConfigInput {
  const input: BenchmarkConfigInput = {};
  if (env.RST_BENCH_ITERATIONS) input.iterations = env.RST_BENCH_ITERATIONS;
  if (env.RST_BENCH_WARMUP) input.warmup = env.RST_BENCH_WARMUP;
  if (env.RST_BENCH_PROJECT_ROOT) input.projectRoot = env.RST_BENCH_PROJECT_ROOT;
  return input;
}

export function loadConfig(
  overrides: BenchmarkConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): BenchmarkConfig {
  const merged = { ...configFromEnv(env), ...dropUndefined(overrides) };
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid benchmark configuration: ${issues}`, { cause: parsed.error });
  }

  const config = parsed.data;
  return Object.freeze({
    ...config,
    projectRoot: path.resolve(config.projectRoot),
    displayOrder: Object.freeze([...config.displayOrder]),
  });
}

export function resolveFromRoot(config: BenchmarkConfig, relative: string): string {
  return path.resolve(config.projectRoot, relative);
}

/** Measured iterations for tools that rebuild a whole output directory per run. */
export function multiStepIterations(config: Pick<BenchmarkConfig, 'iterations' | 'multiStepDivisor'>): number {
  return Math.max(1, Math.floor(config.iterations / config.multiStepDivisor));
}

export function multiStepWarmup(config: Pick<BenchmarkConfig, 'warmup' | 'multiStepWarmupCap'>): number {
  return Math.min(config.warmup, config.multiStepWarmupCap);
}

function dropUndefined(input: BenchmarkConfigInput): BenchmarkConfigInput {
  const result: BenchmarkConfigInput = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}
