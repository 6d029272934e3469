import { constants as fsConstants } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { logger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import type { ConvertFunction, ProbeContext, ToolHandle } from './types.js';

const log = logger.child('probe');

export const DEBUG_BUILD_WARNING = "Using debug build. Run 'cargo build --release' for accurate benchmarks.";

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    await fs.access(candidate, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function fileExists(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function filesExist(paths: readonly string[]): Promise<boolean> {
  for (const candidate of paths) {
    if (!(await fileExists(candidate))) {
      log.debug(`missing supplementary file ${candidate}`);
      return false;
    }
  }
  return true;
}

/** Cargo's release build, else its debug build with a warning. */
export async function findBuild(projectRoot: string, binary: string): Promise<ToolHandle | null> {
  const release = path.join(projectRoot, 'target', 'release', binary);
  if (await isExecutableFile(release)) {
    return { kind: 'executable', command: release, prefixArgs: [] };
  }

  const debug = path.join(projectRoot, 'target', 'debug', binary);
  if (await isExecutableFile(debug)) {
    return { kind: 'executable', command: debug, prefixArgs: [], warning: DEBUG_BUILD_WARNING };
  }

  return null;
}

export async function findOnPath(command: string, env: NodeJS.ProcessEnv): Promise<string | null> {
  if (command.includes(path.sep)) {
    return (await isExecutableFile(command)) ? path.resolve(command) : null;
  }

  const dirs = (env.PATH ?? '').split(path.delimiter).filter(dir => dir.length > 0);
  for (const dir of dirs) {
    const candidate = path.join(dir, command);
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

/** RST_BENCH_PYTHON, then the benchmark virtualenv, then python3/python on PATH. */
export async function findPython(probe: ProbeContext): Promise<string | null> {
  const override = probe.env.RST_BENCH_PYTHON;
  if (override) {
    return findOnPath(override, probe.env);
  }

  const venvPython = path.join(probe.projectRoot, 'benchmarks', '.venv', 'bin', 'python');
  if (await isExecutableFile(venvPython)) {
    return venvPython;
  }

  return (await findOnPath('python3', probe.env)) ?? findOnPath('python', probe.env);
}

export async function hasPythonModule(probe: ProbeContext, python: string, moduleName: string): Promise<boolean> {
  try {
    const result = await probe.runner(python, ['-c', `import ${moduleName}`], { env: probe.env });
    return result.code === 0;
  } catch (error) {
    log.debug(`python probe for ${moduleName} failed: ${describeError(error)}`);
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (typeof value === 'object' || typeof value === 'function') && value !== null;
}

function pickFunction(namespace: unknown, exportName: string): ConvertFunction | null {
  if (!isRecord(namespace)) return null;

  const direct = namespace[exportName];
  if (typeof direct === 'function') {
    return input => direct.call(namespace, input);
  }

  // CommonJS packages surface their exports on `default` when imported from ESM.
  const fallback = namespace.default;
  if (isRecord(fallback)) {
    const nested = fallback[exportName];
    if (typeof nested === 'function') {
      return input => nested.call(fallback, input);
    }
  }
  return null;
}

export async function loadLibraryFunction(
  probe: ProbeContext,
  moduleName: string,
  exportName: string
): Promise<ConvertFunction | null> {
  try {
    const namespace = await probe.importModule(moduleName);
    const convert = pickFunction(namespace, exportName);
    if (!convert) {
      log.debug(`${moduleName} has no callable export ${exportName}`);
    }
    return convert;
  } catch (error) {
    log.debug(`cannot import ${moduleName}: ${describeError(error)}`);
    return null;
  }
}
