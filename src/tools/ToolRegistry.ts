import path from 'node:path';
import { PACKAGE_ROOT, resolveFromRoot, type BenchmarkConfig } from '../config/settings.js';
import { describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { runProcess } from '../utils/runProcess.js';
import type { AvailableDetection, Detection, ProbeContext, ToolDescriptor } from './types.js';

const log = logger.child('registry');

export const DRIVERS_DIR = path.join(PACKAGE_ROOT, 'benchmarks', 'drivers');

export function createProbeContext(config: BenchmarkConfig, overrides: Partial<ProbeContext> = {}): ProbeContext {
  return {
    projectRoot: config.projectRoot,
    vendorDir: resolveFromRoot(config, config.vendorDir),
    driversDir: DRIVERS_DIR,
    env: process.env,
    runner: runProcess,
    importModule: specifier => import(specifier),
    ...overrides,
  };
}

/** Read-only probing of which converters can be invoked on this machine. */
export class ToolRegistry {
  constructor(private readonly probe: ProbeContext) {}

  async detect(tool: ToolDescriptor): Promise<Detection> {
    try {
      const handle = await tool.locate(this.probe);
      if (handle) {
        log.debug(`${tool.name} available`, handle.kind === 'executable' ? handle.command : handle.module);
        return { status: 'available', tool, handle };
      }
      return { status: 'unavailable', tool, installHint: tool.installHint };
    } catch (error) {
      log.debug(`${tool.name} probe failed`, error);
      return { status: 'unavailable', tool, installHint: tool.installHint, reason: describeError(error) };
    }
  }

  /** One detection per tool, in the order given; probes run one after another. */
  async detectAll(tools: readonly ToolDescriptor[]): Promise<Detection[]> {
    const detections: Detection[] = [];
    for (const tool of tools) {
      detections.push(await this.detect(tool));
    }
    return detections;
  }
}

export function availableOnly(detections: readonly Detection[]): AvailableDetection[] {
  return detections.filter((detection): detection is AvailableDetection => detection.status === 'available');
}
