import type { AvailableDetection } from '../../tools/types.js';
import type { BenchmarkOutcome, SampleInput } from '../types.js';
import type { AdapterOptions } from './BaseAdapter.js';
import { FileBasedAdapter } from './FileBasedAdapter.js';
import { InProcessAdapter } from './InProcessAdapter.js';
import { MultiStepDirAdapter } from './MultiStepDirAdapter.js';
import { SubprocessAdapter } from './SubprocessAdapter.js';

export { BaseAdapter, processFailureDetail } from './BaseAdapter.js';
export type { AdapterConfig, AdapterOptions } from './BaseAdapter.js';
export { FileBasedAdapter, InProcessAdapter, MultiStepDirAdapter, SubprocessAdapter };

export interface AdapterSet {
  subprocess: SubprocessAdapter;
  inProcess: InProcessAdapter;
  multiStepDir: MultiStepDirAdapter;
  fileBased: FileBasedAdapter;
}

export function createAdapters(options: AdapterOptions): AdapterSet {
  return {
    subprocess: new SubprocessAdapter(options),
    inProcess: new InProcessAdapter(options),
    multiStepDir: new MultiStepDirAdapter(options),
    fileBased: new FileBasedAdapter(options),
  };
}

export function runDetected(
  adapters: AdapterSet,
  detection: AvailableDetection,
  sample: SampleInput
): Promise<BenchmarkOutcome> {
  const { tool, handle } = detection;
  switch (tool.kind) {
    case 'subprocess':
      return adapters.subprocess.run(tool, handle, sample);
    case 'in-process':
      return adapters.inProcess.run(tool, handle, sample);
    case 'multi-step-dir':
      return adapters.multiStepDir.run(tool, handle, sample);
    case 'file-based':
      return adapters.fileBased.run(tool, handle, sample);
  }
}
