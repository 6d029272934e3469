import type { ProcessRunner } from '../utils/runProcess.js';

export type ConvertFunction = (input: string) => unknown;

/** What detection hands to an adapter: a command line prefix, or a function to call in this process. */
export type ToolHandle =
  | {
      kind: 'executable';
      command: string;
      prefixArgs: readonly string[];
      warning?: string;
    }
  | {
      kind: 'library';
      module: string;
      convert: ConvertFunction;
    };

export interface ProbeContext {
  projectRoot: string;
  vendorDir: string;
  driversDir: string;
  env: NodeJS.ProcessEnv;
  runner: ProcessRunner;
  importModule: (specifier: string) => Promise<unknown>;
}

export type InputVariant = 'full' | 'simplified';

interface ToolDescriptorBase {
  readonly name: string;
  readonly language: string;
  readonly installHint: string;
  readonly input: InputVariant;
  /** Disclosure printed under the table when the tool produced a timing. */
  readonly footnote?: string;
  locate(probe: ProbeContext): Promise<ToolHandle | null>;
}

export interface SubprocessTool extends ToolDescriptorBase {
  readonly kind: 'subprocess';
  readonly args: readonly string[];
}

export interface InProcessTool extends ToolDescriptorBase {
  readonly kind: 'in-process';
}

export interface MultiStepDirTool extends ToolDescriptorBase {
  readonly kind: 'multi-step-dir';
  readonly configFile: { readonly name: string; readonly contents: string };
  readonly sourceFileName: string;
  args(sourceDir: string, outputDir: string): string[];
}

export interface FileBasedTool extends ToolDescriptorBase {
  readonly kind: 'file-based';
  readonly inputFileName: string;
  args(inputPath: string): string[];
}

export type ToolDescriptor = SubprocessTool | InProcessTool | MultiStepDirTool | FileBasedTool;

export type InvocationKind = ToolDescriptor['kind'];

export type Detection =
  | { status: 'available'; tool: ToolDescriptor; handle: ToolHandle }
  | { status: 'unavailable'; tool: ToolDescriptor; installHint: string; reason?: string };

export type AvailableDetection = Extract<Detection, { status: 'available' }>;
