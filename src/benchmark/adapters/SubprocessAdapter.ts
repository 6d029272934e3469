import type { SubprocessTool, ToolHandle } from '../../tools/types.js';
import { BaseAdapter, type Measurement } from './BaseAdapter.js';

/** Pipes the whole document to the converter's stdin on every iteration. */
export class SubprocessAdapter extends BaseAdapter<SubprocessTool> {
  protected execute(tool: SubprocessTool, handle: ToolHandle, input: string): Promise<Measurement> {
    const { command, prefixArgs } = this.requireExecutable(tool, handle);
    return this.timeIt(this.processOperation(command, [...prefixArgs, ...tool.args], { input }));
  }
}
