import type { InProcessTool, ToolHandle } from '../../tools/types.js';
import { ToolInvocationError } from '../../utils/errors.js';
import { BaseAdapter, type Measurement } from './BaseAdapter.js';

export class InProcessAdapter extends BaseAdapter<InProcessTool> {
  protected execute(tool: InProcessTool, handle: ToolHandle, input: string): Promise<Measurement> {
    if (handle.kind !== 'library') {
      throw new ToolInvocationError(`${tool.name} needs a library handle`, handle.command);
    }

    const { convert } = handle;
    // A throw or rejection inside convert is turned into a failed iteration by the timing loop.
    return this.timeIt(async () => {
      await convert(input);
      return { ok: true };
    });
  }
}
