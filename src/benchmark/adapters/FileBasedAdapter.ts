import fs from 'node:fs/promises';
import path from 'node:path';
import type { FileBasedTool, ToolHandle } from '../../tools/types.js';
import { withTempDir } from '../../utils/tempDir.js';
import { BaseAdapter, type Measurement } from './BaseAdapter.js';

/** For converters that only take a file argument. Whatever they write beside the input is dropped with the temp dir. */
export class FileBasedAdapter extends BaseAdapter<FileBasedTool> {
  protected execute(tool: FileBasedTool, handle: ToolHandle, input: string): Promise<Measurement> {
    const { command, prefixArgs } = this.requireExecutable(tool, handle);

    return withTempDir('rst-bench-file-', async dir => {
      const inputPath = path.join(dir, tool.inputFileName);
      await fs.writeFile(inputPath, input, 'utf-8');
      return this.timeIt(this.processOperation(command, [...prefixArgs, ...tool.args(inputPath)], { cwd: dir }));
    });
  }
}
