import fs from 'node:fs/promises';
import path from 'node:path';
import { multiStepIterations, multiStepWarmup } from '../../config/settings.js';
import type { MultiStepDirTool, ToolHandle } from '../../tools/types.js';
import { withTempDir } from '../../utils/tempDir.js';
import { BaseAdapter, type Measurement } from './BaseAdapter.js';

/**
 * For converters that build a whole output tree from a source directory.
 * Each iteration clears the build directory, rewrites the sources and runs
 * the tool. Far slower per run, so it gets a fraction of the iterations.
 */
export class MultiStepDirAdapter extends BaseAdapter<MultiStepDirTool> {
  protected execute(tool: MultiStepDirTool, handle: ToolHandle, input: string): Promise<Measurement> {
    const { command, prefixArgs } = this.requireExecutable(tool, handle);

    return withTempDir('rst-bench-multistep-', async dir => {
      const sourceDir = path.join(dir, 'source');
      const outputDir = path.join(dir, 'build');
      const args = [...prefixArgs, ...tool.args(sourceDir, outputDir)];
      const invoke = this.processOperation(command, args);

      const operation = async () => {
        await fs.rm(outputDir, { recursive: true, force: true });
        await fs.mkdir(sourceDir, { recursive: true });
        await fs.writeFile(path.join(sourceDir, tool.configFile.name), tool.configFile.contents, 'utf-8');
        await fs.writeFile(path.join(sourceDir, tool.sourceFileName), input, 'utf-8');
        return invoke();
      };

      const iterations = multiStepIterations(this.config);
      this.log.debug(`${tool.name}: ${iterations} iterations in ${dir}`);
      return this.timeIt(operation, multiStepWarmup(this.config), iterations);
    });
  }
}
