import fs from 'node:fs/promises';
import path from 'node:path';
import { beforeEach, describe, it, expect } from 'vitest';
import { loadSample } from '../../src/benchmark/SampleLoader.js';
import { FatalPreconditionError } from '../../src/utils/errors.js';
import { makeTempDir } from '../helpers.js';

describe('loadSample', () => {
  let dir: string;
  let samplePath: string;
  let simplifiedPath: string;

  beforeEach(async () => {
    dir = await makeTempDir('rst-bench-sample-');
    samplePath = path.join(dir, 'sample.rst');
    simplifiedPath = path.join(dir, 'sample-basic.rst');
  });

  it('reads both documents', async () => {
    await fs.writeFile(samplePath, 'Full\n====\n');
    await fs.writeFile(simplifiedPath, 'Basic\n=====\n');

    expect(await loadSample(samplePath, simplifiedPath)).toEqual({
      path: samplePath,
      text: 'Full\n====\n',
      simplified: 'Basic\n=====\n',
    });
  });

  it('carries on without the simplified document', async () => {
    await fs.writeFile(samplePath, 'Full\n====\n');
    expect(await loadSample(samplePath, simplifiedPath)).toEqual({ path: samplePath, text: 'Full\n====\n' });
  });

  it('skips the simplified document when no path is given', async () => {
    await fs.writeFile(samplePath, 'Full\n====\n');
    const sample = await loadSample(samplePath);
    expect(sample.simplified).toBeUndefined();
  });

  it('treats a missing sample as fatal', async () => {
    const loading = loadSample(samplePath, simplifiedPath);
    await expect(loading).rejects.toBeInstanceOf(FatalPreconditionError);
    await expect(loadSample(samplePath)).rejects.toThrow(`sample document not found at ${samplePath}`);
  });

  it('treats a directory in place of the sample as missing', async () => {
    await fs.mkdir(samplePath);
    await expect(loadSample(samplePath)).rejects.toBeInstanceOf(FatalPreconditionError);
  });
});
