import { readFile } from 'node:fs/promises';
import { FatalPreconditionError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { SampleInput } from './types.js';

const log = logger.child('sample');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');
}

export async function loadSample(samplePath: string, simplifiedPath?: string): Promise<SampleInput> {
  let text: string;
  try {
    text = await readFile(samplePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new FatalPreconditionError(`sample document not found at ${samplePath}`, { cause: error });
    }
    throw error;
  }

  if (!simplifiedPath) {
    return { path: samplePath, text };
  }

  try {
    const simplified = await readFile(simplifiedPath, 'utf-8');
    return { path: samplePath, text, simplified };
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
    log.warn(`simplified sample not found at ${simplifiedPath}; every tool gets the full document`);
    return { path: samplePath, text };
  }
}
