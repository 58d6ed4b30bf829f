/**
 * Artifact file access.
 *
 * Artifacts are assumed local and reliable: once a file is known to exist,
 * failing to read it is a StateFileError, never a retryable condition.
 */

import { access, readFile } from 'node:fs/promises';
import { writeFile } from 'atomically';

import { StateFileError, errorMessage } from '../errors.js';

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/** Whether an artifact exists. Errors other than "not found" are fatal. */
export async function artifactExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw new StateFileError(`Failed to check ${path}: ${errorMessage(error)}`);
  }
}

export async function readArtifact(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new StateFileError(`Failed to read ${path}: ${errorMessage(error)}`);
  }
}

/** First line of an artifact, or null when it does not exist. */
export async function readFirstLine(path: string): Promise<string | null> {
  if (!(await artifactExists(path))) return null;
  const content = await readArtifact(path);
  return content.split(/\r?\n/, 1)[0] ?? '';
}

export async function writeArtifact(path: string, content: string): Promise<void> {
  try {
    await writeFile(path, content, 'utf-8');
  } catch (error) {
    throw new StateFileError(`Failed to write ${path}: ${errorMessage(error)}`);
  }
}
