/**
 * Staging File Allocation
 *
 * Each result document is written to a randomly named file in its
 * destination's directory, so the final rename never crosses devices.
 *
 * @module output/staging
 */

import * as fs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';
import { StagingAllocationError, describeError } from './errors.js';

const NAME_ALPHABET = 'abcdefghijklmnopqrstuvwxyz012345';

/**
 * Generate a random 8.3 file name such as `k3x0ab1q.z4d`.
 */
export function randomFileName(): string {
  const bytes = randomBytes(11);
  let name = '';
  for (const byte of bytes) {
    name += NAME_ALPHABET[byte % NAME_ALPHABET.length];
  }
  return `${name.slice(0, 8)}.${name.slice(8)}`;
}

/**
 * Options for allocating a staging file.
 */
export interface StagingOptions {
  /** Name generator (defaults to randomFileName) */
  randomName?: () => string;
  /** Names tried before giving up */
  maxAttempts: number;
}

/**
 * A newly created, empty staging file.
 */
export interface StagingFile {
  path: string;
  handle: FileHandle;
}

/**
 * Create a new staging file next to the destination.
 *
 * The destination directory is created if absent. A name that already
 * exists is never opened; another name is generated instead.
 *
 * @param destinationPath - Final path of the document
 * @param options - Name generator and attempt limit
 * @returns The staging file, opened for writing
 * @throws StagingAllocationError on any failure other than a name collision,
 *   or when every attempted name already exists
 */
export async function allocateStagingFile(
  destinationPath: string,
  options: StagingOptions
): Promise<StagingFile> {
  const randomName = options.randomName ?? randomFileName;
  const directory = path.dirname(destinationPath);

  try {
    await fs.mkdir(directory, { recursive: true });
  } catch (error) {
    throw new StagingAllocationError(
      `Cannot create directory ${directory}: ${describeError(error)}`,
      destinationPath,
      0,
      { cause: error }
    );
  }

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    const candidate = path.join(directory, randomName());

    try {
      const handle = await fs.open(candidate, 'wx');
      return { path: candidate, handle };
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
        continue;
      }
      throw new StagingAllocationError(
        `Cannot create staging file for ${destinationPath}: ${describeError(error)}`,
        destinationPath,
        attempt,
        { cause: error }
      );
    }
  }

  throw new StagingAllocationError(
    `No unused staging file name for ${destinationPath} after ${options.maxAttempts} attempts`,
    destinationPath,
    options.maxAttempts
  );
}
