/**
 * Commit and Undo Action Execution
 *
 * @module output/actions
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileExists } from '../storage/files.js';
import type { CommitAction, UndoAction } from './types.js';

export interface CommitHooks {
  /** Called once the destination has been copied to the backup path */
  onBackupCreated?: () => void;
}

export interface CommitResult {
  /** Set when the destination was replaced but the backup could not be removed */
  backupCleanupError?: unknown;
}

/**
 * Make a staged write visible at its destination.
 *
 * A replaced destination is copied to its backup path first; if the rename
 * over the destination fails the backup is moved back before rethrowing.
 * Once the rename has succeeded the write counts as committed, so a failure
 * to remove the backup is returned rather than thrown.
 */
export async function executeCommitAction(
  action: CommitAction,
  hooks: CommitHooks = {}
): Promise<CommitResult> {
  switch (action.kind) {
    case 'move':
      await moveIntoPlace(action.stagingPath, action.destinationPath);
      return {};

    case 'replaceWithBackup': {
      try {
        await fs.copyFile(action.destinationPath, action.backupPath);
      } catch (error) {
        // Destination removed since staging: nothing left to back up.
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
          await moveIntoPlace(action.stagingPath, action.destinationPath);
          return {};
        }
        throw error;
      }
      hooks.onBackupCreated?.();

      try {
        await fs.rename(action.stagingPath, action.destinationPath);
      } catch (error) {
        await fs.rename(action.backupPath, action.destinationPath);
        throw error;
      }

      try {
        await fs.unlink(action.backupPath);
      } catch (error) {
        return { backupCleanupError: error };
      }
      return {};
    }
  }
}

/**
 * Reverse a staged write that was not committed.
 *
 * `restoreBackup` puts back whatever sits at the backup path, so it must only
 * run for a write whose commit created that backup.
 */
export async function executeUndoAction(action: UndoAction): Promise<void> {
  await fs.rm(action.stagingPath, { force: true });

  if (action.kind === 'restoreBackup' && (await fileExists(action.backupPath))) {
    await fs.rename(action.backupPath, action.destinationPath);
  }
}

async function moveIntoPlace(stagingPath: string, destinationPath: string): Promise<void> {
  await fs.mkdir(path.dirname(destinationPath), { recursive: true });
  await fs.rename(stagingPath, destinationPath);
}
