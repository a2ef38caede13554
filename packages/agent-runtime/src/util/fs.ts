/**
 * Minimal filesystem utilities for the agent runtime.
 */

import { access, rm } from 'node:fs/promises';
import { constants } from 'node:fs';

/**
 * Check if a file or directory exists.
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Remove a file if present. Missing files are not an error.
 */
export async function removeFile(path: string): Promise<void> {
  await rm(path, { force: true });
}
