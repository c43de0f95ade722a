/**
 * File system helpers shared by the config loader and the archive mover
 */

import { constants } from 'fs';
import { access, copyFile, rename, rm, unlink } from 'fs/promises';
import { homedir } from 'os';
import { isAbsolute, join, resolve as resolvePath } from 'path';
import { isErrnoException } from '../errors.js';

/**
 * Expand a leading `~` to the user's home directory
 */
export function expandHome(input: string, home: string = homedir()): string {
  if (input === '~') {
    return home;
  }
  if (input.startsWith('~/') || input.startsWith('~\\')) {
    return join(home, input.slice(2));
  }
  return input;
}

/**
 * Resolve a config-relative path: `~` expands to home, relative paths
 * resolve against the directory holding the config file.
 */
export function resolveConfigPath(input: string, baseDir: string, home?: string): string {
  const expanded = expandHome(input, home);
  return isAbsolute(expanded) ? expanded : resolvePath(baseDir, expanded);
}

/**
 * Key used by the dedup cache: absolute and case-insensitive
 */
export function normalizePathKey(filePath: string): string {
  return resolvePath(filePath).toLowerCase();
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.F_OK);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Rename, falling back to copy + unlink when source and destination sit on
 * different volumes. The copy never replaces an existing destination.
 */
export async function moveFile(sourcePath: string, destinationPath: string): Promise<void> {
  try {
    await rename(sourcePath, destinationPath);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
    await copyFile(sourcePath, destinationPath, constants.COPYFILE_EXCL);
    try {
      await unlink(sourcePath);
    } catch (unlinkError) {
      // Keep a single copy: the source stays, the archived copy goes
      await rm(destinationPath, { force: true });
      throw unlinkError;
    }
  }
}
