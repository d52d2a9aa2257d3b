import fs from 'node:fs/promises';
import path from 'node:path';

import { hasRangeDelimiter } from './naming.js';
import { ReportError } from './types.js';

export interface LocatedResultDirs {
  groupDir: string;
  names: string[];
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

export function groupDirFor(criterionDir: string, group: string): string {
  return path.join(criterionDir, group);
}

/**
 * Lists result directories of one benchmark group, sorted by name.
 * Files and directories without a length range in their name are unrelated harness output.
 */
export async function locateResultDirs(criterionDir: string, group: string): Promise<LocatedResultDirs> {
  const groupDir = groupDirFor(criterionDir, group);
  if (!(await isDirectory(groupDir))) {
    throw new ReportError('GROUP_ROOT_MISSING', `Directory ${groupDir} not found.`, { groupDir, group });
  }

  const entries = await fs.readdir(groupDir, { withFileTypes: true });
  const names: string[] = [];
  for (const entry of entries) {
    if (!hasRangeDelimiter(entry.name)) continue;
    // Symlinks count when their target is a directory.
    if (entry.isDirectory() || (entry.isSymbolicLink() && (await isDirectory(path.join(groupDir, entry.name))))) {
      names.push(entry.name);
    }
  }

  return { groupDir, names: names.sort() };
}
