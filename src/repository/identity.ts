import { readFile, stat } from 'fs/promises';
import path from 'path';
import { RepositoryNotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'repository' });

export interface RepositoryIdentity {
  rootPath: string;
  displayName: string;
}

type GitMarker = { type: 'directory' } | { type: 'file' } | null;

async function gitMarker(dir: string): Promise<GitMarker> {
  try {
    const stats = await stat(path.join(dir, '.git'));
    if (stats.isDirectory()) return { type: 'directory' };
    if (stats.isFile()) return { type: 'file' };
    return null;
  } catch {
    return null;
  }
}

async function readTrimmed(filePath: string): Promise<string | null> {
  try {
    return (await readFile(filePath, 'utf-8')).trim();
  } catch {
    return null;
  }
}

/**
 * Follow a `.git` pointer file to the shared metadata directory.
 *
 * A linked worktree's pointer names `<common>/worktrees/<name>`, which holds a
 * `commondir` file pointing back at `<common>`. Pointers without one (submodules)
 * have no common directory and yield null.
 */
async function resolveCommonDir(worktreeDir: string): Promise<string | null> {
  const pointer = await readTrimmed(path.join(worktreeDir, '.git'));
  const match = pointer?.match(/^gitdir:\s*(.+)$/m);
  if (!match) return null;

  const gitDir = path.resolve(worktreeDir, match[1].trim());

  const commonDir = await readTrimmed(path.join(gitDir, 'commondir'));
  if (commonDir) {
    return path.resolve(gitDir, commonDir);
  }

  if (path.basename(path.dirname(gitDir)) === 'worktrees') {
    return path.dirname(path.dirname(gitDir));
  }

  return null;
}

export function identityFromRoot(rootPath: string): RepositoryIdentity {
  const resolved = path.resolve(rootPath);
  return {
    rootPath: resolved,
    displayName: path.basename(resolved) || resolved,
  };
}

/**
 * Map a working directory to its repository, collapsing linked worktrees onto
 * the repository that owns them.
 *
 * @throws RepositoryNotFoundError when no ancestor carries a `.git` marker
 */
export async function resolveRepositoryIdentity(workingDirectory: string): Promise<RepositoryIdentity> {
  let dir = path.resolve(workingDirectory);

  for (;;) {
    const marker = await gitMarker(dir);

    if (marker?.type === 'directory') {
      return identityFromRoot(dir);
    }

    if (marker?.type === 'file') {
      const commonDir = await resolveCommonDir(dir);
      return identityFromRoot(commonDir ? path.dirname(commonDir) : dir);
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new RepositoryNotFoundError(workingDirectory);
    }
    dir = parent;
  }
}

/**
 * Same as `resolveRepositoryIdentity`, but outside a repository the working
 * directory itself stands in as the root.
 */
export async function identifyRepository(workingDirectory: string): Promise<RepositoryIdentity> {
  try {
    return await resolveRepositoryIdentity(workingDirectory);
  } catch (err) {
    if (err instanceof RepositoryNotFoundError) {
      log.debug({ workingDirectory }, 'No repository found, using working directory');
      return identityFromRoot(workingDirectory);
    }
    throw err;
  }
}
