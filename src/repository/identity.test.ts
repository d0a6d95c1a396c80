import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { identifyRepository, resolveRepositoryIdentity } from './identity.js';
import { RepositoryNotFoundError } from '../utils/errors.js';

describe('resolveRepositoryIdentity', () => {
  let tmp: string;
  let repo: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-repo-'));
    repo = path.join(tmp, 'widgets');
    fs.mkdirSync(path.join(repo, '.git'), { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  function addWorktree(worktreePath: string, name: string, options: { absolute?: boolean; commondir?: boolean } = {}): void {
    const adminDir = path.join(repo, '.git', 'worktrees', name);
    fs.mkdirSync(adminDir, { recursive: true });
    if (options.commondir ?? true) {
      fs.writeFileSync(path.join(adminDir, 'commondir'), '../..\n');
    }
    fs.mkdirSync(worktreePath, { recursive: true });
    const target = options.absolute ? adminDir : path.relative(worktreePath, adminDir);
    fs.writeFileSync(path.join(worktreePath, '.git'), `gitdir: ${target}\n`);
  }

  it('resolves the repository root from a nested directory', async () => {
    const nested = path.join(repo, 'src', 'lib');
    fs.mkdirSync(nested, { recursive: true });

    await expect(resolveRepositoryIdentity(nested)).resolves.toEqual({
      rootPath: repo,
      displayName: 'widgets',
    });
  });

  it('collapses a linked worktree onto its parent repository', async () => {
    const worktree = path.join(repo, '.worktrees', 'feature-x');
    addWorktree(worktree, 'feature-x');

    const fromRoot = await resolveRepositoryIdentity(repo);
    const fromWorktree = await resolveRepositoryIdentity(worktree);

    expect(fromWorktree).toEqual(fromRoot);
    expect(fromWorktree.rootPath).toBe(repo);
  });

  it('follows an absolute gitdir pointer from a worktree outside the repository', async () => {
    const worktree = path.join(tmp, 'widgets-hotfix');
    addWorktree(worktree, 'hotfix', { absolute: true });
    fs.mkdirSync(path.join(worktree, 'docs'));

    await expect(resolveRepositoryIdentity(path.join(worktree, 'docs'))).resolves.toEqual({
      rootPath: repo,
      displayName: 'widgets',
    });
  });

  it('infers the common directory when commondir is absent', async () => {
    const worktree = path.join(tmp, 'widgets-old');
    addWorktree(worktree, 'old', { commondir: false });

    await expect(resolveRepositoryIdentity(worktree)).resolves.toMatchObject({ rootPath: repo });
  });

  it('treats a submodule pointer as its own repository', async () => {
    const submodule = path.join(repo, 'vendor', 'lib');
    const moduleDir = path.join(repo, '.git', 'modules', 'lib');
    fs.mkdirSync(moduleDir, { recursive: true });
    fs.mkdirSync(submodule, { recursive: true });
    fs.writeFileSync(path.join(submodule, '.git'), `gitdir: ${path.relative(submodule, moduleDir)}\n`);

    await expect(resolveRepositoryIdentity(submodule)).resolves.toEqual({
      rootPath: submodule,
      displayName: 'lib',
    });
  });

  it('throws when no ancestor is a repository', async () => {
    const outside = path.join(tmp, 'scratch');
    fs.mkdirSync(outside);

    await expect(resolveRepositoryIdentity(outside)).rejects.toBeInstanceOf(RepositoryNotFoundError);
  });

  it('falls back to the working directory outside a repository', async () => {
    const outside = path.join(tmp, 'scratch');
    fs.mkdirSync(outside);

    await expect(identifyRepository(outside)).resolves.toEqual({
      rootPath: outside,
      displayName: 'scratch',
    });
  });
});
