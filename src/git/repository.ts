/**
 * Repository resolution
 * Maps the repository argument of an SSH git command to a bare repository
 * under the shared account's home, creating it on first push.
 */

import fs from 'fs';
import path from 'path';
import { execa } from 'execa';
import { ulid } from 'ulid';
import { config } from '../config.js';
import { PushRelayError, describeError, hasErrorCode, ioError } from '../errors.js';

export interface Repository {
  /** Normalized name, without a `.git` suffix. Passed to the receiver. */
  name: string;
  path: string;
}

export interface ResolvedRepository extends Repository {
  created: boolean;
}

const COMPONENT_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Validate a requested repository name and strip a trailing `.git`.
 */
export function normalizeRepositoryName(requested: string): string {
  const trimmed = requested.trim();
  if (trimmed.startsWith('/') || trimmed.startsWith('~') || trimmed.includes('\\')) {
    throw new PushRelayError('PathTraversal', `Repository path must be relative to the account home: ${requested}`);
  }

  const name = trimmed.replace(/\.git$/, '');
  if (!name) {
    throw new PushRelayError('InvalidName', 'Repository name is required');
  }

  const components = name.split('/');
  if (components.some((c) => c === '..' || c === '.')) {
    throw new PushRelayError('PathTraversal', `Repository path escapes the account home: ${requested}`);
  }
  for (const component of components) {
    if (!component || component.startsWith('.') || !COMPONENT_PATTERN.test(component)) {
      throw new PushRelayError(
        'InvalidName',
        `Invalid repository name "${requested}": use letters, digits and _ . - in components that do not start with "."`
      );
    }
  }
  return name;
}

/**
 * Compute where a repository lives without touching the filesystem.
 */
export function locateRepository(requested: string, home: string): Repository {
  const name = normalizeRepositoryName(requested);
  const root = path.resolve(home);
  const repoPath = path.resolve(root, `${name}.git`);
  const relative = path.relative(root, repoPath);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PushRelayError('PathTraversal', `Repository path escapes the account home: ${requested}`);
  }
  return { name, path: repoPath };
}

export async function isBareRepository(repoPath: string): Promise<boolean> {
  try {
    const [head, objects] = await Promise.all([
      fs.promises.stat(path.join(repoPath, 'HEAD')),
      fs.promises.stat(path.join(repoPath, 'objects')),
    ]);
    return head.isFile() && objects.isDirectory();
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT') || hasErrorCode(err, 'ENOTDIR')) return false;
    throw ioError('Failed to inspect', repoPath, err);
  }
}

/**
 * Resolve a repository, creating an empty bare repository if none exists.
 *
 * The repository is initialized in a hidden sibling directory and renamed into
 * place, so a concurrent resolver never sees a half-initialized store. When
 * two sessions race, the rename of the loser fails and it uses the winner's.
 * An empty directory at the target is replaced; anything else that is not a
 * repository is an error.
 */
export async function resolveRepository(requested: string, home: string): Promise<ResolvedRepository> {
  const repo = locateRepository(requested, home);
  if (await isBareRepository(repo.path)) {
    return { ...repo, created: false };
  }

  const parent = path.dirname(repo.path);
  try {
    await fs.promises.mkdir(parent, { recursive: true });
  } catch (err) {
    throw ioError('Failed to create directory', parent, err);
  }

  const staging = path.join(parent, `.${path.basename(repo.path)}.${ulid()}.tmp`);
  try {
    await execa(config.git.binary, ['init', '--bare', '--quiet', staging]);
  } catch (err) {
    await fs.promises.rm(staging, { recursive: true, force: true });
    throw new PushRelayError('IOError', `git init --bare failed for ${repo.name}: ${describeError(err)}`, { cause: err });
  }

  try {
    await fs.promises.rename(staging, repo.path);
    return { ...repo, created: true };
  } catch (err) {
    await fs.promises.rm(staging, { recursive: true, force: true });
    const lostRace = hasErrorCode(err, 'ENOTEMPTY') || hasErrorCode(err, 'EEXIST');
    if (lostRace && (await isBareRepository(repo.path))) {
      return { ...repo, created: false };
    }
    if (lostRace) {
      throw new PushRelayError('IOError', `${repo.path} exists but is not a bare git repository`, { cause: err });
    }
    throw ioError('Failed to create repository', repo.path, err);
  }
}
