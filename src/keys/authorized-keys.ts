import fs from 'fs';
import path from 'path';
import type { Account } from '../config.js';
import { sessionContextToEnv } from '../context.js';
import { hasErrorCode, ioError } from '../errors.js';
import { renderShellCommand, type Launcher } from '../launcher.js';
import { ensureDir, withFileLock, writeFileAtomic } from '../utils/fs.js';
import type { Identity, PublicKey } from './identity.js';

/**
 * The account only exists to run the forced command.
 */
export const KEY_RESTRICTIONS = [
  'no-agent-forwarding',
  'no-pty',
  'no-user-rc',
  'no-X11-forwarding',
  'no-port-forwarding',
] as const;

export interface AuthorizedKeysEntry {
  command: string;
  options: readonly string[];
  key: PublicKey;
  comment: string;
}

/**
 * What the forced command needs besides the identity: which program to start
 * and which account it serves.
 */
export interface ForcedCommandTemplate {
  launcher: Launcher;
  account: string;
  /** Embedded only when the home directory is overridden. */
  home?: string;
}

export interface AuthorizeResult {
  path: string;
  line: string;
  replaced: boolean;
}

export function getAuthorizedKeysPath(home: string): string {
  return path.join(home, '.ssh', 'authorized_keys');
}

export function buildEntry(identity: Identity, key: PublicKey, template: ForcedCommandTemplate): AuthorizedKeysEntry {
  const command = renderShellCommand({
    env: sessionContextToEnv({ account: template.account, home: template.home, identity }),
    launcher: template.launcher,
    verb: 'run',
  });
  return { command, options: KEY_RESTRICTIONS, key, comment: identity.username };
}

/**
 * sshd unescapes only `\"` inside an option value; every other backslash
 * reaches the shell as written.
 */
export function serializeEntry(entry: AuthorizedKeysEntry): string {
  const command = entry.command.replace(/"/g, '\\"');
  const options = [`command="${command}"`, ...entry.options].join(',');
  return `${options} ${entry.key.algorithm} ${entry.key.body} ${entry.comment}`;
}

/**
 * Extract the forced command from an authorized_keys line the way sshd reads
 * the `command` option.
 */
export function forcedCommandOf(line: string): string | null {
  const trimmed = line.trim();
  const prefix = 'command="';
  if (!trimmed.startsWith(prefix)) return null;

  let command = '';
  for (let i = prefix.length; i < trimmed.length; i++) {
    const char = trimmed[i];
    if (char === '"') return command;
    if (char === '\\' && trimmed[i + 1] === '"') {
      i++;
      command += '"';
    } else {
      command += char;
    }
  }
  return null;
}

function lineHasKey(line: string, body: string): boolean {
  return line.trim().split(/\s+/).includes(body);
}

/**
 * Add or update the authorized_keys line for a key. Lines are keyed by the
 * exact key body, so re-uploading a key replaces its line in place.
 */
export async function authorize(
  identity: Identity,
  key: PublicKey,
  template: ForcedCommandTemplate,
  account: Account
): Promise<AuthorizeResult> {
  const file = getAuthorizedKeysPath(account.home);
  await ensureDir(path.dirname(file), 0o700);

  const line = serializeEntry(buildEntry(identity, key, template));

  return withFileLock(file, async () => {
    const existing = await readLines(file);
    let replaced = false;
    const lines: string[] = [];
    for (const current of existing) {
      if (!lineHasKey(current, key.body)) {
        lines.push(current);
      } else if (!replaced) {
        lines.push(line);
        replaced = true;
      }
    }
    if (!replaced) {
      lines.push(line);
    }

    await writeFileAtomic(file, `${lines.join('\n')}\n`, 0o600);
    return { path: file, line, replaced };
  });
}

/**
 * Create an empty authorized_keys file (and its directory) if absent.
 */
export async function ensureAuthorizedKeys(home: string): Promise<string> {
  const file = getAuthorizedKeysPath(home);
  await ensureDir(path.dirname(file), 0o700);
  try {
    await fs.promises.writeFile(file, '', { flag: 'a', mode: 0o600 });
  } catch (err) {
    throw ioError('Failed to create', file, err);
  }
  return file;
}

async function readLines(file: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(file, 'utf8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return [];
    throw ioError('Failed to read', file, err);
  }
  return raw.split('\n').filter((line) => line.trim().length > 0);
}
