/**
 * Shared account provisioning
 * Creates the account that every key logs into, its ssh directory, the
 * receiver skeleton and the settings file.
 */

import fs from 'fs';
import path from 'path';
import { execa } from 'execa';
import { lookupAccount, renderDefaultSettings, SETTINGS_FILE, DEFAULT_SETTINGS, type Account } from './config.js';
import { PushRelayError, describeError, hasErrorCode, ioError } from './errors.js';
import { ensureAuthorizedKeys } from './keys/authorized-keys.js';

export const RECEIVER_SKELETON = `#!/usr/bin/env bash
# Called once per pushed ref with the tar archive of the pushed tree on stdin:
#   $1 repository  $2 revision  $3 username  $4 fingerprint
# Everything written to stdout is shown to the pusher.
#URL=https://example.com/push-hook
#echo "----> Posting to $URL ..."
#curl \\
#  -X 'POST' \\
#  -F "repository=$1" \\
#  -F "revision=$2" \\
#  -F "username=$3" \\
#  -F "fingerprint=$4" \\
#  -F contents=@- \\
#  --silent "$URL"
`;

export interface InitResult {
  account: Account;
  createdAccount: boolean;
  receiver: string;
  createdReceiver: boolean;
  settings: string;
}

/**
 * Create the system account with `useradd` unless it already exists.
 */
export async function createSystemAccount(account: Account): Promise<boolean> {
  if (lookupAccount(account.name)) return false;
  try {
    await execa('useradd', ['-m', '-d', account.home, account.name]);
  } catch (err) {
    throw new PushRelayError(
      'IOError',
      `Failed to create account ${account.name} (are you root?): ${describeError(err)}`,
      { cause: err }
    );
  }
  return true;
}

/**
 * Write `content` to `file` only when the file does not exist yet.
 */
async function writeIfAbsent(file: string, content: string, mode: number): Promise<boolean> {
  try {
    await fs.promises.writeFile(file, content, { flag: 'wx', mode });
    return true;
  } catch (err) {
    if (hasErrorCode(err, 'EEXIST')) return false;
    throw ioError('Failed to write', file, err);
  }
}

export async function setupReceiverScript(home: string): Promise<{ path: string; created: boolean }> {
  const receiver = path.join(home, DEFAULT_SETTINGS.receiver);
  const created = await writeIfAbsent(receiver, RECEIVER_SKELETON, 0o755);
  try {
    await fs.promises.chmod(receiver, 0o755);
  } catch (err) {
    throw ioError('Failed to make executable', receiver, err);
  }
  return { path: receiver, created };
}

/**
 * Hand files to the shared account. Only root can do this; other callers
 * already own what they created.
 */
export async function chownToAccount(account: Account, files: string[]): Promise<void> {
  if (process.getuid?.() !== 0 || account.uid === undefined || account.gid === undefined) return;
  for (const file of files) {
    try {
      await fs.promises.chown(file, account.uid, account.gid);
    } catch (err) {
      throw ioError('Failed to chown', file, err);
    }
  }
}

export async function initAccount(account: Account, options: { createAccount?: boolean } = {}): Promise<InitResult> {
  const createdAccount = options.createAccount === false ? false : await createSystemAccount(account);
  // useradd assigns the ids
  const entry = lookupAccount(account.name);
  const owner: Account = { ...account, uid: entry?.uid ?? account.uid, gid: entry?.gid ?? account.gid };

  try {
    await fs.promises.mkdir(owner.home, { recursive: true });
  } catch (err) {
    throw ioError('Failed to create directory', owner.home, err);
  }

  const authorizedKeys = await ensureAuthorizedKeys(owner.home);
  const receiver = await setupReceiverScript(owner.home);
  const settings = path.join(owner.home, SETTINGS_FILE);
  await writeIfAbsent(settings, renderDefaultSettings(), 0o644);

  await chownToAccount(owner, [owner.home, path.dirname(authorizedKeys), authorizedKeys, receiver.path, settings]);

  return {
    account: owner,
    createdAccount,
    receiver: receiver.path,
    createdReceiver: receiver.created,
    settings,
  };
}
