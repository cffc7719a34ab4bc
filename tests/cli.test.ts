/**
 * The operator-facing `upload-key` command, run as its own process with the
 * keys piped on stdin.
 */

import fs from 'fs';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { execa } from 'execa';
import { getAuthorizedKeysPath } from '../src/keys/authorized-keys.js';
import { resolveLauncher } from '../src/launcher.js';
import { ALICE_FINGERPRINT, ALICE_KEY, BOB_FINGERPRINT, BOB_KEY, makeTempDir, removeDir } from './helpers.js';

const launcher = resolveLauncher();
const canLaunch = fs.existsSync(launcher.command);

const ALICE_BODY = ALICE_KEY.split(' ')[1];

describe.skipIf(!canLaunch)('pushrelay upload-key', () => {
  let home: string;

  beforeEach(async () => {
    home = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(home);
  });

  function uploadKey(input: string, args: string[] = []) {
    return execa(launcher.command, [...launcher.args, 'upload-key', ...args], {
      input,
      reject: false,
      env: { PUSHRELAY_ACCOUNT: 'pushrelay-test', PUSHRELAY_HOME: home },
    });
  }

  async function readLines(): Promise<string[]> {
    const raw = await fs.promises.readFile(getAuthorizedKeysPath(home), 'utf8');
    return raw.split('\n').filter(Boolean);
  }

  it('skips blank and comment lines and prints one fingerprint per key', async () => {
    const result = await uploadKey(`# team keys\n\n${ALICE_KEY}\n   \n${BOB_KEY}\n`);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe(`${ALICE_FINGERPRINT}\n${BOB_FINGERPRINT}`);
    const lines = await readLines();
    expect(lines).toHaveLength(2);
    expect(lines[0].endsWith(ALICE_KEY)).toBe(true);
    expect(lines[0]).toContain('PUSHRELAY_USERNAME=alice ');
    expect(lines[1].endsWith(BOB_KEY)).toBe(true);
  });

  it('uses the username argument instead of the key comment', async () => {
    const result = await uploadKey(`${ALICE_KEY}\n`, ['carol']);

    expect(result.exitCode).toBe(0);
    const lines = await readLines();
    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith(`ssh-ed25519 ${ALICE_BODY} carol`)).toBe(true);
  });

  it('leaves the file unchanged when the same key is uploaded again', async () => {
    await uploadKey(`${ALICE_KEY}\n`);
    const first = await fs.promises.readFile(getAuthorizedKeysPath(home), 'utf8');

    const again = await uploadKey(`${ALICE_KEY}\n`);

    expect(again.exitCode).toBe(0);
    expect(again.stdout).toBe(ALICE_FINGERPRINT);
    expect(await fs.promises.readFile(getAuthorizedKeysPath(home), 'utf8')).toBe(first);
  });

  it('fails when stdin holds no key', async () => {
    const result = await uploadKey('# nothing here\n\n');

    expect(result.exitCode).toBe(1);
    expect(result.stderr.split('\n')).toContain('pushrelay: no public key on stdin');
    expect(fs.existsSync(getAuthorizedKeysPath(home))).toBe(false);
  });

  it('fails on a malformed key', async () => {
    const result = await uploadKey('not-a-key\n');

    expect(result.exitCode).toBe(1);
    expect(result.stderr.split('\n')).toContain(
      'pushrelay: Invalid SSH public key: expected "<algorithm> <key> [comment]"'
    );
    expect(fs.existsSync(getAuthorizedKeysPath(home))).toBe(false);
  });

  it('fails when neither the argument nor the key names a user', async () => {
    const result = await uploadKey(`ssh-ed25519 ${ALICE_BODY}\n`);

    expect(result.exitCode).toBe(1);
    expect(result.stderr.split('\n')).toContain(
      'pushrelay: No username given and the key has no comment to take one from'
    );
    expect(fs.existsSync(getAuthorizedKeysPath(home))).toBe(false);
  });
});
