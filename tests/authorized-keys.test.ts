import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { execa } from 'execa';
import {
  authorize,
  buildEntry,
  ensureAuthorizedKeys,
  forcedCommandOf,
  getAuthorizedKeysPath,
  serializeEntry,
  type ForcedCommandTemplate,
} from '../src/keys/authorized-keys.js';
import { identify, parsePublicKey } from '../src/keys/identity.js';
import type { Account } from '../src/config.js';
import { ALICE_FINGERPRINT, ALICE_KEY, BOB_KEY, makeTempDir, removeDir } from './helpers.js';

const template: ForcedCommandTemplate = {
  launcher: { command: '/usr/bin/node', args: ['/opt/pushrelay/cli.js'] },
  account: 'git',
};

const ALICE_BODY = ALICE_KEY.split(' ')[1];
const ALICE_LINE =
  `command="PUSHRELAY_ACCOUNT=git PUSHRELAY_USERNAME=alice PUSHRELAY_FINGERPRINT=${ALICE_FINGERPRINT} ` +
  `/usr/bin/node /opt/pushrelay/cli.js run",no-agent-forwarding,no-pty,no-user-rc,no-X11-forwarding,no-port-forwarding ` +
  `ssh-ed25519 ${ALICE_BODY} alice`;

describe('serializeEntry', () => {
  it('renders the forced command, restrictions and key', () => {
    const key = parsePublicKey(ALICE_KEY);
    expect(serializeEntry(buildEntry(identify(key), key, template))).toBe(ALICE_LINE);
  });

  it('embeds the home override when one is given', () => {
    const key = parsePublicKey(ALICE_KEY);
    const entry = buildEntry(identify(key), key, { ...template, home: '/srv/git' });
    expect(entry.command.startsWith('PUSHRELAY_ACCOUNT=git PUSHRELAY_HOME=/srv/git PUSHRELAY_USERNAME=alice ')).toBe(true);
  });

  it('quotes launcher paths so the line parses back to the same command', () => {
    const key = parsePublicKey(ALICE_KEY);
    const entry = buildEntry(identify(key), key, {
      ...template,
      launcher: { command: '/opt/push relay/"bin"', args: [] },
    });
    expect(entry.command.endsWith(`'/opt/push relay/"bin"' run`)).toBe(true);

    const line = serializeEntry(entry);
    expect(line).toContain(`'/opt/push relay/\\"bin\\"' run"`);
    expect(forcedCommandOf(line)).toBe(entry.command);
  });

  it('leaves backslashes for the shell, since sshd only unescapes \\"', () => {
    const key = parsePublicKey(ALICE_KEY);
    const entry = buildEntry(identify(key), key, {
      ...template,
      launcher: { command: "/opt/o'brien/cli.js", args: [] },
    });

    const line = serializeEntry(entry);
    expect(line).toContain(`'/opt/o'\\''brien/cli.js' run",`);
    expect(forcedCommandOf(line)).toBe(entry.command);
  });

  it('hands the shell a command that runs with the embedded values', async () => {
    const key = parsePublicKey(ALICE_KEY);
    const home = `/srv/it's "git"\\x`;
    const entry = buildEntry(identify(key), key, {
      ...template,
      home,
      launcher: { command: 'sh', args: ['-c', 'printf "%s\\n" "$PUSHRELAY_HOME" "$PUSHRELAY_USERNAME" "$0"'] },
    });

    const forced = forcedCommandOf(serializeEntry(entry));
    if (!forced) throw new Error('no forced command');
    const { stdout } = await execa('sh', ['-c', forced]);
    expect(stdout).toBe(`${home}\nalice\nrun`);
  });
});

describe('authorize', () => {
  let home: string;
  let account: Account;

  beforeEach(async () => {
    home = await makeTempDir();
    account = { name: 'git', home };
  });

  afterEach(async () => {
    await removeDir(home);
  });

  async function readLines(): Promise<string[]> {
    const raw = await fs.promises.readFile(getAuthorizedKeysPath(home), 'utf8');
    return raw.split('\n').filter(Boolean);
  }

  it('creates the ssh directory and file with owner-only permissions', async () => {
    const key = parsePublicKey(ALICE_KEY);
    const result = await authorize(identify(key), key, template, account);

    expect(result).toEqual({ path: path.join(home, '.ssh', 'authorized_keys'), line: ALICE_LINE, replaced: false });
    expect(await readLines()).toEqual([ALICE_LINE]);
    expect((await fs.promises.stat(path.join(home, '.ssh'))).mode & 0o777).toBe(0o700);
    expect((await fs.promises.stat(result.path)).mode & 0o777).toBe(0o600);
  });

  it('replaces the line of a key uploaded again under another name', async () => {
    const key = parsePublicKey(ALICE_KEY);
    await authorize(identify(key), key, template, account);
    const second = await authorize(identify(key, 'alice2'), key, template, account);

    expect(second.replaced).toBe(true);
    const lines = await readLines();
    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith(`ssh-ed25519 ${ALICE_BODY} alice2`)).toBe(true);
    expect(lines[0]).toContain('PUSHRELAY_USERNAME=alice2 ');
  });

  it('keeps unrelated lines and their order', async () => {
    const file = await ensureAuthorizedKeys(home);
    await fs.promises.writeFile(file, '# managed elsewhere\nssh-ed25519 AAAAOTHER other\n');

    const alice = parsePublicKey(ALICE_KEY);
    const bob = parsePublicKey(BOB_KEY);
    await authorize(identify(alice), alice, template, account);
    await authorize(identify(bob), bob, template, account);
    await authorize(identify(alice), alice, template, account);

    const lines = await readLines();
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe('# managed elsewhere');
    expect(lines[1]).toBe('ssh-ed25519 AAAAOTHER other');
    expect(lines[2]).toBe(ALICE_LINE);
    expect(lines[3].endsWith(BOB_KEY)).toBe(true);
  });

  it('produces one line per key under concurrent uploads', async () => {
    const alice = parsePublicKey(ALICE_KEY);
    const bob = parsePublicKey(BOB_KEY);
    await Promise.all(
      Array.from({ length: 6 }, (_, i) => {
        const key = i % 2 ? bob : alice;
        return authorize(identify(key), key, template, account);
      })
    );

    const lines = await readLines();
    expect(lines).toHaveLength(2);
    expect(lines.filter((line) => line.includes(ALICE_BODY))).toHaveLength(1);
    expect(fs.existsSync(`${getAuthorizedKeysPath(home)}.lock`)).toBe(false);
  });
});

describe('forcedCommandOf', () => {
  it('returns null for lines without a forced command', () => {
    expect(forcedCommandOf(ALICE_KEY)).toBeNull();
  });

  it('unescapes only quotes', () => {
    expect(forcedCommandOf('command="echo \\"a\\\\b\\"",no-pty ssh-ed25519 AAAA x')).toBe('echo "a\\\\b"');
  });

  it('returns null for an unterminated command', () => {
    expect(forcedCommandOf('command="echo ssh-ed25519 AAAA x')).toBeNull();
  });
});
