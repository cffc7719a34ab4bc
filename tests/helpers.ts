import fs from 'fs';
import os from 'os';
import path from 'path';
import { execa, execaSync } from 'execa';

function hasBinary(name: string, args: string[] = ['--version']): boolean {
  try {
    execaSync(name, args);
    return true;
  } catch {
    return false;
  }
}

export const hasGit = hasBinary('git');
export const hasShellTools = hasGit && hasBinary('bash') && hasBinary('tar');

// Public keys generated for these tests; fingerprints from `ssh-keygen -l -E md5`.
export const ALICE_KEY =
  'ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAIOmHYKbDTKWlePPt7h5MjzV5RpxTkSqz7Hq7PSFcrqcM alice';
export const ALICE_FINGERPRINT = '22:13:8b:3f:26:33:ff:fb:de:a9:71:10:70:c3:e7:f4';

export const BOB_KEY =
  'ssh-rsa AAAAB3NzaC1yc2EAAAADAQABAAAAgQCrM/r8FCa+AoMiu6I9wFTUEj3n5Ip1Oi65cLI3u1ghlxzIIV6bn2orpPOiOi3sn3u9GpZ41WQA1NZ4duvBonJx8QblaBkqmm5TKQTeD6/NFcjbde+q65uQTNBhQyRGtyGiBNG3xM4mzhaQwRdKJevzfLLP3Qh9MQ9BWLdEdiTMWw== bob@laptop';
export const BOB_FINGERPRINT = 'f1:06:da:a5:cc:2e:bd:ec:5c:71:d5:71:66:ff:75:60';

export async function makeTempDir(prefix = 'pushrelay-test-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

const GIT_IDENTITY = ['-c', 'user.name=Test', '-c', 'user.email=test@example.com', '-c', 'init.defaultBranch=master'];

export async function git(cwd: string, args: string[], env?: Record<string, string>) {
  return execa('git', [...GIT_IDENTITY, ...args], { cwd, env });
}

/**
 * Create a work tree with one commit holding `files`; returns its revision.
 */
export async function commitFiles(workdir: string, files: Record<string, string>, message = 'initial'): Promise<string> {
  if (!fs.existsSync(path.join(workdir, '.git'))) {
    await git(workdir, ['init', '--quiet']);
  }
  for (const [name, content] of Object.entries(files)) {
    const file = path.join(workdir, name);
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, content);
  }
  await git(workdir, ['add', '--all']);
  await git(workdir, ['commit', '--quiet', '-m', message]);
  const { stdout } = await git(workdir, ['rev-parse', 'HEAD']);
  return stdout.trim();
}

/**
 * A receiver that records its arguments and the archive it was given.
 */
export async function writeRecordingReceiver(dir: string, record: string, message = 'hello from receiver'): Promise<string> {
  const receiver = path.join(dir, 'receiver');
  await fs.promises.writeFile(
    receiver,
    `#!/usr/bin/env bash
printf '%s\\n' "$@" > "${record}.args"
cat > "${record}.tar"
echo "${message}"
`,
    { mode: 0o755 }
  );
  return receiver;
}

export async function listTar(archive: string): Promise<string[]> {
  const { stdout } = await execa('tar', ['-tf', archive]);
  return stdout
    .split('\n')
    .filter((entry) => entry && !entry.endsWith('/'))
    .sort();
}

export async function readTarFile(archive: string, member: string): Promise<string> {
  const { stdout } = await execa('tar', ['-xOf', archive, member]);
  return stdout;
}
