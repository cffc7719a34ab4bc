import path from 'path';
import type { Readable, Writable } from 'stream';
import type { RelaySettings } from '../config.js';
import type { PushContext } from '../context.js';
import { ensureDir, writeFileAtomic } from '../utils/fs.js';
import { renderShellCommand, resolveLauncher, type Launcher } from '../launcher.js';
import { deliver, type DeliveryResult, type PushEvent } from './receiver.js';

export const HOOK_NAME = 'pre-receive';

export const ZERO_REVISION = '0000000000000000000000000000000000000000';

/**
 * The all-zero object id git sends for a created or deleted ref, in either
 * hash format (40 digits for SHA-1, 64 for SHA-256).
 */
export function isZeroRevision(revision: string): boolean {
  return /^0+$/.test(revision);
}

export interface RefUpdate {
  oldRevision: string;
  newRevision: string;
  ref: string;
}

export function renderHookScript(launcher: Launcher): string {
  return `#!/usr/bin/env bash
# pushrelay: rewritten on every push, do not edit
set -euo pipefail
exec ${renderShellCommand({ launcher, verb: 'hook' })}
`;
}

/**
 * Write the pre-receive hook of a repository, replacing whatever is there.
 */
export async function installPreReceiveHook(repoPath: string, launcher: Launcher = resolveLauncher()): Promise<string> {
  const hooksDir = path.join(repoPath, 'hooks');
  await ensureDir(hooksDir, 0o755);

  const hookPath = path.join(hooksDir, HOOK_NAME);
  await writeFileAtomic(hookPath, renderHookScript(launcher), 0o755);
  return hookPath;
}

/**
 * Parse pre-receive input: one `<old-rev> <new-rev> <ref-name>` per line.
 * Lines with fewer than three fields are ignored.
 */
export function parseRefUpdates(raw: string): RefUpdate[] {
  const updates: RefUpdate[] = [];
  for (const line of raw.split('\n')) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 3) continue;
    const [oldRevision, newRevision, ref] = fields;
    updates.push({ oldRevision, newRevision, ref });
  }
  return updates;
}

export async function readUpdatesFromStdin(input: Readable = process.stdin): Promise<RefUpdate[]> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return parseRefUpdates(Buffer.concat(chunks).toString('utf8'));
}

function refMatches(ref: string, pattern: string): boolean {
  return ref === pattern || ref === `refs/heads/${pattern}`;
}

/**
 * The updates to deliver, in input order: deletions are dropped, and when
 * `refs` is configured only the listed refs remain.
 */
export function selectDeliveries(updates: RefUpdate[], settings: Pick<RelaySettings, 'refs'>): RefUpdate[] {
  return updates.filter((update) => {
    if (isZeroRevision(update.newRevision)) return false;
    if (!settings.refs.length) return true;
    return settings.refs.some((pattern) => refMatches(update.ref, pattern));
  });
}

export interface PreReceiveOptions {
  context: PushContext;
  repoPath: string;
  updates: RefUpdate[];
  settings: RelaySettings;
  receiver: string;
  output?: Writable;
  errorOutput?: Writable;
}

export interface PreReceiveResult {
  /** 0 accepts every ref update, anything else rejects them all. */
  exitCode: number;
  deliveries: DeliveryResult[];
}

/**
 * Run the receiver once for every selected ref update.
 */
export async function handlePreReceive(options: PreReceiveOptions): Promise<PreReceiveResult> {
  const { context, repoPath, settings, receiver } = options;
  const output = options.output ?? process.stdout;
  const errorOutput = options.errorOutput ?? process.stderr;

  const deliveries: DeliveryResult[] = [];
  for (const update of selectDeliveries(options.updates, settings)) {
    const event: PushEvent = {
      repository: context.repository,
      identity: context.identity,
      ...update,
    };
    deliveries.push(
      await deliver(event, {
        repoPath,
        receiver,
        output,
        errorOutput,
        timeout: settings.receiverTimeout,
      })
    );
  }

  const rejected = settings.rejectOnReceiverFailure && deliveries.some((d) => d.status === 'failed');
  if (rejected) {
    output.write('pushrelay: push rejected because the receiver failed\n');
  }
  return { exitCode: rejected ? 1 : 0, deliveries };
}
