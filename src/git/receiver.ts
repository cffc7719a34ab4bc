/**
 * Receiver invocation
 * Streams `git archive` of a pushed revision into the operator's receiver
 * program and relays the receiver's output while it runs.
 */

import fs from 'fs';
import type { Readable, Writable } from 'stream';
import { finished } from 'stream/promises';
import { execa } from 'execa';
import { ulid } from 'ulid';
import { config } from '../config.js';
import { PushRelayError, describeError, hasErrorCode } from '../errors.js';
import type { Identity } from '../keys/identity.js';

export interface PushEvent {
  repository: string;
  identity: Identity;
  oldRevision: string;
  newRevision: string;
  ref: string;
}

export type DeliveryStatus = 'delivered' | 'failed' | 'unavailable';

export interface DeliveryResult {
  deliveryId: string;
  event: PushEvent;
  status: DeliveryStatus;
  exitCode?: number;
  timedOut?: boolean;
  /** Set for `unavailable` deliveries; reported to the client, never thrown. */
  error?: PushRelayError;
}

export interface DeliveryOptions {
  repoPath: string;
  receiver: string;
  /** Receives the receiver's stdout; git forwards it to the client. */
  output: Writable;
  errorOutput: Writable;
  /** Seconds; 0 disables. */
  timeout?: number;
}

/**
 * Positional arguments of the receiver: repository, revision, username, fingerprint.
 */
export function receiverArgs(event: PushEvent): string[] {
  return [event.repository, event.newRevision, event.identity.username, event.identity.fingerprint];
}

async function checkExecutable(file: string): Promise<string | null> {
  try {
    await fs.promises.access(file, fs.constants.X_OK);
    return null;
  } catch (err) {
    return hasErrorCode(err, 'ENOENT') ? 'not found' : describeError(err);
  }
}

async function assertRevisionReadable(repoPath: string, revision: string): Promise<void> {
  try {
    await execa(config.git.binary, ['--git-dir', repoPath, 'cat-file', '-e', `${revision}^{tree}`]);
  } catch (err) {
    throw new PushRelayError('CorruptRevision', `Cannot read the tree of ${revision} in ${repoPath}`, { cause: err });
  }
}

/**
 * Wait until a relayed stream has been fully read; the child's exit can come
 * before its last output.
 */
async function drained(stream: Readable | null): Promise<void> {
  if (!stream) return;
  try {
    await finished(stream);
  } catch (err) {
    console.error(`pushrelay: receiver output cut short: ${describeError(err)}`);
  }
}

/**
 * Deliver one push event to the receiver program.
 *
 * The archive and the receiver output are piped concurrently, so neither the
 * archive nor the output is held in memory. A receiver that cannot be started
 * is reported on `output` and does not fail the delivery; an unreadable
 * revision throws `CorruptRevision`.
 */
export async function deliver(event: PushEvent, options: DeliveryOptions): Promise<DeliveryResult> {
  const deliveryId = ulid();
  const { output, errorOutput, repoPath, receiver } = options;

  const unavailable = (reason: string): DeliveryResult => {
    const error = new PushRelayError('ReceiverUnavailable', `receiver unavailable (${receiver}): ${reason}`);
    output.write(`pushrelay: ${error.message}\n`);
    return { deliveryId, event, status: 'unavailable', error };
  };

  const problem = await checkExecutable(receiver);
  if (problem) {
    return unavailable(problem);
  }

  await assertRevisionReadable(repoPath, event.newRevision);

  const archive = execa(config.git.binary, ['--git-dir', repoPath, 'archive', '--format=tar', event.newRevision], {
    buffer: false,
    reject: false,
    stdin: 'ignore',
  });
  const child = execa(receiver, receiverArgs(event), {
    buffer: false,
    reject: false,
    timeout: (options.timeout ?? 0) * 1000,
    env: { PUSHRELAY_DELIVERY_ID: deliveryId },
  });

  let started = false;
  let spawnError: unknown;
  let inputClosed = false;
  child.once('spawn', () => {
    started = true;
  });
  child.once('error', (err) => {
    spawnError = err;
  });

  const stopArchive = (): void => {
    inputClosed = true;
    archive.kill();
  };

  const receiverInput = child.stdin;
  if (receiverInput && archive.stdout) {
    // EPIPE here means the receiver stopped reading; the rest of the archive is dropped.
    receiverInput.on('error', stopArchive);
    archive.stdout.pipe(receiverInput);
  } else {
    stopArchive();
  }
  child.stdout?.pipe(output, { end: false });
  child.stderr?.pipe(errorOutput, { end: false });

  const archiveErrors: Buffer[] = [];
  archive.stderr?.on('data', (chunk: Buffer) => archiveErrors.push(chunk));

  const result = await child;
  if (!started) {
    stopArchive();
    await archive;
    return unavailable(spawnError ? describeError(spawnError) : 'failed to start');
  }

  await Promise.all([drained(child.stdout), drained(child.stderr)]);

  const archiveResult = await archive;
  if (archiveResult.failed && !inputClosed) {
    const detail = Buffer.concat(archiveErrors).toString('utf8').trim();
    throw new PushRelayError(
      'CorruptRevision',
      `git archive ${event.newRevision} failed${detail ? `: ${detail}` : ''}`
    );
  }

  if (result.failed) {
    const reason = result.timedOut
      ? `timed out after ${options.timeout}s`
      : `exited with status ${result.exitCode ?? result.signal ?? 'unknown'}`;
    output.write(`pushrelay: receiver ${reason}\n`);
    return { deliveryId, event, status: 'failed', exitCode: result.exitCode, timedOut: result.timedOut };
  }

  return { deliveryId, event, status: 'delivered', exitCode: result.exitCode };
}
