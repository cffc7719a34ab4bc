import crypto from 'crypto';
import { PushRelayError } from '../errors.js';

export interface PublicKey {
  algorithm: string;
  /** Base64 body exactly as it appeared on the key line. */
  body: string;
  comment?: string;
}

export interface Identity {
  username: string;
  fingerprint: string;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

// Usernames end up inside a shell command and in receiver arguments.
const USERNAME_PATTERN = /^[A-Za-z0-9._@+-]+$/;

/**
 * Parse one public-key line: `<algorithm> <base64-body> [comment...]`.
 */
export function parsePublicKey(line: string | Buffer): PublicKey {
  const text = (typeof line === 'string' ? line : line.toString('utf8')).trim();
  const parts = text.split(/\s+/);
  if (parts.length < 2 || !parts[0]) {
    throw new PushRelayError('MalformedKey', 'Invalid SSH public key: expected "<algorithm> <key> [comment]"');
  }

  const [algorithm, body] = parts;
  const data = decodeBody(body);

  // The blob starts with a length-prefixed copy of the algorithm name.
  const embedded = readString(data, 0);
  if (embedded !== algorithm) {
    throw new PushRelayError(
      'MalformedKey',
      `Key type mismatch: declared ${algorithm}, key data says ${embedded ?? '(unreadable)'}`
    );
  }

  return {
    algorithm,
    body,
    comment: parts.length > 2 ? parts[2] : undefined,
  };
}

/**
 * MD5 fingerprint of the decoded key blob as lowercase colon-separated hex,
 * the form `ssh-keygen -l -E md5` prints after its `MD5:` prefix.
 */
export function fingerprint(key: PublicKey): string {
  const digest = crypto.createHash('md5').update(decodeBody(key.body)).digest('hex');
  return digest.match(/.{2}/g)?.join(':') ?? '';
}

/**
 * Pick the username for a key: the explicit override, else the first token of
 * the key comment.
 */
export function resolveUsername(key: PublicKey, explicitOverride?: string): string {
  const username = explicitOverride?.trim() || key.comment;
  if (!username) {
    throw new PushRelayError('NoUsername', 'No username given and the key has no comment to take one from');
  }
  assertValidUsername(username);
  return username;
}

export function assertValidUsername(username: string): void {
  if (!USERNAME_PATTERN.test(username)) {
    throw new PushRelayError(
      'InvalidName',
      `Invalid username "${username}": use letters, digits and . _ @ + - only`
    );
  }
}

export function identify(key: PublicKey, explicitUsername?: string): Identity {
  return {
    username: resolveUsername(key, explicitUsername),
    fingerprint: fingerprint(key),
  };
}

function decodeBody(body: string): Buffer {
  if (body.length % 4 !== 0 || !BASE64_PATTERN.test(body)) {
    throw new PushRelayError('MalformedKey', 'Invalid SSH public key: key body is not valid base64');
  }
  return Buffer.from(body, 'base64');
}

function readString(data: Buffer, offset: number): string | undefined {
  if (data.length < offset + 4) return undefined;
  const length = data.readUInt32BE(offset);
  if (data.length < offset + 4 + length) return undefined;
  return data.subarray(offset + 4, offset + 4 + length).toString('latin1');
}
