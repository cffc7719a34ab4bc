/**
 * Centralized configuration for pushrelay.
 *
 * Process-level settings come from environment variables and are read on
 * every access, so a forced command or hook sees exactly the environment it
 * was started with. Per-account settings live in `<home>/pushrelay.yaml`.
 */

import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { PushRelayError, describeError, hasErrorCode, ioError } from './errors.js';

export const SETTINGS_FILE = 'pushrelay.yaml';
export const DEFAULT_ACCOUNT = 'git';

/**
 * The shared account every provisioned key logs into.
 */
export interface Account {
  name: string;
  home: string;
  uid?: number;
  gid?: number;
}

interface PasswdEntry {
  name: string;
  uid: number;
  gid: number;
  home: string;
}

/**
 * Look up an account in the system account database.
 */
export function lookupAccount(name: string, passwdPath = '/etc/passwd'): PasswdEntry | null {
  let raw: string;
  try {
    raw = fs.readFileSync(passwdPath, 'utf8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return null;
    throw ioError('Failed to read', passwdPath, err);
  }

  for (const line of raw.split('\n')) {
    const fields = line.split(':');
    if (fields.length < 7 || fields[0] !== name) continue;
    return {
      name,
      uid: parseInt(fields[2], 10),
      gid: parseInt(fields[3], 10),
      home: fields[5],
    };
  }
  return null;
}

export const config = {
  account: {
    get name(): string {
      return process.env.PUSHRELAY_ACCOUNT || DEFAULT_ACCOUNT;
    },
    get homeOverride(): string | undefined {
      return process.env.PUSHRELAY_HOME || undefined;
    },
  },

  git: {
    get binary(): string {
      return process.env.PUSHRELAY_GIT || 'git';
    },
  },

  launcher: {
    get entryOverride(): string | undefined {
      return process.env.PUSHRELAY_ENTRY || undefined;
    },
  },

  ssh: {
    get originalCommand(): string | undefined {
      return process.env.SSH_ORIGINAL_COMMAND;
    },
  },
} as const;

/**
 * Resolve the shared account: name from the environment, home directory from
 * the override, the account database, or `/home/<name>`.
 */
export function resolveAccount(name: string = config.account.name): Account {
  const entry = lookupAccount(name);
  const home = config.account.homeOverride ?? entry?.home ?? path.join('/home', name);
  return {
    name,
    home: path.resolve(home),
    uid: entry?.uid,
    gid: entry?.gid,
  };
}

const settingsSchema = z
  .object({
    receiver: z.string().min(1).default('receiver'),
    refs: z.array(z.string().min(1)).default([]),
    rejectOnReceiverFailure: z.boolean().default(false),
    receiverTimeout: z.number().int().nonnegative().default(0),
  })
  .strict();

export type RelaySettings = z.infer<typeof settingsSchema>;

export const DEFAULT_SETTINGS: RelaySettings = settingsSchema.parse({});

/**
 * Parse the YAML text of a settings file. An empty document yields defaults.
 */
export function parseSettings(text: string, source = SETTINGS_FILE): RelaySettings {
  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (err) {
    throw new PushRelayError('InvalidConfig', `Failed to parse ${source}: ${describeError(err)}`, { cause: err });
  }

  const result = settingsSchema.safeParse(doc ?? {});
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new PushRelayError('InvalidConfig', `Invalid ${source}:\n${problems}`);
  }
  return result.data;
}

export async function loadSettings(home: string): Promise<RelaySettings> {
  const file = path.join(home, SETTINGS_FILE);
  let text: string;
  try {
    text = await fs.promises.readFile(file, 'utf8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return DEFAULT_SETTINGS;
    throw ioError('Failed to read', file, err);
  }
  return parseSettings(text, file);
}

/**
 * Absolute path of the receiver program for an account.
 */
export function receiverPath(home: string, settings: RelaySettings): string {
  return path.resolve(home, settings.receiver);
}

export function renderDefaultSettings(): string {
  return `# pushrelay settings for this account
# receiver: program notified of every push (relative to this directory)
receiver: ${DEFAULT_SETTINGS.receiver}
# refs: only deliver these refs (e.g. [master] or [refs/tags/v1]); empty means all
refs: []
# rejectOnReceiverFailure: reject the push when the receiver exits non-zero
rejectOnReceiverFailure: false
# receiverTimeout: seconds before the receiver is stopped; 0 disables
receiverTimeout: 0
`;
}
