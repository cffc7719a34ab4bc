/**
 * Forced-command dispatcher
 * Parses the command an SSH client asked for, prepares the repository for
 * pushes, and hands the session's stdio to the git server program.
 */

import { execa } from 'execa';
import { config, type Account } from '../config.js';
import { pushContextToEnv, type PushContext, type SessionContext } from '../context.js';
import { PushRelayError } from '../errors.js';
import { resolveLauncher, type Launcher } from '../launcher.js';
import { installPreReceiveHook } from './hooks.js';
import { locateRepository, resolveRepository, type Repository } from './repository.js';

export type GitVerb = 'git-receive-pack' | 'git-upload-pack' | 'git-upload-archive';

interface VerbSpec {
  subcommand: string;
  /** Pushes create the repository and (re)install the hook. */
  receives: boolean;
}

const VERBS: Record<GitVerb, VerbSpec> = {
  'git-receive-pack': { subcommand: 'receive-pack', receives: true },
  'git-upload-pack': { subcommand: 'upload-pack', receives: false },
  'git-upload-archive': { subcommand: 'upload-archive', receives: false },
};

export interface GitCommand {
  verb: GitVerb;
  repository: string;
}

function isGitVerb(word: string): word is GitVerb {
  return Object.prototype.hasOwnProperty.call(VERBS, word);
}

function unquote(argument: string, commandLine: string): string {
  const quote = argument[0];
  if (quote === "'" || quote === '"') {
    if (argument.length < 2 || argument[argument.length - 1] !== quote) {
      throw new PushRelayError('BadCommand', `Unbalanced quoting in command: ${commandLine}`);
    }
    argument = argument.slice(1, -1);
  }
  if (!argument || /['"\s]/.test(argument)) {
    throw new PushRelayError('BadCommand', `Malformed repository argument in command: ${commandLine}`);
  }
  return argument;
}

/**
 * Parse `git-receive-pack 'name'` (or `git receive-pack 'name'`).
 */
export function parseGitCommand(commandLine: string | undefined): GitCommand {
  const line = commandLine?.trim();
  if (!line) {
    throw new PushRelayError('BadCommand', 'Arbitrary ssh prohibited: only git commands are accepted');
  }

  const match = /^(\S+)(?:\s+(.*))?$/.exec(line);
  let word = match?.[1] ?? '';
  let rest = match?.[2]?.trim() ?? '';
  if (word === 'git') {
    const sub = /^(\S+)(?:\s+(.*))?$/.exec(rest);
    word = `git-${sub?.[1] ?? ''}`;
    rest = sub?.[2]?.trim() ?? '';
  }

  if (!isGitVerb(word)) {
    throw new PushRelayError('BadCommand', `Arbitrary ssh prohibited: unsupported command "${line}"`);
  }
  if (!rest) {
    throw new PushRelayError('BadCommand', `Missing repository in command: ${line}`);
  }
  return { verb: word, repository: unquote(rest, line) };
}

export interface PreparedSession {
  command: GitCommand;
  context: PushContext;
  repoPath: string;
}

/**
 * Everything that happens before git takes over: for pushes, create the
 * repository if needed and rewrite its hook.
 */
export async function prepareSession(
  commandLine: string | undefined,
  session: SessionContext,
  account: Account,
  launcher: Launcher = resolveLauncher()
): Promise<PreparedSession> {
  const command = parseGitCommand(commandLine);
  const { receives } = VERBS[command.verb];

  let repo: Repository;
  if (receives) {
    const resolved = await resolveRepository(command.repository, account.home);
    if (resolved.created) {
      console.error(`pushrelay: created repository ${resolved.name} for ${session.identity.username}`);
    }
    await installPreReceiveHook(resolved.path, launcher);
    repo = resolved;
  } else {
    repo = locateRepository(command.repository, account.home);
  }

  return {
    command,
    context: { ...session, repository: repo.name },
    repoPath: repo.path,
  };
}

export interface DispatchOptions {
  commandLine?: string;
  session: SessionContext;
  account: Account;
  launcher?: Launcher;
}

/**
 * Run the git server program for the session with stdio wired straight
 * through, and return its exit status.
 */
export async function dispatch(options: DispatchOptions): Promise<number> {
  const { command, context, repoPath } = await prepareSession(
    options.commandLine ?? config.ssh.originalCommand,
    options.session,
    options.account,
    options.launcher
  );

  const result = await execa(config.git.binary, [VERBS[command.verb].subcommand, repoPath], {
    cwd: options.account.home,
    env: pushContextToEnv(context),
    stdio: 'inherit',
    reject: false,
  });
  if (result.failed && result.exitCode === undefined) {
    console.error(`pushrelay: git ${VERBS[command.verb].subcommand} did not run: ${result.signal ?? 'spawn failed'}`);
    return 1;
  }
  return result.exitCode;
}
