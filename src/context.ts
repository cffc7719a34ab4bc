/**
 * Push context threaded between processes.
 *
 * The forced command starts the dispatcher with the key's identity in its
 * environment; the dispatcher adds the repository name and hands the same
 * environment to git, which passes it on to the pre-receive hook.
 */

import type { Identity } from './keys/identity.js';
import { PushRelayError } from './errors.js';

export const CONTEXT_ENV = {
  account: 'PUSHRELAY_ACCOUNT',
  home: 'PUSHRELAY_HOME',
  username: 'PUSHRELAY_USERNAME',
  fingerprint: 'PUSHRELAY_FINGERPRINT',
  repository: 'PUSHRELAY_REPO',
} as const;

export interface SessionContext {
  account: string;
  /** Set only when the home directory was overridden at provisioning time. */
  home?: string;
  identity: Identity;
}

export interface PushContext extends SessionContext {
  repository: string;
}

type Env = Record<string, string | undefined>;

export function sessionContextToEnv(context: SessionContext): Record<string, string> {
  const env: Record<string, string> = { [CONTEXT_ENV.account]: context.account };
  if (context.home) {
    env[CONTEXT_ENV.home] = context.home;
  }
  env[CONTEXT_ENV.username] = context.identity.username;
  env[CONTEXT_ENV.fingerprint] = context.identity.fingerprint;
  return env;
}

export function pushContextToEnv(context: PushContext): Record<string, string> {
  return {
    ...sessionContextToEnv(context),
    [CONTEXT_ENV.repository]: context.repository,
  };
}

export function sessionContextFromEnv(env: Env = process.env, defaultAccount = 'git'): SessionContext {
  const username = env[CONTEXT_ENV.username];
  const fingerprint = env[CONTEXT_ENV.fingerprint];
  if (!username || !fingerprint) {
    throw new PushRelayError(
      'BadCommand',
      `Missing identity: ${CONTEXT_ENV.username} and ${CONTEXT_ENV.fingerprint} must be set by the forced command`
    );
  }
  return {
    account: env[CONTEXT_ENV.account] || defaultAccount,
    home: env[CONTEXT_ENV.home] || undefined,
    identity: { username, fingerprint },
  };
}

export function pushContextFromEnv(env: Env = process.env, defaultAccount = 'git'): PushContext {
  const session = sessionContextFromEnv(env, defaultAccount);
  const repository = env[CONTEXT_ENV.repository];
  if (!repository) {
    throw new PushRelayError('BadCommand', `Missing ${CONTEXT_ENV.repository}: the hook must run under the dispatcher`);
  }
  return { ...session, repository };
}
