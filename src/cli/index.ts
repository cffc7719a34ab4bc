#!/usr/bin/env node
/**
 * pushrelay CLI
 * `init` and `upload-key` are run by the operator; `run` and `hook` are
 * reached through the forced command and the pre-receive hook.
 */

import path from 'path';
import { Command } from 'commander';
import { initAccount, chownToAccount } from '../account.js';
import { config, loadSettings, receiverPath, resolveAccount } from '../config.js';
import { pushContextFromEnv, sessionContextFromEnv } from '../context.js';
import { isPushRelayError } from '../errors.js';
import { dispatch } from '../git/dispatch.js';
import { handlePreReceive, readUpdatesFromStdin } from '../git/hooks.js';
import { authorize } from '../keys/authorized-keys.js';
import { identify, parsePublicKey } from '../keys/identity.js';
import { resolveLauncher } from '../launcher.js';

const program = new Command();

/**
 * Every diagnostic goes to stderr: in `run` mode stdout is the git protocol.
 */
function action<Args extends unknown[]>(fn: (...args: Args) => Promise<void>): (...args: Args) => Promise<void> {
  return async (...args: Args) => {
    try {
      await fn(...args);
    } catch (err) {
      if (isPushRelayError(err)) {
        console.error(`pushrelay: ${err.message}`);
      } else {
        console.error('pushrelay: unexpected error', err);
      }
      process.exitCode = 1;
    }
  };
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

program
  .name('pushrelay')
  .description('Accept git pushes on a shared SSH account and relay them to a receiver program')
  .version('0.1.0');

program
  .command('init')
  .description('Provision the shared account and its receiver script')
  .option('-u, --user <name>', 'shared account name', config.account.name)
  .option('--skip-account', 'do not create the system account')
  .action(
    action(async (options: { user: string; skipAccount?: boolean }) => {
      const account = resolveAccount(options.user);
      const result = await initAccount(account, { createAccount: !options.skipAccount });
      if (result.createdAccount) {
        console.log(`Created account '${result.account.name}'.`);
      }
      console.log(`Created receiver script in ${result.account.home} for user '${result.account.name}'.`);
    })
  );

program
  .command('upload-key')
  .description('Authorize the public keys read from stdin')
  .argument('[username]', 'username for the keys (defaults to each key comment)')
  .action(
    action(async (username?: string) => {
      const account = resolveAccount();
      const template = {
        launcher: resolveLauncher(),
        account: account.name,
        home: config.account.homeOverride,
      };

      const lines = (await readStdin())
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line && !line.startsWith('#'));
      if (!lines.length) {
        console.error('pushrelay: no public key on stdin');
        process.exitCode = 1;
        return;
      }

      for (const line of lines) {
        const key = parsePublicKey(line);
        const identity = identify(key, username);
        const result = await authorize(identity, key, template, account);
        await chownToAccount(account, [path.dirname(result.path), result.path]);
        console.log(identity.fingerprint);
      }
    })
  );

program
  .command('run')
  .description('Forced-command entry point (internal)')
  .action(
    action(async () => {
      const session = sessionContextFromEnv(process.env, config.account.name);
      const account = resolveAccount(session.account);
      process.exitCode = await dispatch({ session, account });
    })
  );

program
  .command('hook')
  .description('pre-receive hook entry point (internal)')
  .action(
    action(async () => {
      const context = pushContextFromEnv(process.env, config.account.name);
      const account = resolveAccount(context.account);
      const settings = await loadSettings(account.home);
      const updates = await readUpdatesFromStdin();
      const result = await handlePreReceive({
        context,
        repoPath: process.cwd(),
        updates,
        settings,
        receiver: receiverPath(account.home, settings),
      });
      process.exitCode = result.exitCode;
    })
  );

program.parseAsync().catch((err) => {
  console.error('pushrelay: failed', err);
  process.exit(1);
});
