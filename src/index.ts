/**
 * pushrelay
 * Git push relay for a shared SSH account: key provisioning, the forced-command
 * dispatcher and the pre-receive hook bridge.
 */

export {
  parsePublicKey,
  fingerprint,
  resolveUsername,
  identify,
  type PublicKey,
  type Identity,
} from './keys/identity.js';

export {
  authorize,
  buildEntry,
  serializeEntry,
  forcedCommandOf,
  getAuthorizedKeysPath,
  ensureAuthorizedKeys,
  KEY_RESTRICTIONS,
  type AuthorizedKeysEntry,
  type ForcedCommandTemplate,
  type AuthorizeResult,
} from './keys/authorized-keys.js';

export {
  normalizeRepositoryName,
  locateRepository,
  resolveRepository,
  isBareRepository,
  type Repository,
  type ResolvedRepository,
} from './git/repository.js';

export {
  installPreReceiveHook,
  renderHookScript,
  parseRefUpdates,
  readUpdatesFromStdin,
  selectDeliveries,
  isZeroRevision,
  handlePreReceive,
  type RefUpdate,
  type PreReceiveOptions,
  type PreReceiveResult,
} from './git/hooks.js';

export { deliver, receiverArgs, type PushEvent, type DeliveryResult, type DeliveryStatus } from './git/receiver.js';

export { parseGitCommand, prepareSession, dispatch, type GitCommand, type GitVerb } from './git/dispatch.js';

export {
  CONTEXT_ENV,
  sessionContextToEnv,
  pushContextToEnv,
  sessionContextFromEnv,
  pushContextFromEnv,
  type SessionContext,
  type PushContext,
} from './context.js';

export { initAccount, setupReceiverScript, RECEIVER_SKELETON, type InitResult } from './account.js';

export {
  config,
  resolveAccount,
  loadSettings,
  parseSettings,
  receiverPath,
  DEFAULT_SETTINGS,
  type Account,
  type RelaySettings,
} from './config.js';

export { resolveLauncher, shellQuote, renderShellCommand, type Launcher } from './launcher.js';

export { PushRelayError, isPushRelayError, type PushRelayErrorCode } from './errors.js';
