/**
 * Error taxonomy for pushrelay.
 *
 * Every failure the CLI reports carries one of these codes. Callers switch on
 * `code` rather than on message text.
 */

export type PushRelayErrorCode =
  | 'MalformedKey'
  | 'NoUsername'
  | 'InvalidName'
  | 'PathTraversal'
  | 'BadCommand'
  | 'IOError'
  | 'CorruptRevision'
  | 'ReceiverUnavailable'
  | 'InvalidConfig';

export class PushRelayError extends Error {
  readonly code: PushRelayErrorCode;

  constructor(code: PushRelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PushRelayError';
    this.code = code;
    Object.setPrototypeOf(this, PushRelayError.prototype);
  }
}

export function isPushRelayError(err: unknown, code?: PushRelayErrorCode): err is PushRelayError {
  return err instanceof PushRelayError && (code === undefined || err.code === code);
}

/**
 * Wrap a filesystem failure as an IOError, keeping the original as `cause`.
 */
export function ioError(action: string, target: string, cause: unknown): PushRelayError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new PushRelayError('IOError', `${action} ${target}: ${detail}`, { cause });
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
