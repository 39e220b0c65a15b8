import { StorageUnavailableError } from '../errors.js';

const TRANSIENT_ERRNO = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']);
// SQLSTATE classes: connection exception, insufficient resources, operator
// intervention, system error, transaction rollback (serialization/deadlock)
const TRANSIENT_CLASSES = new Set(['08', '53', '57', '58', '40']);

export const CHECK_VIOLATION = '23514';

function codeOf(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isCheckViolation(err: unknown): boolean {
  return codeOf(err) === CHECK_VIOLATION;
}

export function isTransient(err: unknown): boolean {
  const code = codeOf(err);
  if (code === undefined) {
    // node-postgres reports dropped sockets and pool timeouts as plain Errors
    return err instanceof Error && /connection|timeout|terminated/i.test(err.message);
  }
  return TRANSIENT_ERRNO.has(code) || TRANSIENT_CLASSES.has(code.slice(0, 2));
}

/**
 * Maps driver failures onto the engine taxonomy. Transient failures become
 * StorageUnavailableError; anything else is returned unchanged.
 */
export function mapPgError(err: unknown, what: string): unknown {
  if (isTransient(err)) {
    const msg = err instanceof Error ? err.message : String(err);
    return new StorageUnavailableError(`${what}: ${msg}`, err);
  }
  return err;
}
