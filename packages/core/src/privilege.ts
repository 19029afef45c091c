import { PrivilegeError } from './errors.js';

/** Source of the effective user id; `undefined` on platforms without one. */
export type UidSource = () => number | undefined;

const processUid: UidSource = () => process.geteuid?.();

/**
 * Abort unless running with elevated privilege (effective uid 0).
 *
 * @throws PrivilegeError when not privileged
 */
export function assertPrivileged(getUid: UidSource = processUid): void {
  const uid = getUid();
  if (uid !== 0) {
    throw new PrivilegeError('This command must be run as root (use sudo)');
  }
}

/** The user that invoked sudo, when there is one. */
export function invokingUser(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env['SUDO_USER'] ?? env['USER'];
}
