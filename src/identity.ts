import { ResolutionFailed } from './errors.js';
import type { ResolvedUser, ResponderIdentity } from './types.js';

const HANDLE_RE = /^[a-zA-Z][\w\d]{3,30}[a-zA-Z\d]$/;
const NON_PHONE_CHARS = /[^0-9+]/g;

export interface IdentityResolver {
  /** @throws ResolutionFailed */
  resolve(handle: string): Promise<ResponderIdentity>;
  /** @throws ResolutionFailed */
  resolvePhone(phone: string): Promise<ResolvedUser>;
}

/** Strips a leading `@` and checks the result is a well-formed username. */
export function normalizeHandle(handle: string) {
  const username = handle.trim().replace(/^@/, '');
  if (!HANDLE_RE.test(username)) {
    throw new ResolutionFailed(
      'InvalidHandle',
      `invalid bot username '${handle.trim()}'; it must match ${HANDLE_RE.source}`
    );
  }
  return username;
}

export function normalizePhone(phone: string) {
  return phone.trim().replace(NON_PHONE_CHARS, '');
}
