import { ResolutionFailed } from '../errors.js';
import { normalizeHandle, normalizePhone, type IdentityResolver } from '../identity.js';
import type { ResolvedUser, ResponderIdentity } from '../types.js';

/** Table-backed resolver for tests. */
export class MemoryIdentityResolver implements IdentityResolver {
  readonly handleLookups: string[] = [];
  readonly phoneLookups: string[] = [];
  private bots = new Map<string, ResponderIdentity>();
  private users = new Map<string, ResolvedUser>();

  addBot(identity: ResponderIdentity & { username: string }) {
    this.bots.set(identity.username.toLowerCase(), identity);
    return this;
  }

  addUser(user: ResolvedUser) {
    this.users.set(user.phone, user);
    return this;
  }

  async resolve(handle: string): Promise<ResponderIdentity> {
    this.handleLookups.push(handle);
    const username = normalizeHandle(handle);
    const bot = this.bots.get(username.toLowerCase());
    if (!bot) throw new ResolutionFailed('NotFound', `no user has "${username}" as username`);
    return bot;
  }

  async resolvePhone(phone: string): Promise<ResolvedUser> {
    const normalized = normalizePhone(phone);
    this.phoneLookups.push(normalized);
    const user = this.users.get(normalized);
    if (!user) throw new ResolutionFailed('NotFound', 'no user found for phone');
    return user;
  }
}
