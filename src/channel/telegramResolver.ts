import { Api, errors } from 'telegram';
import { ResolutionFailed, SendRejected, SidecarError } from '../errors.js';
import { normalizeHandle, normalizePhone, type IdentityResolver } from '../identity.js';
import type { ResolvedUser, ResponderIdentity } from '../types.js';
import type { TelegramConnection } from './telegram.js';

function toResolutionError(error: unknown): SidecarError {
  if (error instanceof SidecarError) return error;
  if (error instanceof errors.FloodWaitError) {
    return new SendRejected(`flood wait: ${error.seconds}s`, error.seconds);
  }
  if (error instanceof errors.RPCError) return new ResolutionFailed('NotFound', error.errorMessage);
  return new ResolutionFailed('NotFound', error instanceof Error ? error.message : String(error));
}

export class TelegramIdentityResolver implements IdentityResolver {
  constructor(private readonly connection: TelegramConnection) {}

  async resolve(handle: string): Promise<ResponderIdentity> {
    const username = normalizeHandle(handle);
    const client = this.connection.telegram;

    const entity = await client.getEntity(username).catch((error: unknown) => {
      throw toResolutionError(error);
    });

    if (!(entity instanceof Api.User)) {
      throw new ResolutionFailed('Ambiguous', `@${username} is not a user or bot account`);
    }

    const displayName = [entity.firstName, entity.lastName].filter(Boolean).join(' ');
    return {
      id: entity.id.toString(),
      username: entity.username ?? username,
      ...(displayName ? { displayName } : {})
    };
  }

  async resolvePhone(phone: string): Promise<ResolvedUser> {
    const normalized = normalizePhone(phone);
    if (!normalized) throw new ResolutionFailed('NotFound', 'empty phone number');
    const client = this.connection.telegram;

    const resolved = await client
      .invoke(new Api.contacts.ResolvePhone({ phone: normalized }))
      .catch((error: unknown) => {
        throw toResolutionError(error);
      });

    const peerUserId = resolved.peer instanceof Api.PeerUser ? resolved.peer.userId.toString() : null;
    const users = resolved.users.filter((u): u is Api.User => u instanceof Api.User);
    const user = users.find((u) => u.id.toString() === peerUserId) ?? users[0];
    if (!user) throw new ResolutionFailed('NotFound', 'no user found for phone');

    return {
      id: user.id.toString(),
      username: user.username ?? null,
      firstName: user.firstName ?? null,
      lastName: user.lastName ?? null,
      phone: normalized
    };
  }
}
