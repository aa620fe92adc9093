import type { ErrorCode, SidecarError } from './errors.js';

export interface ResponderIdentity {
  id: string;
  username?: string;
  displayName?: string;
}

export interface InboundEvent {
  sender: { id: string };
  /** Equals the sender id for a private dialog. */
  chatId: string;
  text: string;
  timestamp: number;
  messageId: number;
}

export interface MessageHandle {
  id: number;
  date: number;
}

export interface ResolvedUser {
  id: string;
  username: string | null;
  firstName: string | null;
  lastName: string | null;
  phone: string;
}

/** Outcome of one send-and-wait. A timed-out wait is `sent: true` without `reply`. */
export type ReplyResult =
  | Readonly<{ sent: true; reply?: string }>
  | Readonly<{ sent: false; error: SidecarError }>;

export interface SendToBotResult {
  sent: true;
  reply?: string;
}

export interface SearchResult {
  ok: boolean;
  query: string;
  reply?: string;
  error?: ErrorCode;
}
