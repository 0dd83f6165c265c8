import type { Priority, UserId } from '../model.js';

/**
 * Ephemeral per-user state. A creation draft and a pending numeric action
 * are variants of the same union, so at most one is ever active.
 */
export type Session =
  | { kind: 'idle' }
  | { kind: 'collectingText' }
  | { kind: 'collectingPriority'; text: string }
  | { kind: 'collectingReminder'; text: string; priority: Priority }
  | { kind: 'awaitingCompletion' }
  | { kind: 'awaitingDeletion' };

export type DialogueSession = Extract<Session, { kind: 'collectingText' | 'collectingPriority' | 'collectingReminder' }>;

export type PendingSession = Extract<Session, { kind: 'awaitingCompletion' | 'awaitingDeletion' }>;

const IDLE: Session = { kind: 'idle' };

export function isDialogue(s: Session): s is DialogueSession {
  return s.kind === 'collectingText' || s.kind === 'collectingPriority' || s.kind === 'collectingReminder';
}

export function isPending(s: Session): s is PendingSession {
  return s.kind === 'awaitingCompletion' || s.kind === 'awaitingDeletion';
}

export class SessionRegistry {
  private sessions = new Map<UserId, Session>();

  get(userId: UserId): Session {
    return this.sessions.get(userId) ?? IDLE;
  }

  set(userId: UserId, session: Session): void {
    if (session.kind === 'idle') this.sessions.delete(userId);
    else this.sessions.set(userId, session);
  }

  reset(userId: UserId): void {
    this.sessions.delete(userId);
  }
}
