import type { UserId } from '../model.js';
import type { TaskStore } from '../store/taskStore.js';
import type { Reply } from '../transport/transport.js';
import * as render from './render.js';
import type { PendingSession, SessionRegistry } from './session.js';

export interface PendingActionDeps {
  store: TaskStore;
  sessions: SessionRegistry;
}

/** Signed base-10 integer of any length, surrounding whitespace allowed; undefined otherwise. */
export function parseTaskNumber(text: string): bigint | undefined {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return undefined;
  return BigInt(trimmed.replace(/^\+/, ''));
}

const MAX_ID = BigInt(Number.MAX_SAFE_INTEGER);

/** Completion and deletion by task number, one attempt per activation. */
export class PendingActionResolver {
  constructor(private deps: PendingActionDeps) {}

  beginCompletion(userId: UserId): Reply[] {
    const active = this.deps.store.activeTasks(userId);
    if (!active.length) return [render.noTasksToComplete()];
    this.deps.sessions.set(userId, { kind: 'awaitingCompletion' });
    return render.completionChoices(active);
  }

  beginDeletion(userId: UserId): Reply[] {
    const all = this.deps.store.getTasks(userId);
    if (!all.length) return [render.noTasksToDelete()];
    this.deps.sessions.set(userId, { kind: 'awaitingDeletion' });
    return render.deletionChoices(all);
  }

  /**
   * A parse failure keeps the action pending so the user can retry.
   * Otherwise the action is cleared whether or not the task existed.
   */
  async resolve(userId: UserId, session: PendingSession, input: string): Promise<Reply> {
    const parsed = parseTaskNumber(input);
    if (parsed === undefined) return render.invalidNumber();

    const { store, sessions } = this.deps;
    try {
      // no task can carry an id this large
      if (parsed > MAX_ID || parsed < -MAX_ID) return render.notFound(parsed);
      const id = Number(parsed);
      if (session.kind === 'awaitingCompletion') {
        return (await store.completeTask(userId, id)) ? render.completed(id) : render.notFound(id);
      }
      return (await store.deleteTask(userId, id)) ? render.deleted(id) : render.notFound(id);
    } finally {
      sessions.reset(userId);
    }
  }
}
