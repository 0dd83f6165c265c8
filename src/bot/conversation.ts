import { isPriority, type UserId } from '../model.js';
import type { TaskStore } from '../store/taskStore.js';
import { reminderFromLabel } from '../time.js';
import type { Reply } from '../transport/transport.js';
import * as render from './render.js';
import type { DialogueSession, SessionRegistry } from './session.js';

export interface ConversationDeps {
  store: TaskStore;
  sessions: SessionRegistry;
  clock?: () => Date;
}

/**
 * Task creation dialogue: text, then priority, then reminder.
 *
 * The priority step rejects anything outside the offered labels; the reminder
 * step accepts any input and treats unrecognised labels as "no reminder".
 */
export class Conversation {
  private readonly clock: () => Date;

  constructor(private deps: ConversationDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Opens a fresh draft, discarding any previous draft or pending action. */
  start(userId: UserId): Reply {
    this.deps.sessions.set(userId, { kind: 'collectingText' });
    return render.askText();
  }

  async advance(userId: UserId, session: DialogueSession, input: string): Promise<Reply> {
    const { sessions, store } = this.deps;

    switch (session.kind) {
      case 'collectingText':
        if (!input.trim()) return render.blankText();
        sessions.set(userId, { kind: 'collectingPriority', text: input });
        return render.askPriority();

      case 'collectingPriority':
        if (!isPriority(input)) return render.invalidPriority();
        sessions.set(userId, { kind: 'collectingReminder', text: session.text, priority: input });
        return render.askReminder();

      case 'collectingReminder': {
        const reminder = reminderFromLabel(input, this.clock());
        const task = await store.addTask(userId, session.text, session.priority, reminder);
        sessions.reset(userId);
        return render.taskCreated(task);
      }
    }
  }

  /** Ends whatever the user was doing. */
  cancel(userId: UserId): Reply {
    this.deps.sessions.reset(userId);
    return render.cancelled();
  }
}
