import { createLogger, errorMeta, type Logger } from '../log.js';
import type { Command, UserId } from '../model.js';
import type { TaskStore } from '../store/taskStore.js';
import type { InboundMessage, Reply } from '../transport/transport.js';
import { Conversation } from './conversation.js';
import { PendingActionResolver } from './pendingAction.js';
import * as render from './render.js';
import { isDialogue, isPending, SessionRegistry } from './session.js';

export interface DispatcherOptions {
  store: TaskStore;
  sessions?: SessionRegistry;
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Turns one classified inbound message into the replies for it.
 *
 * Free text goes to an open creation dialogue first, then to a pending
 * numbered action. `/complete` and `/delete` wait until the dialogue is done. Errors never escape: they are logged and answered with an apology.
 */
export class BotDispatcher {
  readonly sessions: SessionRegistry;
  private conversation: Conversation;
  private resolver: PendingActionResolver;
  private logger: Logger;

  constructor(private opts: DispatcherOptions) {
    this.sessions = opts.sessions ?? new SessionRegistry();
    this.logger = opts.logger ?? createLogger('silent');
    this.conversation = new Conversation({ store: opts.store, sessions: this.sessions, clock: opts.clock });
    this.resolver = new PendingActionResolver({ store: opts.store, sessions: this.sessions });
  }

  async handle(message: InboundMessage): Promise<Reply[]> {
    try {
      switch (message.kind) {
        case 'command':
          return await this.command(message.userId, message.command, message.firstName);
        case 'unknownCommand':
          return [render.unknownCommand(message.command)];
        case 'text':
          return [await this.text(message.userId, message.text)];
      }
    } catch (err) {
      this.logger.error('message handling failed', {
        userId: message.userId,
        kind: message.kind,
        session: this.sessions.get(message.userId).kind,
        ...errorMeta(err),
      });
      return [render.apology()];
    }
  }

  private async command(userId: UserId, command: Command, firstName?: string): Promise<Reply[]> {
    this.logger.debug('command', { userId, command });
    switch (command) {
      case 'start':
        return [render.welcome(firstName)];
      case 'help':
        return [render.help()];
      case 'add':
        return [this.conversation.start(userId)];
      case 'list':
        return [render.taskList(this.opts.store.tasksByPriority(userId), this.opts.store.completedTasks(userId))];
      case 'complete':
        if (isDialogue(this.sessions.get(userId))) return [render.dialogueOpen()];
        return this.resolver.beginCompletion(userId);
      case 'delete':
        if (isDialogue(this.sessions.get(userId))) return [render.dialogueOpen()];
        return this.resolver.beginDeletion(userId);
      case 'cancel':
        return [this.conversation.cancel(userId)];
    }
  }

  private async text(userId: UserId, text: string): Promise<Reply> {
    const session = this.sessions.get(userId);
    if (isDialogue(session)) return this.conversation.advance(userId, session, text);
    if (isPending(session)) return this.resolver.resolve(userId, session, text);
    return render.idleHint();
  }
}
