import type { UserId } from '../model.js';
import { classifyText, type ChatTransport, type InboundMessage, type Reply } from './transport.js';

export interface SentReply {
  chatId: number;
  reply: Reply;
}

/**
 * In-memory transport for local demos and tests.
 *
 * - `say()` queues a raw text message, classified like the real transport would.
 * - Every `poll()` hands out the whole queue; once it is empty the transport is drained.
 * - Replies are recorded in `sent`.
 */
export class MockTransport implements ChatTransport {
  readonly name = 'mock' as const;
  readonly sent: SentReply[] = [];
  private queue: InboundMessage[] = [];

  constructor(private defaults: { userId?: UserId; firstName?: string } = {}) {}

  get drained(): boolean {
    return this.queue.length === 0;
  }

  say(text: string, from: { userId?: UserId; chatId?: number; firstName?: string } = {}): this {
    const userId = from.userId ?? this.defaults.userId ?? 1;
    this.queue.push({
      userId,
      chatId: from.chatId ?? userId,
      firstName: from.firstName ?? this.defaults.firstName,
      ...classifyText(text),
    });
    return this;
  }

  async poll(): Promise<InboundMessage[]> {
    const batch = this.queue;
    this.queue = [];
    return batch;
  }

  async send(chatId: number, reply: Reply): Promise<void> {
    this.sent.push({ chatId, reply });
  }

  /** Texts of every reply sent so far, in order. */
  texts(): string[] {
    return this.sent.map((s) => s.reply.text);
  }
}
