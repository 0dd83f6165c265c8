import { isCommand, type Command, type UserId } from '../model.js';

export type MessageBody =
  | { kind: 'command'; command: Command }
  | { kind: 'unknownCommand'; command: string }
  | { kind: 'text'; text: string };

/** A message already classified by the transport. */
export type InboundMessage = {
  userId: UserId;
  chatId: number;
  firstName?: string;
} & MessageBody;

export interface Reply {
  text: string;
  /** Render with lightweight (legacy Telegram) Markdown. */
  format?: 'markdown';
  /** Quick-select choices, one inner array per row. */
  options?: string[][];
  /** Dismiss any quick-select choices still shown. */
  removeOptions?: boolean;
}

export interface ChatTransport {
  readonly name: string;

  /** Next batch of inbound messages. May wait (long polling) until some arrive or the signal aborts. */
  poll(signal?: AbortSignal): Promise<InboundMessage[]>;

  send(chatId: number, reply: Reply): Promise<void>;

  /** True once no further messages will ever arrive. */
  readonly drained?: boolean;
}

/**
 * `/add`, `/add@my_bot` and `/ADD extra` are commands; anything else is text.
 * Slash words outside the command set are reported as unknown commands.
 */
export function classifyText(text: string): MessageBody {
  const match = /^\/([A-Za-z0-9_]+)(?:@[A-Za-z0-9_]+)?(?:\s[\s\S]*)?$/.exec(text.trim());
  if (!match) return { kind: 'text', text };
  const name = match[1].toLowerCase();
  if (!isCommand(name)) return { kind: 'unknownCommand', command: name };
  return { kind: 'command', command: name };
}
