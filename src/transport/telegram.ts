import { HttpError, requestJson, type FetchLike } from '../http.js';
import { classifyText, type ChatTransport, type InboundMessage, type Reply } from './transport.js';

export interface TelegramTransportOptions {
  /** Bot token from BotFather */
  token: string;
  /** Long-poll timeout in seconds (default: 30). 0 means short polling. */
  pollTimeoutSeconds?: number;
  /** API root (default: https://api.telegram.org) */
  apiBase?: string;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
}

interface TelegramUser {
  id: number;
  is_bot: boolean;
  first_name: string;
  username?: string;
}

interface TelegramMessage {
  message_id: number;
  chat: { id: number };
  from?: TelegramUser;
  text?: string;
}

interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
}

type TelegramEnvelope<T> =
  | { ok: true; result: T }
  | { ok: false; error_code?: number; description?: string };

type ReplyMarkup =
  | { keyboard: Array<Array<{ text: string }>>; one_time_keyboard: true; resize_keyboard: true }
  | { remove_keyboard: true };

export class TelegramApiError extends Error {
  constructor(
    public readonly method: string,
    public readonly errorCode: number | undefined,
    public readonly description: string,
  ) {
    super(`Telegram ${method} failed${errorCode ? ` (${errorCode})` : ''}: ${description}`);
    this.name = 'TelegramApiError';
  }
}

function envelopeFromText(text: string | undefined): { error_code?: number; description?: string } | undefined {
  if (!text) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed !== 'object' || parsed === null) return undefined;
    return {
      error_code: 'error_code' in parsed && typeof parsed.error_code === 'number' ? parsed.error_code : undefined,
      description: 'description' in parsed && typeof parsed.description === 'string' ? parsed.description : undefined,
    };
  } catch {
    return undefined;
  }
}

function toInbound(update: TelegramUpdate): InboundMessage | undefined {
  const msg = update.message;
  if (!msg?.from || msg.text === undefined) return undefined;
  return {
    userId: msg.from.id,
    chatId: msg.chat.id,
    firstName: msg.from.first_name,
    ...classifyText(msg.text),
  };
}

export function replyMarkup(reply: Reply): ReplyMarkup | undefined {
  if (reply.options?.length) {
    return {
      keyboard: reply.options.map((row) => row.map((text) => ({ text }))),
      one_time_keyboard: true,
      resize_keyboard: true,
    };
  }
  if (reply.removeOptions) return { remove_keyboard: true };
  return undefined;
}

/** Bot API transport: long-polling getUpdates in, sendMessage out. */
export class TelegramTransport implements ChatTransport {
  readonly name = 'telegram' as const;

  private fetcher: FetchLike;
  private offset?: number;

  constructor(private opts: TelegramTransportOptions) {
    this.fetcher = opts.fetcher ?? fetch;
  }

  private async call<T>(method: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<T> {
    const base = this.opts.apiBase ?? 'https://api.telegram.org';
    let envelope: TelegramEnvelope<T>;
    try {
      envelope = await requestJson<TelegramEnvelope<T>>(
        `${base}/bot${this.opts.token}/${method}`,
        { body, signal, label: method },
        this.fetcher,
      );
    } catch (err) {
      if (err instanceof HttpError) {
        const parsed = envelopeFromText(err.responseText);
        throw new TelegramApiError(method, parsed?.error_code ?? err.status, parsed?.description ?? err.message);
      }
      throw err;
    }
    if (!envelope.ok) {
      throw new TelegramApiError(method, envelope.error_code, envelope.description ?? 'unknown error');
    }
    return envelope.result;
  }

  async getMe(): Promise<TelegramUser> {
    return this.call<TelegramUser>('getMe', {});
  }

  async poll(signal?: AbortSignal): Promise<InboundMessage[]> {
    const updates = await this.call<TelegramUpdate[]>(
      'getUpdates',
      {
        offset: this.offset,
        timeout: this.opts.pollTimeoutSeconds ?? 30,
        allowed_updates: ['message'],
      },
      signal,
    );

    const out: InboundMessage[] = [];
    for (const update of updates) {
      this.offset = update.update_id + 1;
      const inbound = toInbound(update);
      if (inbound) out.push(inbound);
    }
    return out;
  }

  async send(chatId: number, reply: Reply): Promise<void> {
    const markup = replyMarkup(reply);
    await this.call<TelegramMessage>('sendMessage', {
      chat_id: chatId,
      text: reply.text,
      ...(reply.format === 'markdown' ? { parse_mode: 'Markdown' } : {}),
      ...(markup ? { reply_markup: markup } : {}),
    });
  }
}
