import { createLogger, errorMeta, type Logger } from '../log.js';
import type { ChatTransport, InboundMessage } from '../transport/transport.js';
import type { BotDispatcher } from './dispatcher.js';

export interface RunBotOptions {
  transport: ChatTransport;
  dispatcher: BotDispatcher;
  logger?: Logger;
  signal?: AbortSignal;
  /** Delay after a failed poll, doubled per consecutive failure up to maxBackoffMs (default: 1000). */
  backoffMs?: number;
  maxBackoffMs?: number;
}

export interface RunReport {
  messages: number;
  replies: number;
  sendErrors: number;
  pollErrors: number;
}

function sleep(ms: number, signal?: AbortSignal) {
  return new Promise<void>((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Polls the transport and answers messages one at a time, each handled
 * (persistence included) before the next is looked at.
 * Returns when the signal aborts or the transport is drained.
 */
export async function runBot(opts: RunBotOptions): Promise<RunReport> {
  const { transport, dispatcher, signal } = opts;
  const logger = opts.logger ?? createLogger('silent');
  const backoffMs = opts.backoffMs ?? 1000;
  const maxBackoffMs = opts.maxBackoffMs ?? 60_000;
  const report: RunReport = { messages: 0, replies: 0, sendErrors: 0, pollErrors: 0 };

  let failures = 0;
  while (!signal?.aborted && !transport.drained) {
    let batch: InboundMessage[];
    try {
      batch = await transport.poll(signal);
      failures = 0;
    } catch (err) {
      if (signal?.aborted) break;
      report.pollErrors++;
      failures++;
      const wait = Math.min(maxBackoffMs, backoffMs * 2 ** (failures - 1));
      logger.warn(`poll failed, retrying in ${wait}ms`, errorMeta(err));
      await sleep(wait, signal);
      continue;
    }

    for (const message of batch) {
      report.messages++;
      const replies = await dispatcher.handle(message);
      for (const reply of replies) {
        try {
          await transport.send(message.chatId, reply);
          report.replies++;
        } catch (err) {
          report.sendErrors++;
          logger.error('failed to send reply', { chatId: message.chatId, ...errorMeta(err) });
        }
      }
    }
  }

  logger.info('bot loop stopped', report);
  return report;
}
