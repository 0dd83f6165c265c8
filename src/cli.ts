#!/usr/bin/env node
import path from 'node:path';
import os from 'node:os';
import { mkdtemp } from 'node:fs/promises';
import { Command } from 'commander';
import { BotDispatcher } from './bot/dispatcher.js';
import { runBot } from './bot/runner.js';
import { botSettings, ConfigError, doctorReport, readEnv, type BotSettings } from './config.js';
import { loadEnvFiles } from './env.js';
import { createLogger, errorMeta } from './log.js';
import { acquireLock, lockNameFor } from './store/lock.js';
import { TaskStore } from './store/taskStore.js';
import { MockTransport } from './transport/mock.js';
import { TelegramTransport } from './transport/telegram.js';

loadEnvFiles();

const program = new Command();

program
  .name('task-bot')
  .description('Telegram bot for a personal task list with priorities and reminders')
  .version('0.1.0');

program
  .command('doctor')
  .description('Check environment/config and print what is missing')
  .action(async () => {
    const env = readEnv();
    const report = doctorReport(env);
    console.log('task-bot doctor');
    console.log(`token: ${report.tokenConfigured ? 'set' : 'missing'}`);
    console.log(`log level: ${report.logLevel}`);

    if (report.missing.length) {
      console.log('\nMissing env vars:');
      for (const k of report.missing) console.log(`- ${k}`);
    }

    if (report.notes.length) {
      console.log('\nNotes:');
      for (const n of report.notes) console.log(`- ${n}`);
    }

    if (!env.TELEGRAM_BOT_TOKEN) {
      process.exitCode = 2;
      return;
    }

    try {
      const me = await new TelegramTransport({ token: env.TELEGRAM_BOT_TOKEN }).getMe();
      console.log(`\nBot API: ok (@${me.username ?? me.first_name}, id=${me.id})`);
    } catch (err) {
      console.log(`\nBot API: ${errorMeta(err).error}`);
      process.exitCode = 2;
    }
  });

program
  .command('run')
  .description('Start the bot (long polling)')
  .option('--data-file <path>', 'Task data file (default: tasks_data.json or TASK_BOT_DATA_FILE)')
  .action(async (opts: { dataFile?: string }) => {
    const env = readEnv();

    let settings: BotSettings;
    try {
      settings = botSettings(env, { dataFile: opts.dataFile });
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      console.error(`❌ ${err.message}`);
      console.error('Create a .env file with TELEGRAM_BOT_TOKEN=<token> or export it. Run: task-bot doctor');
      process.exitCode = 2;
      return;
    }

    const logger = createLogger(settings.logLevel, 'task-bot');
    const dataFile = path.resolve(settings.dataFile);
    const lock = await acquireLock(path.dirname(dataFile), lockNameFor(dataFile));

    const controller = new AbortController();
    const stop = () => {
      logger.info('shutdown requested');
      controller.abort();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    try {
      const store = new TaskStore({ filePath: dataFile, logger: logger.child('store') });
      await store.load();

      const transport = new TelegramTransport({ token: settings.token, pollTimeoutSeconds: settings.pollTimeoutSeconds });
      const dispatcher = new BotDispatcher({ store, logger: logger.child('dispatcher') });

      logger.info('bot started', { dataFile, pollTimeoutSeconds: settings.pollTimeoutSeconds });
      await runBot({ transport, dispatcher, logger, signal: controller.signal });
    } finally {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
      await lock.release();
    }
  });

program
  .command('demo')
  .description('Run a scripted conversation against the in-memory mock transport')
  .option('--data-file <path>', 'Task data file (default: a fresh temp file)')
  .action(async (opts: { dataFile?: string }) => {
    const logger = createLogger('info', 'demo');
    const dataFile = opts.dataFile ?? path.join(await mkdtemp(path.join(os.tmpdir(), 'task-bot-')), 'tasks_data.json');

    const store = new TaskStore({ filePath: dataFile, logger: logger.child('store') });
    await store.load();
    const dispatcher = new BotDispatcher({ store, logger });

    const script = ['/start', '/add', 'Купить молоко', '🟡 Средний', 'Через 1 час', '/list', '/complete', '1', '/list'];
    const transport = new MockTransport({ userId: 1, firstName: 'Demo' });
    const runnerLogger = createLogger('warn', 'demo');

    for (const line of script) {
      transport.say(line);
      const before = transport.sent.length;
      await runBot({ transport, dispatcher, logger: runnerLogger });
      console.log(`> ${line}`);
      for (const { reply } of transport.sent.slice(before)) {
        console.log(reply.text.replace(/^/gm, '  '));
        if (reply.options) console.log(`  [${reply.options.map((row) => row.join(' | ')).join(' / ')}]`);
      }
      console.log('');
    }

    console.log(`data file: ${dataFile}`);
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
