import { describe, expect, it } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { loadEnvFiles, parseEnvValue } from '../src/env.js';

describe('loadEnvFiles', () => {
  it('loads KEY=VALUE lines without overriding existing keys', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'task-bot-env-'));
    await writeFile(
      path.join(dir, '.env'),
      [
        '# bot settings',
        'TELEGRAM_BOT_TOKEN="test-token"',
        'export TASK_BOT_LOG_LEVEL=debug # verbose',
        'TASK_BOT_DATA_FILE=from-file.json',
        'not a pair',
        '',
      ].join('\n'),
    );
    const env: NodeJS.ProcessEnv = { TASK_BOT_DATA_FILE: 'already-set.json' };

    const { loaded } = loadEnvFiles(['.env', '.env.local'], dir, env);

    expect(loaded).toEqual(['.env']);
    expect(env).toEqual({
      TELEGRAM_BOT_TOKEN: 'test-token',
      TASK_BOT_LOG_LEVEL: 'debug',
      TASK_BOT_DATA_FILE: 'already-set.json',
    });
  });

  it('parses values', () => {
    expect(parseEnvValue(" 'a # b' ")).toBe('a # b');
    expect(parseEnvValue('abc#def')).toBe('abc#def');
    expect(parseEnvValue('abc  # note')).toBe('abc');
    expect(parseEnvValue('')).toBe('');
  });
});
