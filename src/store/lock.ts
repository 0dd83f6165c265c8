import { mkdir, readFile, writeFile, unlink } from 'node:fs/promises';
import path from 'node:path';

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

export class LockHeldError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly pid: number,
  ) {
    super(`Another task-bot process is using this data file (pid=${pid}, lock=${lockPath}).`);
  }
}

/** Lock file name guarding one data file, e.g. `tasks_data.json.lock`. */
export function lockNameFor(dataFile: string): string {
  return `${path.basename(dataFile)}.lock`;
}

async function readHolderPid(lockPath: string): Promise<number | undefined> {
  try {
    const parsed: unknown = JSON.parse(await readFile(lockPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'pid' in parsed && typeof parsed.pid === 'number') {
      return parsed.pid;
    }
  } catch {
    // unreadable lock counts as stale
  }
  return undefined;
}

export async function acquireLock(dir: string, filename = 'task-bot.lock'): Promise<LockHandle> {
  await mkdir(dir, { recursive: true });
  const lockPath = path.join(dir, filename);

  const pid = process.pid;
  const payload = JSON.stringify({ pid, at: new Date().toISOString() }) + '\n';

  try {
    await writeFile(lockPath, payload, { flag: 'wx' });
  } catch {
    const otherPid = await readHolderPid(lockPath);
    if (otherPid !== undefined && otherPid !== pid && isProcessAlive(otherPid)) {
      throw new LockHeldError(lockPath, otherPid);
    }
    // Stale lock: overwrite.
    await writeFile(lockPath, payload, { flag: 'w' });
  }

  return {
    path: lockPath,
    release: async () => {
      await unlink(lockPath).catch(() => undefined);
    },
  };
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
