import { mkdir, readFile, writeFile, rename, copyFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_PRIORITY, PRIORITIES, type Priority, type Task, type UserId } from '../model.js';
import { createLogger, errorMeta, type Logger } from '../log.js';
import { formatTimestamp } from '../time.js';

export const DEFAULT_DATA_FILE = 'tasks_data.json';

const PersistedTaskSchema = z.object({
  id: z.number().int(),
  text: z.string(),
  priority: z.enum(PRIORITIES).default(DEFAULT_PRIORITY),
  created_at: z.string(),
  completed: z.boolean(),
  reminder: z.string().nullable().default(null),
});

type PersistedTask = z.infer<typeof PersistedTaskSchema>;

const UserKeySchema = z
  .string()
  .regex(/^-?\d+$/, 'user id must be an integer')
  .transform((s) => Number(s));

const PersistedStoreSchema = z.record(z.string(), z.object({ tasks: z.array(PersistedTaskSchema) }));

/** On-disk shape: user id (as a string key) -> `{ tasks }`. */
export type PersistedStore = Record<string, { tasks: PersistedTask[] }>;

export type PriorityBuckets = Record<Priority, Task[]>;

export interface TaskStoreOptions {
  filePath?: string;
  logger?: Logger;
  clock?: () => Date;
}

function toPersisted(t: Task): PersistedTask {
  return {
    id: t.id,
    text: t.text,
    priority: t.priority,
    created_at: t.createdAt,
    completed: t.completed,
    reminder: t.reminder,
  };
}

function fromPersisted(t: PersistedTask): Task {
  return {
    id: t.id,
    text: t.text,
    priority: t.priority,
    createdAt: t.created_at,
    completed: t.completed,
    reminder: t.reminder,
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Per-user task lists backed by a single JSON file.
 *
 * Every mutation is written through before it resolves. Mutations and writes
 * share one exclusive section, so concurrent callers never interleave file writes.
 */
export class TaskStore {
  private users = new Map<UserId, { tasks: Task[] }>();
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(opts: TaskStoreOptions = {}) {
    this.filePath = opts.filePath ?? path.join(process.cwd(), DEFAULT_DATA_FILE);
    this.logger = opts.logger ?? createLogger('silent');
    this.clock = opts.clock ?? (() => new Date());
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn, fn);
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Replaces in-memory state with the file contents. Missing or unreadable files give an empty store. */
  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (!isMissingFile(err)) this.logger.error('failed to read task data', { file: this.filePath, ...errorMeta(err) });
      this.users = new Map();
      return;
    }

    try {
      const parsed = PersistedStoreSchema.parse(JSON.parse(raw));
      const users = new Map<UserId, { tasks: Task[] }>();
      for (const [key, entry] of Object.entries(parsed)) {
        users.set(UserKeySchema.parse(key), { tasks: entry.tasks.map(fromPersisted) });
      }
      this.users = users;
      this.logger.info('task data loaded', { file: this.filePath, users: users.size });
    } catch (err) {
      this.logger.error('failed to parse task data, starting empty', { file: this.filePath, ...errorMeta(err) });
      this.users = new Map();
    }
  }

  snapshot(): PersistedStore {
    const out: PersistedStore = {};
    for (const [userId, entry] of this.users) {
      out[String(userId)] = { tasks: entry.tasks.map(toPersisted) };
    }
    return out;
  }

  private async backupDataFile(): Promise<void> {
    try {
      await stat(this.filePath);
    } catch {
      return;
    }
    await copyFile(this.filePath, this.filePath + '.bak');
  }

  /**
   * Writes the whole mapping via a temp file and rename.
   * Returns false (after logging) when the write fails; memory stays ahead of disk.
   */
  async save(): Promise<boolean> {
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await this.backupDataFile();
      const tmp = this.filePath + '.tmp';
      await writeFile(tmp, JSON.stringify(this.snapshot(), null, 2) + '\n', 'utf8');
      await rename(tmp, this.filePath);
      return true;
    } catch (err) {
      this.logger.error('failed to save task data', { file: this.filePath, ...errorMeta(err) });
      return false;
    }
  }

  private entry(userId: UserId): { tasks: Task[] } {
    let entry = this.users.get(userId);
    if (!entry) {
      entry = { tasks: [] };
      this.users.set(userId, entry);
    }
    return entry;
  }

  /** The user's list in insertion order; materializes an empty list for new users. */
  getTasks(userId: UserId): readonly Task[] {
    return this.entry(userId).tasks;
  }

  addTask(userId: UserId, text: string, priority: Priority = DEFAULT_PRIORITY, reminder: string | null = null): Promise<Task> {
    return this.exclusive(async () => {
      const entry = this.entry(userId);
      const task: Task = {
        id: entry.tasks.length + 1,
        text,
        priority,
        createdAt: formatTimestamp(this.clock()),
        completed: false,
        reminder,
      };
      entry.tasks.push(task);
      await this.save();
      this.logger.debug('task added', { userId, id: task.id });
      return task;
    });
  }

  /** Marks the task completed. Completing an already completed task still succeeds. */
  completeTask(userId: UserId, id: number): Promise<boolean> {
    return this.exclusive(async () => {
      const task = this.entry(userId).tasks.find((t) => t.id === id);
      if (!task) return false;
      task.completed = true;
      await this.save();
      return true;
    });
  }

  deleteTask(userId: UserId, id: number): Promise<boolean> {
    return this.exclusive(async () => {
      const entry = this.entry(userId);
      const index = entry.tasks.findIndex((t) => t.id === id);
      if (index === -1) return false;
      entry.tasks = entry.tasks.filter((_, i) => i !== index);
      await this.save();
      return true;
    });
  }

  activeTasks(userId: UserId): Task[] {
    return this.getTasks(userId).filter((t) => !t.completed);
  }

  completedTasks(userId: UserId): Task[] {
    return this.getTasks(userId).filter((t) => t.completed);
  }

  /** Incomplete tasks per priority, list order kept; every priority has a (possibly empty) bucket. */
  tasksByPriority(userId: UserId): PriorityBuckets {
    const buckets: PriorityBuckets = { '🔴 Высокий': [], '🟡 Средний': [], '🟢 Низкий': [] };
    for (const task of this.activeTasks(userId)) buckets[task.priority].push(task);
    return buckets;
  }
}
