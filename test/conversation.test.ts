import { describe, expect, it } from 'vitest';
import { Conversation } from '../src/bot/conversation.js';
import { isDialogue, SessionRegistry } from '../src/bot/session.js';
import { TaskStore } from '../src/store/taskStore.js';
import { fixedClock, tempDataFile } from './helpers.js';

async function setup() {
  const store = new TaskStore({ filePath: await tempDataFile(), clock: fixedClock });
  const sessions = new SessionRegistry();
  const conversation = new Conversation({ store, sessions, clock: fixedClock });

  const say = async (text: string) => {
    const session = sessions.get(1);
    if (!isDialogue(session)) throw new Error(`no dialogue open (session: ${session.kind})`);
    return conversation.advance(1, session, text);
  };

  return { store, sessions, conversation, say };
}

describe('Conversation', () => {
  it('walks text, priority and reminder into a task', async () => {
    const { store, sessions, conversation, say } = await setup();

    expect(conversation.start(1)).toEqual({ text: '📝 Введите описание задачи:\n(или /cancel для отмены)' });
    expect(sessions.get(1)).toEqual({ kind: 'collectingText' });

    expect(await say('Buy milk')).toEqual({
      text: '🎯 Выберите приоритет задачи:',
      options: [['🔴 Высокий'], ['🟡 Средний'], ['🟢 Низкий']],
    });
    expect(sessions.get(1)).toEqual({ kind: 'collectingPriority', text: 'Buy milk' });

    expect(await say('🟡 Средний')).toEqual({
      text: '⏰ Когда напомнить о задаче?',
      options: [['Через 1 час', 'Через 3 часа'], ['Завтра', 'Через неделю'], ['Без напоминания']],
    });

    const done = await say('Через 1 час');
    expect(done).toEqual({
      text:
        '✅ Задача создана!\n\n📝 Buy milk\n🎯 Приоритет: 🟡 Средний\n' +
        '📅 Создана: 2026-01-15 09:30:00\n⏰ Напоминание: 2026-01-15 10:30:00',
      removeOptions: true,
    });
    expect(store.getTasks(1)).toEqual([
      {
        id: 1,
        text: 'Buy milk',
        priority: '🟡 Средний',
        createdAt: '2026-01-15 09:30:00',
        completed: false,
        reminder: '2026-01-15 10:30:00',
      },
    ]);
    expect(sessions.get(1)).toEqual({ kind: 'idle' });
  });

  it.each<[string, string | null]>([
    ['Через 3 часа', '2026-01-15 12:30:00'],
    ['Завтра', '2026-01-16 09:30:00'],
    ['Через неделю', '2026-01-22 09:30:00'],
    ['Без напоминания', null],
    ['в пятницу', null],
  ])('reminder choice %s', async (label, expected) => {
    const { store, conversation, say } = await setup();
    conversation.start(1);
    await say('task');
    await say('🟢 Низкий');
    await say(label);
    expect(store.getTasks(1)[0].reminder).toBe(expected);
  });

  it('omits the reminder line when there is none', async () => {
    const { conversation, say } = await setup();
    conversation.start(1);
    await say('task');
    await say('🔴 Высокий');
    const done = await say('Без напоминания');
    expect(done.text).toBe('✅ Задача создана!\n\n📝 task\n🎯 Приоритет: 🔴 Высокий\n📅 Создана: 2026-01-15 09:30:00');
  });

  it('re-prompts for an unknown priority and keeps the draft', async () => {
    const { sessions, conversation, say } = await setup();
    conversation.start(1);
    await say('task');

    expect(await say('urgent')).toEqual({
      text: '❌ Пожалуйста, выберите приоритет из списка',
      options: [['🔴 Высокий'], ['🟡 Средний'], ['🟢 Низкий']],
    });
    expect(sessions.get(1)).toEqual({ kind: 'collectingPriority', text: 'task' });

    await say('🔴 Высокий');
    expect(sessions.get(1)).toEqual({ kind: 'collectingReminder', text: 'task', priority: '🔴 Высокий' });
  });

  it('asks again for blank text', async () => {
    const { sessions, conversation, say } = await setup();
    conversation.start(1);
    expect((await say('   ')).text).toBe('❌ Описание задачи не может быть пустым.\n📝 Введите описание задачи:\n(или /cancel для отмены)');
    expect(sessions.get(1)).toEqual({ kind: 'collectingText' });
  });

  it('stores the text verbatim', async () => {
    const { store, conversation, say } = await setup();
    conversation.start(1);
    await say('  two  spaces ');
    await say('🟡 Средний');
    await say('Без напоминания');
    expect(store.getTasks(1)[0].text).toBe('  two  spaces ');
  });

  it('restarting discards the earlier draft', async () => {
    const { store, sessions, conversation, say } = await setup();
    conversation.start(1);
    await say('old');
    await say('🔴 Высокий');

    conversation.start(1);
    expect(sessions.get(1)).toEqual({ kind: 'collectingText' });

    await say('new');
    await say('🟢 Низкий');
    await say('Без напоминания');
    expect(store.getTasks(1).map((t) => [t.text, t.priority])).toEqual([['new', '🟢 Низкий']]);
  });

  it('cancel drops the draft without creating anything', async () => {
    const { store, sessions, conversation, say } = await setup();
    conversation.start(1);
    await say('task');
    await say('🟡 Средний');

    expect(conversation.cancel(1)).toEqual({ text: '❌ Действие отменено.', removeOptions: true });
    expect(sessions.get(1)).toEqual({ kind: 'idle' });
    expect(store.getTasks(1)).toEqual([]);
  });
});
