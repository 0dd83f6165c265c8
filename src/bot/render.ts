import { NO_REMINDER, PRIORITIES, REMINDER_OFFSETS, type Task } from '../model.js';
import type { PriorityBuckets } from '../store/taskStore.js';
import type { Reply } from '../transport/transport.js';

/** How many completed tasks the list view shows, newest last. */
export const COMPLETED_SHOWN = 5;

const NUMBER_HINT = 'Отправьте номер задачи (например: 1) или /cancel для отмены';

/** Escapes characters that legacy Telegram Markdown treats as markup. */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

function statusGlyph(task: Task) {
  return task.completed ? '✅' : '⏹';
}

export function welcome(firstName?: string): Reply {
  const greeting = firstName ? `👋 Привет, ${firstName}!` : '👋 Привет!';
  return {
    text: [
      greeting,
      '',
      'Я бот для управления задачами. Я помогу тебе:',
      '📝 Создавать задачи',
      '🎯 Организовывать их по приоритетам',
      '⏰ Устанавливать напоминания',
      '✅ Отслеживать выполнение',
      '',
      'Используй команды:',
      '/add - Добавить новую задачу',
      '/list - Показать все задачи',
      '/complete - Отметить задачу выполненной',
      '/delete - Удалить задачу',
      '/help - Помощь',
      '/cancel - Отменить текущее действие',
    ].join('\n'),
  };
}

export function help(): Reply {
  return {
    format: 'markdown',
    text: [
      '📚 *Доступные команды:*',
      '',
      '/start - Начать работу с ботом',
      '/add - Добавить новую задачу',
      '/list - Показать список задач',
      '/complete - Отметить задачу как выполненную',
      '/delete - Удалить задачу',
      '/help - Показать эту справку',
      '/cancel - Отменить текущее действие',
      '',
      '*Приоритеты задач:*',
      '🔴 Высокий - Срочные и важные задачи',
      '🟡 Средний - Обычные задачи',
      '🟢 Низкий - Задачи с низким приоритетом',
    ].join('\n'),
  };
}

// Creation dialogue

export function askText(): Reply {
  return { text: '📝 Введите описание задачи:\n(или /cancel для отмены)' };
}

export function blankText(): Reply {
  return { text: '❌ Описание задачи не может быть пустым.\n📝 Введите описание задачи:\n(или /cancel для отмены)' };
}

export function askPriority(): Reply {
  return {
    text: '🎯 Выберите приоритет задачи:',
    options: PRIORITIES.map((p) => [p]),
  };
}

export function invalidPriority(): Reply {
  return {
    text: '❌ Пожалуйста, выберите приоритет из списка',
    options: PRIORITIES.map((p) => [p]),
  };
}

export function askReminder(): Reply {
  const labels = REMINDER_OFFSETS.map((o) => o.label);
  return {
    text: '⏰ Когда напомнить о задаче?',
    options: [labels.slice(0, 2), labels.slice(2, 4), [NO_REMINDER]],
  };
}

export function taskCreated(task: Task): Reply {
  const lines = [
    '✅ Задача создана!',
    '',
    `📝 ${task.text}`,
    `🎯 Приоритет: ${task.priority}`,
    `📅 Создана: ${task.createdAt}`,
  ];
  if (task.reminder) lines.push(`⏰ Напоминание: ${task.reminder}`);
  return { text: lines.join('\n'), removeOptions: true };
}

export function dialogueOpen(): Reply {
  return { text: '✋ Сначала закончите создание задачи или отмените его командой /cancel' };
}

export function cancelled(): Reply {
  return { text: '❌ Действие отменено.', removeOptions: true };
}

// List view

export function taskList(buckets: PriorityBuckets, completed: readonly Task[]): Reply {
  const active = PRIORITIES.reduce((n, p) => n + buckets[p].length, 0);
  if (active === 0) {
    return { text: '📭 У вас пока нет активных задач.\nИспользуйте /add чтобы добавить новую задачу!' };
  }

  let text = '📋 *Ваши задачи:*\n\n';
  for (const priority of PRIORITIES) {
    const tasks = buckets[priority];
    if (!tasks.length) continue;
    text += `*${priority}*\n`;
    for (const task of tasks) {
      text += `${statusGlyph(task)} #${task.id}: ${escapeMarkdown(task.text)}\n`;
      if (task.reminder) text += `   ⏰ Напоминание: ${task.reminder}\n`;
    }
    text += '\n';
  }

  if (completed.length) {
    text += '*✅ Выполненные:*\n';
    for (const task of completed.slice(-COMPLETED_SHOWN)) {
      text += `✅ #${task.id}: ${escapeMarkdown(task.text)}\n`;
    }
  }

  return { text: text.trimEnd(), format: 'markdown' };
}

// Numbered actions

export function noTasksToComplete(): Reply {
  return { text: '📭 У вас нет активных задач для завершения.' };
}

export function noTasksToDelete(): Reply {
  return { text: '📭 У вас нет задач для удаления.' };
}

export function completionChoices(active: readonly Task[]): Reply[] {
  const lines = active.map((t) => `#${t.id}: ${t.text} (${t.priority})`);
  return [{ text: ['Выберите номер задачи для завершения:', '', ...lines].join('\n') }, { text: NUMBER_HINT }];
}

export function deletionChoices(all: readonly Task[]): Reply[] {
  const lines = all.map((t) => `${statusGlyph(t)} #${t.id}: ${t.text} (${t.priority})`);
  return [{ text: ['Выберите номер задачи для удаления:', '', ...lines].join('\n') }, { text: NUMBER_HINT }];
}

export function invalidNumber(): Reply {
  return { text: '❌ Пожалуйста, введите корректный номер задачи.' };
}

export function completed(id: number): Reply {
  return { text: `✅ Задача #${id} отмечена как выполненная!` };
}

export function deleted(id: number): Reply {
  return { text: `🗑 Задача #${id} удалена!` };
}

export function notFound(id: number | bigint): Reply {
  return { text: `❌ Задача #${id} не найдена.` };
}

// Fallbacks

export function idleHint(): Reply {
  return { text: '🤔 Не понимаю сообщение. Используйте /add чтобы добавить задачу или /help для справки.' };
}

export function unknownCommand(command: string): Reply {
  return { text: `❓ Неизвестная команда /${command}. Список команд: /help` };
}

export function apology(): Reply {
  return {
    text: '😔 Произошла ошибка при обработке запроса. Пожалуйста, попробуйте еще раз или обратитесь к /help',
  };
}
