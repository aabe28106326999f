import type { TaskName } from '../types/bids';

const TASK_KEYWORDS: Array<{ task: TaskName; pattern: RegExp }> = [
  { task: 'rest', pattern: /rest/ },
  { task: 'nback', pattern: /n[\s_-]?back/ },
  { task: 'faces', pattern: /faces|emotion/ },
];

export const DEFAULT_TASK_NAME: TaskName = 'rest';

/**
 * Task name from a protocol or examination name, or null when no keyword matches
 */
export function taskNameFromText(text: string): TaskName | null {
  const lower = text.toLowerCase();
  for (const { task, pattern } of TASK_KEYWORDS) {
    if (pattern.test(lower)) return task;
  }
  return null;
}
