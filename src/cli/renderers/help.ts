/**
 * Command summary printed by `?`.
 */

const COMMANDS: ReadonlyArray<readonly [usage: string, summary: string]> = [
  ['a <task description>', 'Add a new task'],
  ['t', 'List all tasks'],
  ['x <task number>', 'Mark task as complete/incomplete'],
  ['d <task number>', 'Remove task'],
  ['h <task number>', 'Move task higher'],
  ['l <task number>', 'Move task lower'],
  ['r <task number> <new description>', 'Rename task'],
  ['?', 'Show this help message'],
  ['q', 'Quit the application'],
];

export function renderHelp(): string {
  return ['Available commands:', ...COMMANDS.map(([usage, summary]) => `  ${usage} - ${summary}`)].join('\n');
}
