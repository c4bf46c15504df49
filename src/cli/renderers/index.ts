export { checkbox, renderTaskLine, renderTaskList, renderRename } from './tasks.js';
export { renderHelp } from './help.js';
