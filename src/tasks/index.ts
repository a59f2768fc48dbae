import { TaskRegistry } from '../core/registry.js';
import { CommandTask } from './command.js';
import { echoTask } from './echo.js';

export { CommandTask, execaRunner, truncate, type CommandRunner, type CommandResult } from './command.js';
export { echoTask } from './echo.js';

export function createDefaultRegistry(): TaskRegistry {
  return new TaskRegistry().register('command', new CommandTask()).register('echo', echoTask);
}
