/**
 * CLI show command.
 */

import { Command } from 'commander';
import { taskShow } from '../../dispatch/engines/sprint-engine.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderTask } from '../renderers/sprint.js';

export function registerShowCommand(program: Command): void {
  program
    .command('show <taskId>')
    .description('Show full task details by ID')
    .action(async (taskId: string) => {
      cliOutput(await taskShow(getProjectRoot(), taskId), { operation: 'tasks.show', render: renderTask });
    });
}
