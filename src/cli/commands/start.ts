/**
 * CLI start command - begin work on a task.
 */

import { Command } from 'commander';
import { taskStart } from '../../dispatch/engines/sprint-engine.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderStart } from '../renderers/sprint.js';

export function registerStartCommand(program: Command): void {
  program
    .command('start <taskId>')
    .description('Start working on a task (dependencies and the milestone gate are checked)')
    .action(async (taskId: string) => {
      cliOutput(await taskStart(getProjectRoot(), taskId), { operation: 'tasks.start', render: renderStart });
    });
}
