/**
 * CLI deps command - dependency status of one task.
 */

import { Command } from 'commander';
import { taskDeps } from '../../dispatch/engines/sprint-engine.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderDeps } from '../renderers/sprint.js';

export function registerDepsCommand(program: Command): void {
  program
    .command('deps <taskId>')
    .description('Show dependencies, blockers and dependents of a task')
    .action(async (taskId: string) => {
      cliOutput(await taskDeps(getProjectRoot(), taskId), { operation: 'tasks.deps', render: renderDeps });
    });
}
