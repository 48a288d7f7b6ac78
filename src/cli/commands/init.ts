/**
 * CLI init command - create the state directory from a plan file.
 */

import { Command } from 'commander';
import { sprintInit } from '../../dispatch/engines/sprint-engine.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderInit } from '../renderers/sprint.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialise the sprint from a planner\'s plan file')
    .requiredOption('--plan <file>', 'Plan JSON ({ sprintId, milestones: [{ id, title, tasks }] })')
    .option('--force', 'Replace existing state (a backup is taken first)')
    .action(async (opts: { plan: string; force?: boolean }) => {
      cliOutput(await sprintInit(getProjectRoot(), opts.plan, { force: opts.force === true }), {
        operation: 'sprint.init',
        render: renderInit,
      });
    });
}
