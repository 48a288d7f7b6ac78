/**
 * CLI complete command.
 */

import { Command } from 'commander';
import { taskComplete } from '../../dispatch/engines/sprint-engine.js';
import { collect, collectList } from '../options.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderComplete } from '../renderers/sprint.js';

export function registerCompleteCommand(program: Command): void {
  program
    .command('complete <taskId>')
    .description('Mark an in-progress task completed; with --files the scope post-check runs first')
    .option('--files <paths>', 'Files changed by the task (repeatable or comma-separated)', collectList, [])
    .option('--dependency <name@version>', 'Dependency added or changed (repeatable)', collect, [])
    .option('--read-contents', 'Read changed files to check content guardrails')
    .action(async (taskId: string, opts: { files: string[]; dependency: string[]; readContents?: boolean }) => {
      const result = await taskComplete(getProjectRoot(), taskId, {
        files: opts.files,
        dependencies: opts.dependency,
        readContents: opts.readContents === true,
      });
      cliOutput(result, { operation: 'tasks.complete', render: renderComplete });
    });
}
