/**
 * CLI history command - sprint history, newest first.
 */

import { Command } from 'commander';
import { sprintHistory } from '../../dispatch/engines/sprint-engine.js';
import { parsePositiveInt } from '../options.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderHistory } from '../renderers/sprint.js';

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('Show sprint history and validation records')
    .option('-n, --limit <n>', 'Show at most n entries', parsePositiveInt)
    .action(async (opts: { limit?: number }) => {
      cliOutput(await sprintHistory(getProjectRoot(), opts.limit), { operation: 'sprint.history', render: renderHistory });
    });
}
