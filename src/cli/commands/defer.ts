/**
 * CLI defer / deferred commands.
 */

import { Command } from 'commander';
import { featureDefer, featureDeferredList } from '../../dispatch/engines/sprint-engine.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderDefer, renderDeferred } from '../renderers/sprint.js';

export function registerDeferCommand(program: Command): void {
  program
    .command('defer <description>')
    .description('Record a feature for a later sprint instead of placing it now')
    .option('--reason <text>', 'Why the feature is deferred', '')
    .action(async (description: string, opts: { reason: string }) => {
      cliOutput(await featureDefer(getProjectRoot(), description, opts.reason), {
        operation: 'features.defer',
        render: renderDefer,
      });
    });

  program
    .command('deferred')
    .description('List deferred features')
    .action(async () => {
      cliOutput(await featureDeferredList(getProjectRoot()), {
        operation: 'features.deferred',
        render: renderDeferred,
      });
    });
}
