/**
 * CLI config command - show resolved configuration.
 */

import { Command } from 'commander';
import { configGet, configList } from '../../dispatch/engines/sprint-engine.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput, renderGeneric } from '../renderers/index.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Show configuration values and where they come from');

  config
    .command('get <key>')
    .description('Get a value by dot-notation key, with its source (env, project, global, default)')
    .action(async (key: string) => {
      cliOutput(await configGet(getProjectRoot(), key), {
        operation: 'config.get',
        render: (data, quiet) => (quiet ? String(data.value) : `${data.key} = ${JSON.stringify(data.value)} (${data.source})`),
      });
    });

  config
    .command('list')
    .description('Show the fully resolved configuration')
    .action(async () => {
      cliOutput(await configList(getProjectRoot()), { operation: 'config.list', render: renderGeneric });
    });
}
