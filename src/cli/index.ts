#!/usr/bin/env node
/**
 * tasklane CLI entry point.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { registerBackupCommand } from './commands/backup.js';
import { registerCheckCommand } from './commands/check.js';
import { registerCompleteCommand } from './commands/complete.js';
import { registerConfigCommand } from './commands/config.js';
import { registerDeferCommand } from './commands/defer.js';
import { registerDepsCommand } from './commands/deps.js';
import { registerEnhanceCommand } from './commands/enhance.js';
import { registerHistoryCommand } from './commands/history.js';
import { registerInitCommand } from './commands/init.js';
import {
  registerMilestoneCommand,
  registerRemediateCommand,
  registerValidateMilestoneCommand,
} from './commands/milestone.js';
import { registerNextCommand } from './commands/next.js';
import { registerScopeCommand } from './commands/scope.js';
import { registerShowCommand } from './commands/show.js';
import { registerStartCommand } from './commands/start.js';
import { registerStatusCommand } from './commands/status.js';

// Output format resolution
import { resolveFormat } from './middleware/output-format.js';
import { setFormatContext, setProjectRoot } from './format-context.js';
import { cliOutput, renderGeneric } from './renderers/index.js';
import { engineErrorFrom } from '../dispatch/engines/_error.js';

// Centralized pino logger
import { closeLogger, initLogger } from '../core/logger.js';
import { loadConfig } from '../core/config.js';
import { getStateDir } from '../core/paths.js';

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  // dist/cli/index.js and src/cli/index.ts both sit two levels below the root.
  const moduleRoot = join(dirname(fileURLToPath(import.meta.url)), '..', '..');
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(moduleRoot, 'package.json'), 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

interface GlobalOptions {
  json?: boolean;
  human?: boolean;
  quiet?: boolean;
  cwd?: string;
}

const CLI_VERSION = getPackageVersion();
const program = new Command();

program
  .name('tasklane')
  .description('Milestone-gated task orchestration for agent-driven sprints')
  .version(CLI_VERSION)
  .option('--json', 'Output in JSON format (default)')
  .option('--human', 'Output in human-readable format')
  .option('--quiet', 'Suppress non-essential output for scripting')
  .option('--cwd <dir>', 'Project directory (default: current directory)');

registerStatusCommand(program);
registerNextCommand(program);
registerShowCommand(program);
registerDepsCommand(program);
registerScopeCommand(program);
registerStartCommand(program);
registerCompleteCommand(program);
registerMilestoneCommand(program);
registerValidateMilestoneCommand(program);
registerRemediateCommand(program);
registerEnhanceCommand(program);
registerDeferCommand(program);
registerInitCommand(program);
registerCheckCommand(program);
registerBackupCommand(program);
registerHistoryCommand(program);
registerConfigCommand(program);

// Resolve the project root, format and logger once, before any command runs.
program.hook('preAction', async (_thisCommand, actionCommand) => {
  const opts = program.opts<GlobalOptions>();
  const root = resolve(opts.cwd ?? process.cwd());
  setProjectRoot(root);

  const config = await loadConfig(root);
  setFormatContext(resolveFormat(opts, config.output.defaultFormat));

  // Logs live in the state directory; do not create it for a project that has none.
  const stateDir = getStateDir(root);
  if (actionCommand.name() === 'init' || existsSync(stateDir)) {
    initLogger(stateDir, config.logging);
  }
});

program.hook('postAction', () => {
  closeLogger();
});

program.parseAsync(process.argv).catch((err: unknown) => {
  // Failures outside an engine (bad config, conflicting flags) still get an envelope.
  cliOutput(engineErrorFrom(err), { operation: 'cli', render: renderGeneric });
});
