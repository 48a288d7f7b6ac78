/**
 * CLI check command - full integrity check of the state directory.
 */

import { Command } from 'commander';
import { sprintCheck, type IntegrityReport } from '../../dispatch/engines/sprint-engine.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderCheck } from '../renderers/sprint.js';

export function checkExitCode(report: IntegrityReport): ExitCode {
  if (report.issues.length > 0) return ExitCode.VALIDATION_ERROR;
  if (report.cycle) return ExitCode.CIRCULAR_REFERENCE;
  return ExitCode.SUCCESS;
}

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Validate state files: schema, references, milestone consistency and cycles')
    .action(async () => {
      cliOutput(await sprintCheck(getProjectRoot()), {
        operation: 'sprint.check',
        render: renderCheck,
        exitCodeFor: checkExitCode,
      });
    });
}
