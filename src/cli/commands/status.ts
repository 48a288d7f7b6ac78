/**
 * CLI status command - sprint overview.
 */

import { Command } from 'commander';
import type { SprintStatusReport } from '../../core/sprint/status.js';
import { sprintStatus } from '../../dispatch/engines/sprint-engine.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderStatus } from '../renderers/sprint.js';

/** A sprint held at the validation gate exits non-zero. */
export function statusExitCode(report: Pick<SprintStatusReport, 'validationPending'>): ExitCode {
  return report.validationPending ? ExitCode.VALIDATION_PENDING : ExitCode.SUCCESS;
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show sprint status, milestones and the next task')
    .action(async () => {
      cliOutput(await sprintStatus(getProjectRoot()), {
        operation: 'sprint.status',
        render: renderStatus,
        exitCodeFor: statusExitCode,
      });
    });
}
