/**
 * CLI milestone commands: status, validate-milestone, remediate.
 */

import { Command } from 'commander';
import type { MilestoneStatusReport } from '../../core/milestones/index.js';
import { milestoneRemediate, milestoneShow, milestoneValidate } from '../../dispatch/engines/sprint-engine.js';
import { engineError } from '../../dispatch/engines/_error.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { ValidationRecord } from '../../types/task.js';
import { collect, collectList } from '../options.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderMilestone, renderRemediation, renderValidation } from '../renderers/sprint.js';

export function milestoneExitCode(report: Pick<MilestoneStatusReport, 'gateHolding'>): ExitCode {
  return report.gateHolding ? ExitCode.VALIDATION_PENDING : ExitCode.SUCCESS;
}

export function registerMilestoneCommand(program: Command): void {
  program
    .command('milestone <milestoneId>')
    .description('Show a milestone with its tasks, capacity and gate state')
    .action(async (milestoneId: string) => {
      cliOutput(await milestoneShow(getProjectRoot(), milestoneId), {
        operation: 'milestones.show',
        render: renderMilestone,
        exitCodeFor: milestoneExitCode,
      });
    });
}

export function registerValidateMilestoneCommand(program: Command): void {
  program
    .command('validate-milestone <milestoneId>')
    .description('Record the outcome of a completed milestone\'s validation')
    .option('--passed', 'Validation passed: open the next milestone')
    .option('--failed', 'Validation failed: reopen the milestone for remediation')
    .option('--issue <text>', 'Issue found by the validation (repeatable)', collect, [])
    .action(async (milestoneId: string, opts: { passed?: boolean; failed?: boolean; issue: string[] }) => {
      const operation = 'milestones.validate';
      if (opts.passed === opts.failed) {
        cliOutput(
          engineError<{ record: ValidationRecord; currentMilestoneId: string | null }>(ExitCode.INVALID_INPUT, 'Pass exactly one of --passed or --failed'),
          { operation, render: renderValidation },
        );
        return;
      }
      const outcome = opts.passed ? 'passed' : 'failed';
      cliOutput(await milestoneValidate(getProjectRoot(), milestoneId, outcome, opts.issue), {
        operation,
        render: renderValidation,
      });
    });
}

export function registerRemediateCommand(program: Command): void {
  program
    .command('remediate <milestoneId> <title>')
    .description('Add a remediation task to a milestone reopened by a failed validation')
    .option('--depends <ids>', 'Task ids the remediation depends on (repeatable or comma-separated)', collectList, [])
    .action(async (milestoneId: string, title: string, opts: { depends: string[] }) => {
      cliOutput(await milestoneRemediate(getProjectRoot(), milestoneId, { title, dependencies: opts.depends }), {
        operation: 'milestones.remediate',
        render: renderRemediation,
      });
    });
}
