/**
 * CLI next command - the next task the milestone gate allows.
 */

import { Command } from 'commander';
import type { NextTaskResult } from '../../core/tasks/resolver.js';
import { sprintNext } from '../../dispatch/engines/sprint-engine.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderNext } from '../renderers/sprint.js';

/** Blocked results exit non-zero; a finished sprint does not. */
export function nextExitCode(result: NextTaskResult): ExitCode {
  if (result.kind !== 'blocked') return ExitCode.SUCCESS;
  return result.reason === 'validation_pending' ? ExitCode.VALIDATION_PENDING : ExitCode.MILESTONE_BLOCKED;
}

export function registerNextCommand(program: Command): void {
  program
    .command('next [taskId]')
    .description('Get the next eligible task, or check that a specific task may be started')
    .action(async (taskId: string | undefined) => {
      cliOutput(await sprintNext(getProjectRoot(), taskId), {
        operation: 'tasks.next',
        render: renderNext,
        exitCodeFor: nextExitCode,
      });
    });
}
