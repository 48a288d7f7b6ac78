/**
 * CLI scope command - check a task's changes against its scope and the approved stack.
 */

import { Command } from 'commander';
import type { ScopeComplianceReport } from '../../core/scope/index.js';
import { scopeCheck } from '../../dispatch/engines/sprint-engine.js';
import { ExitCode } from '../../types/exit-codes.js';
import { collect, collectList } from '../options.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderScope } from '../renderers/sprint.js';

export function scopeExitCode(report: ScopeComplianceReport): ExitCode {
  if (report.changes && !report.changes.compliant) return ExitCode.SCOPE_VIOLATION;
  if (!report.tech.compliant) return ExitCode.TECH_NON_COMPLIANT;
  return ExitCode.SUCCESS;
}

export function registerScopeCommand(program: Command): void {
  program
    .command('scope <taskId>')
    .description('Check scope boundary and tech compliance for a task')
    .option('--files <paths>', 'Changed files (repeatable or comma-separated)', collectList, [])
    .option('--dependency <name@version>', 'Dependency added or changed (repeatable)', collect, [])
    .option('--tech <name@version>', 'Technology to check instead of the task\'s declared ones (repeatable)', collect, [])
    .option('--read-contents', 'Read changed files to check content guardrails')
    .action(async (taskId: string, opts: { files: string[]; dependency: string[]; tech: string[]; readContents?: boolean }) => {
      const result = await scopeCheck(getProjectRoot(), taskId, {
        files: opts.files,
        dependencies: opts.dependency,
        technologies: opts.tech,
        readContents: opts.readContents === true,
      });
      cliOutput(result, { operation: 'scope.check', render: renderScope, exitCodeFor: scopeExitCode });
    });
}
