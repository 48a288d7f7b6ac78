/**
 * CLI enhance command - place a mid-sprint feature into the milestone sequence.
 */

import { isAbsolute, join } from 'node:path';
import { Command } from 'commander';
import type { EnhancementResult, FeatureTaskInput } from '../../core/enhancement/index.js';
import { readFeatureTasksFile, sprintEnhance } from '../../dispatch/engines/sprint-engine.js';
import { engineErrorFrom } from '../../dispatch/engines/_error.js';
import { collect, collectList } from '../options.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderEnhance } from '../renderers/sprint.js';

interface EnhanceOptions {
  task: string[];
  tasksFile?: string;
  depends: string[];
  dependents: string[];
  dryRun?: boolean;
}

export function registerEnhanceCommand(program: Command): void {
  program
    .command('enhance <description>')
    .description('Insert a feature into the earliest milestone that fits, or new milestones')
    .option('--task <title>', 'Feature task title, in order (repeatable)', collect, [])
    .option('--tasks-file <file>', 'JSON array of feature tasks ({ title, dependencies?, scope?, technologies? })')
    .option('--depends <ids>', 'Existing tasks the feature depends on (repeatable or comma-separated)', collectList, [])
    .option('--dependents <ids>', 'Existing pending tasks that must wait for the feature', collectList, [])
    .option('--dry-run', 'Show the placement without writing')
    .action(async (description: string, opts: EnhanceOptions) => {
      const root = getProjectRoot();
      const operation = 'sprint.enhance';
      let tasks: FeatureTaskInput[] = opts.task.map((title) => ({ title }));
      if (opts.tasksFile) {
        try {
          const file = isAbsolute(opts.tasksFile) ? opts.tasksFile : join(root, opts.tasksFile);
          tasks = [...tasks, ...(await readFeatureTasksFile(file))];
        } catch (err) {
          cliOutput(engineErrorFrom<EnhancementResult>(err), { operation, render: renderEnhance });
          return;
        }
      }
      const result = await sprintEnhance(
        root,
        { description, tasks, dependsOn: opts.depends, dependents: opts.dependents },
        { dryRun: opts.dryRun === true },
      );
      cliOutput(result, { operation, render: renderEnhance });
    });
}
