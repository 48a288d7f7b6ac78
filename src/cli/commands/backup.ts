/**
 * CLI backup command - list, create and restore state snapshots.
 */

import { Command } from 'commander';
import { backupCreate, backupList, backupRestore } from '../../dispatch/engines/sprint-engine.js';
import { getProjectRoot } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { renderBackup, renderBackups, renderRestore } from '../renderers/sprint.js';

export function registerBackupCommand(program: Command): void {
  const backup = program
    .command('backup')
    .description('Manage state snapshots');

  backup
    .command('list')
    .description('List snapshots, newest first')
    .action(async () => {
      cliOutput(await backupList(getProjectRoot()), { operation: 'backup.list', render: renderBackups });
    });

  backup
    .command('create')
    .description('Take a snapshot of the state files')
    .action(async () => {
      cliOutput(await backupCreate(getProjectRoot()), { operation: 'backup.create', render: renderBackup });
    });

  backup
    .command('restore <backupId>')
    .description('Restore a snapshot (the current state is snapshotted first)')
    .action(async (backupId: string) => {
      cliOutput(await backupRestore(getProjectRoot(), backupId), { operation: 'backup.restore', render: renderRestore });
    });
}
