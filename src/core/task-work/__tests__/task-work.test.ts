/**
 * Tests for starting and completing tasks.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { applyComplete, applyStart, completeTask, startTask } from '../index.js';
import { ExitCode } from '../../../types/exit-codes.js';
import {
  createTempProject,
  initStore,
  makeState,
  milestoneOf,
  taskOf,
  twoMilestoneSprint,
  type TempProject,
} from '../../../../tests/helpers/sprint-fixtures.js';

const TS = '2026-01-05T10:00:00.000Z';

describe('applyStart', () => {
  it('marks the task and its milestone in progress', () => {
    const state = makeState(twoMilestoneSprint());
    const result = applyStart(state, 'A', TS);

    expect(result).toEqual({ taskId: 'A', taskTitle: 'Task A', milestoneId: 'M1', milestoneStatus: 'in_progress' });
    expect(taskOf(state, 'A')).toMatchObject({ status: 'in_progress', startedAt: TS });
    expect(state.progress.status).toBe('active');
    expect(state.progress.history.map((h) => h.action)).toEqual([
      'sprint_initialized',
      'milestone_started',
      'task_started',
    ]);
  });

  it('refuses a task with unmet dependencies', () => {
    const state = makeState(twoMilestoneSprint());
    expect(() => applyStart(state, 'F', TS)).toThrow('Task F has unmet dependencies: E (pending)');
    expect(taskOf(state, 'F').status).toBe('pending');
  });

  it('refuses a task that is not pending', () => {
    const state = makeState(twoMilestoneSprint());
    applyStart(state, 'A', TS);
    expect(() => applyStart(state, 'A', TS)).toThrow(
      expect.objectContaining({ code: ExitCode.TASK_NOT_PENDING, message: 'Task A is in_progress, not pending' }),
    );
  });

  it('refuses the validation task', () => {
    const state = makeState(twoMilestoneSprint());
    expect(() => applyStart(state, 'T001', TS)).toThrow(
      expect.objectContaining({ code: ExitCode.DEPENDENCY_ERROR }),
    );
  });
});

describe('applyComplete', () => {
  it('reports the tasks it unblocks', () => {
    const state = makeState([{ id: 'M1', tasks: [{ id: 'A' }, { id: 'B', dependencies: ['A'] }, { id: 'C' }] }]);
    applyStart(state, 'A', TS);
    const result = applyComplete(state, 'A', TS);

    expect(result).toEqual({
      taskId: 'A',
      milestoneId: 'M1',
      milestoneStatus: 'in_progress',
      validationPending: false,
      unblocked: ['B'],
    });
    expect(taskOf(state, 'A').completedAt).toBe(TS);
    expect(state.progress.counters).toEqual({ completed: 1, total: 4 });
  });

  it('closes the gate when the last work task of the current milestone completes', () => {
    const state = makeState([{ id: 'M1', tasks: [{ id: 'A' }] }, { id: 'M2', tasks: [{ id: 'B' }] }]);
    applyStart(state, 'A', TS);
    const result = applyComplete(state, 'A', TS);

    expect(result).toMatchObject({ milestoneStatus: 'complete', validationPending: true, unblocked: ['T001'] });
    expect(milestoneOf(state, 'M1').status).toBe('complete');
    expect(state.progress.status).toBe('awaiting_validation');
  });

  it('requires the task to be started first', () => {
    const state = makeState(twoMilestoneSprint());
    expect(() => applyComplete(state, 'A', TS)).toThrow(
      expect.objectContaining({ code: ExitCode.LIFECYCLE_TRANSITION_INVALID }),
    );
  });

  it('rejects completing a task twice', () => {
    const state = makeState(twoMilestoneSprint());
    applyStart(state, 'A', TS);
    applyComplete(state, 'A', TS);
    expect(() => applyComplete(state, 'A', TS)).toThrow('Task A is already completed');
  });

  it('does not complete a validation task directly', () => {
    const state = makeState(twoMilestoneSprint());
    expect(() => applyComplete(state, 'T001', TS)).toThrow(
      'Task T001 is a validation task; record the validation outcome instead',
    );
  });
});

describe('startTask / completeTask', () => {
  let project: TempProject;

  beforeEach(async () => {
    project = await createTempProject();
  });

  afterEach(async () => {
    await project.cleanup();
  });

  it('persists a start and a completion', async () => {
    const store = await initStore(project, makeState(twoMilestoneSprint()));
    await startTask(store, 'A');
    const result = await completeTask(store, 'A', { changes: { files: ['src/a.ts'] } });

    expect(result.unblocked).toEqual([]);
    const state = await store.load();
    expect(taskOf(state, 'A').status).toBe('completed');
    expect(state.progress.counters).toEqual({ completed: 1, total: 8 });
  });

  it('leaves the task in progress when the changes break its scope', async () => {
    const store = await initStore(project, makeState([
      { id: 'M1', tasks: [{ id: 'A', maxFileChanges: 1 }, { id: 'B' }] },
    ]));
    await startTask(store, 'A');

    await expect(completeTask(store, 'A', { changes: { files: ['x.ts', 'y.ts'] } })).rejects.toMatchObject({
      code: ExitCode.SCOPE_VIOLATION,
      taskId: 'A',
    });
    expect(taskOf(await store.load(), 'A').status).toBe('in_progress');
  });

  it('requires a task id', async () => {
    const store = await initStore(project, makeState(twoMilestoneSprint()));
    await expect(startTask(store, '')).rejects.toMatchObject({ code: ExitCode.INVALID_INPUT });
  });
});
