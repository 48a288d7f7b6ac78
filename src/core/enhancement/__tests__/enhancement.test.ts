/**
 * Tests for applying and deferring enhancements.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { applyDefer, applyEnhancement, applyEnhancementToStore } from '../index.js';
import { checkStateIntegrity } from '../../validation/integrity.js';
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

const TS = '2026-01-05T11:00:00.000Z';

describe('applyEnhancement', () => {
  it('fits a small feature into an open milestone', () => {
    const state = makeState(twoMilestoneSprint());
    const result = applyEnhancement(state, { description: 'Dark mode', tasks: [{ title: 'Theme tokens' }] }, TS);

    expect(result).toMatchObject({
      featureId: 'F1',
      tasks: [{ id: 'T003', title: 'Theme tokens', milestoneId: 'M2' }],
      createdMilestones: [],
      dryRun: false,
    });
    expect(milestoneOf(state, 'M2').taskIds).toEqual(['E', 'F', 'T003', 'T002']);
    expect(taskOf(state, 'T002').dependencies).toEqual(['E', 'F', 'T003']);
    expect(taskOf(state, 'T003').enhancement).toEqual({ featureId: 'F1', description: 'Dark mode', addedAt: TS });
    expect(state.progress.counters).toEqual({ completed: 0, total: 9 });
    expect(checkStateIntegrity(state)).toEqual([]);
  });

  it('opens a new milestone when S + N exceeds the maximum', () => {
    const state = makeState(twoMilestoneSprint());
    const result = applyEnhancement(state, {
      description: 'Search',
      tasks: [{ title: 'Index' }, { title: 'Query', dependencies: ['@1'] }, { title: 'UI', dependencies: ['@2'] }],
    }, TS);

    expect(result.createdMilestones).toEqual(['M3']);
    expect(state.graph.milestones.map((m) => m.id)).toEqual(['M1', 'M3', 'M2']);
    expect(milestoneOf(state, 'M3')).toEqual({
      id: 'M3',
      title: 'Search',
      taskIds: ['T003', 'T004', 'T005', 'T006'],
      status: 'not_started',
    });
    expect(taskOf(state, 'T004').dependencies).toEqual(['T003']);
    expect(taskOf(state, 'T005').dependencies).toEqual(['T004']);
    expect(taskOf(state, 'T006')).toMatchObject({
      title: 'Validate Search',
      type: 'validation',
      dependencies: ['T003', 'T004', 'T005'],
    });
    expect(checkStateIntegrity(state)).toEqual([]);
  });

  it('splits a large feature across several milestones', () => {
    const state = makeState(twoMilestoneSprint());
    const tasks = ['a', 'b', 'c', 'd', 'e', 'f'].map((title) => ({ title }));
    const result = applyEnhancement(state, { description: 'Reports', tasks }, TS);

    expect(result.placement).toMatchObject({ kind: 'new_milestones', chunks: [4, 2] });
    expect(result.createdMilestones).toEqual(['M3', 'M4']);
    expect(state.graph.milestones.map((m) => `${m.id}:${m.title}`)).toEqual([
      'M1:Milestone M1',
      'M3:Reports (part 1/2)',
      'M4:Reports (part 2/2)',
      'M2:Milestone M2',
    ]);
    expect(milestoneOf(state, 'M3').taskIds).toEqual(['T003', 'T004', 'T005', 'T006', 'T009']);
    expect(milestoneOf(state, 'M4').taskIds).toEqual(['T007', 'T008', 'T010']);
    expect(checkStateIntegrity(state)).toEqual([]);
  });

  it('wires dependents to every feature task', () => {
    const state = makeState(twoMilestoneSprint());
    applyEnhancement(state, { description: 'Audit log', tasks: [{ title: 'Log writes' }], dependents: ['F'] }, TS);

    expect(milestoneOf(state, 'M2').taskIds).toEqual(['E', 'T003', 'F', 'T002']);
    expect(taskOf(state, 'F').dependencies).toEqual(['E', 'T003']);
  });

  it('applies feature-wide dependencies to each task', () => {
    const state = makeState(twoMilestoneSprint());
    applyEnhancement(state, { description: 'Export', tasks: [{ title: 'CSV' }], dependsOn: ['E'] }, TS);
    expect(taskOf(state, 'T003')).toMatchObject({ milestoneId: 'M2', dependencies: ['E'] });
  });

  it('rejects a dependent that is not pending work', () => {
    const state = makeState(twoMilestoneSprint());
    expect(() => applyEnhancement(state, { description: 'X', tasks: [{ title: 'x' }], dependents: ['T001'] }, TS))
      .toThrow('Task T001 cannot become a dependent of the feature: it is a pending validation task');
  });

  it('rejects forward local references', () => {
    const state = makeState(twoMilestoneSprint());
    const err = (() => {
      try {
        applyEnhancement(state, { description: 'X', tasks: [{ title: 'first', dependencies: ['@2'] }, { title: 'second' }] }, TS);
        return null;
      } catch (e) {
        return e;
      }
    })();
    expect(err).toMatchObject({
      code: ExitCode.INVALID_INPUT,
      message: 'Feature task 1 (first) may only reference earlier feature tasks, not @2',
    });
  });

  it('numbers features after the ones already placed', () => {
    const state = makeState(twoMilestoneSprint());
    applyEnhancement(state, { description: 'One', tasks: [{ title: 'a' }] }, TS);
    expect(applyEnhancement(state, { description: 'Two', tasks: [{ title: 'b' }] }, TS).featureId).toBe('F2');
  });
});

describe('applyDefer', () => {
  it('records deferred features with sequential ids', () => {
    const state = makeState(twoMilestoneSprint());
    expect(applyDefer(state, 'SSO', 'out of budget', TS)).toEqual({
      id: 'D1',
      description: 'SSO',
      reason: 'out of budget',
      deferredAt: TS,
    });
    expect(applyDefer(state, 'Billing', '', TS).id).toBe('D2');
    expect(state.progress.history[state.progress.history.length - 1]).toEqual({
      timestamp: TS,
      action: 'feature_deferred',
      details: { featureId: 'D2', description: 'Billing' },
    });
  });

  it('requires a description', () => {
    expect(() => applyDefer(makeState(twoMilestoneSprint()), '  ', 'r', TS)).toThrow(
      'Deferred feature description is required',
    );
  });
});

describe('applyEnhancementToStore', () => {
  let project: TempProject;

  beforeEach(async () => {
    project = await createTempProject();
  });

  afterEach(async () => {
    await project.cleanup();
  });

  it('writes nothing on a dry run', async () => {
    const store = await initStore(project, makeState(twoMilestoneSprint()));
    const before = await readFile(join(project.stateDir, 'task-graph.json'), 'utf8');

    const result = await applyEnhancementToStore(store, { description: 'Search', tasks: [{ title: 'Index' }] }, { dryRun: true });

    expect(result.dryRun).toBe(true);
    expect(result.tasks).toEqual([{ id: 'T003', title: 'Index', milestoneId: 'M2' }]);
    expect(await readFile(join(project.stateDir, 'task-graph.json'), 'utf8')).toBe(before);
  });

  it('commits the feature in one transaction', async () => {
    const store = await initStore(project, makeState(twoMilestoneSprint()));
    await applyEnhancementToStore(store, { description: 'Search', tasks: [{ title: 'Index' }] });
    expect((await store.load()).graph.tasks.map((t) => t.id)).toContain('T003');
  });

  it('leaves the state untouched when placement fails', async () => {
    const store = await initStore(project, makeState(twoMilestoneSprint()));
    const before = await readFile(join(project.stateDir, 'task-graph.json'), 'utf8');

    await expect(applyEnhancementToStore(store, {
      description: 'Bad',
      tasks: [{ title: 'x' }],
      dependsOn: ['E'],
      dependents: ['A'],
    })).rejects.toMatchObject({ code: ExitCode.PLACEMENT_FAILED });
    expect(await readFile(join(project.stateDir, 'task-graph.json'), 'utf8')).toBe(before);
  });
});
