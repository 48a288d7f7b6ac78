/**
 * Tests for sprint initialisation from a plan.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { buildInitialState, initSprint, parsePlan, readPlanFile } from '../init.js';
import { DEFAULTS } from '../../config.js';
import { SchemaError } from '../../errors.js';
import { ExitCode } from '../../../types/exit-codes.js';
import { TaskGraphStore } from '../../../store/task-graph-store.js';
import {
  FIXED_TIME,
  createTempProject,
  makePlan,
  twoMilestoneSprint,
  type TempProject,
} from '../../../../tests/helpers/sprint-fixtures.js';

describe('parsePlan', () => {
  it('fills in task defaults', () => {
    const plan = parsePlan({
      sprintId: 's1',
      milestones: [{ id: 'M1', title: 'Core', tasks: [{ id: 'T001', title: 'Scaffold' }] }],
    }, 'plan.json');
    expect(plan.milestones[0]?.tasks[0]).toEqual({ id: 'T001', title: 'Scaffold', type: 'work', dependencies: [] });
  });

  it('reports every schema issue with its path', () => {
    const err = (() => {
      try {
        parsePlan({ sprintId: 's1', milestones: [{ id: 'M1', title: '', tasks: [] }] }, 'plan.json');
        return null;
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(SchemaError);
    expect(err instanceof SchemaError && err.issues.map((i) => i.path)).toEqual(['milestones.0.title', 'milestones.0.tasks']);
  });

  it('rejects a milestone strategy whose minimum exceeds its maximum', () => {
    expect(() => parsePlan({
      sprintId: 's1',
      milestoneStrategy: { minTasks: 6, maxTasks: 5 },
      milestones: [{ id: 'M1', title: 'Core', tasks: [{ id: 'T001', title: 'Scaffold' }] }],
    }, 'plan.json')).toThrow(expect.objectContaining({
      issues: [{
        code: 'PLAN_SCHEMA',
        file: 'plan.json',
        path: 'milestoneStrategy',
        message: 'plan.json milestoneStrategy: minTasks must not exceed maxTasks',
      }],
    }));
  });
});

describe('buildInitialState', () => {
  it('appends a validation task to each milestone', () => {
    const { state, addedValidationTasks } = buildInitialState(makePlan(twoMilestoneSprint()), DEFAULTS, FIXED_TIME);

    expect(addedValidationTasks).toEqual(['T001', 'T002']);
    expect(state.graph.milestones.map((m) => m.taskIds)).toEqual([
      ['A', 'B', 'C', 'D', 'T001'],
      ['E', 'F', 'T002'],
    ]);
    expect(state.graph.tasks.find((t) => t.id === 'T002')).toEqual({
      id: 'T002',
      title: 'Validate Milestone M2',
      type: 'validation',
      status: 'pending',
      milestoneId: 'M2',
      dependencies: ['E', 'F'],
      scope: { mustImplement: [], mustNotImplement: [], maxFileChanges: 0 },
    });
    expect(state.progress).toEqual({
      sprintId: 'sprint-1',
      status: 'planned',
      currentMilestoneId: 'M1',
      validationPending: false,
      counters: { completed: 0, total: 8 },
      history: [{ timestamp: FIXED_TIME, action: 'sprint_initialized', details: { milestones: 2, tasks: 8 } }],
      validations: [],
    });
    expect(state.deferred).toEqual({ features: [] });
  });

  it('numbers validation tasks after the highest T id in the plan', () => {
    const plan = makePlan([{ id: 'M1', tasks: [{ id: 'T007' }, { id: 'T012' }] }]);
    const { addedValidationTasks } = buildInitialState(plan, DEFAULTS, FIXED_TIME);
    expect(addedValidationTasks).toEqual(['T013']);
  });

  it('keeps a validation task the plan already ends with', () => {
    const plan = parsePlan({
      sprintId: 's1',
      milestones: [{
        id: 'M1',
        title: 'Core',
        tasks: [
          { id: 'W1', title: 'Work' },
          { id: 'V1', title: 'Check', type: 'validation', dependencies: ['W1'] },
        ],
      }],
    }, 'plan.json');
    const { state, addedValidationTasks } = buildInitialState(plan, DEFAULTS, FIXED_TIME);
    expect(addedValidationTasks).toEqual([]);
    expect(state.graph.milestones[0]?.taskIds).toEqual(['W1', 'V1']);
  });

  it('refuses a milestone with only a validation task', () => {
    const plan = parsePlan({
      sprintId: 's1',
      milestones: [
        { id: 'M1', title: 'Core', tasks: [{ id: 'A', title: 'Work' }] },
        { id: 'M2', title: 'Check only', tasks: [{ id: 'V2', title: 'Check', type: 'validation' }] },
      ],
    }, 'plan.json');
    expect(() => buildInitialState(plan, DEFAULTS, FIXED_TIME)).toThrow(
      expect.objectContaining({
        code: ExitCode.INVALID_INPUT,
        message: 'Milestone M2 has no work tasks; a milestone needs work before it can be validated',
      }),
    );
  });

  it('refuses a milestone above its maximum, counting the validation task', () => {
    const plan = makePlan([{ id: 'M1', tasks: ['A', 'B', 'C', 'D', 'E'].map((id) => ({ id })) }]);
    expect(() => buildInitialState(plan, DEFAULTS, FIXED_TIME)).toThrow(
      'Milestone M1 has 6 tasks (validation task included), above its maximum of 5',
    );
  });

  it('takes plan-level strategy and scope settings', () => {
    const plan = parsePlan({
      sprintId: 's1',
      milestoneStrategy: { minTasks: 1, maxTasks: 8 },
      scopeEnforcement: { defaultMaxFileChanges: 2 },
      milestones: [{ id: 'M1', title: 'Core', tasks: [{ id: 'W1', title: 'Work' }] }],
    }, 'plan.json');
    const { state } = buildInitialState(plan, DEFAULTS, FIXED_TIME);
    expect(state.graph.milestoneStrategy).toEqual({ minTasks: 1, maxTasks: 8 });
    expect(state.graph.scopeEnforcement).toEqual({ defaultMaxFileChanges: 2, enforcePrereleaseBan: true });
    expect(state.graph.tasks[0]?.scope.maxFileChanges).toBe(2);
  });
});

describe('initSprint', () => {
  let project: TempProject;

  beforeEach(async () => {
    project = await createTempProject();
  });

  afterEach(async () => {
    await project.cleanup();
  });

  it('reads a plan file and writes the state', async () => {
    const planPath = join(project.root, 'plan.json');
    await writeFile(planPath, JSON.stringify({
      sprintId: 'launch',
      milestones: [{ id: 'M1', title: 'Core', tasks: [{ id: 'A', title: 'Scaffold' }] }],
    }));
    const store = new TaskGraphStore({ stateDir: project.stateDir });

    const result = await initSprint(store, await readPlanFile(planPath), DEFAULTS);

    expect(result).toEqual({
      sprintId: 'launch',
      milestones: 1,
      tasks: 2,
      addedValidationTasks: ['T001'],
      replacedBackupId: null,
    });
    expect((await store.load()).graph.sprintId).toBe('launch');
  });

  it('reports a missing plan file', async () => {
    const planPath = join(project.root, 'missing.json');
    await expect(readPlanFile(planPath)).rejects.toMatchObject({
      code: ExitCode.NOT_FOUND,
      message: `Plan file not found: ${planPath}`,
    });
  });
});
