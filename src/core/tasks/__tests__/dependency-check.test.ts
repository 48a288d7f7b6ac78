/**
 * Tests for dependency graph checks.
 */

import { describe, it, expect } from 'vitest';
import {
  cycleCheck,
  findCycle,
  getDependentIds,
  validateDependencyRefs,
} from '../dependency-check.js';
import { CycleDetectedError } from '../../errors.js';
import { makeState, taskOf } from '../../../../tests/helpers/sprint-fixtures.js';

function chainTasks() {
  const state = makeState([
    {
      id: 'M1',
      tasks: [
        { id: 'A' },
        { id: 'B', dependencies: ['A'] },
        { id: 'C', dependencies: ['B'] },
      ],
    },
  ]);
  return { state, tasks: state.graph.tasks };
}

describe('cycle detection', () => {
  it('finds nothing in an acyclic graph', () => {
    const { tasks } = chainTasks();
    expect(findCycle(tasks)).toEqual([]);
    expect(() => cycleCheck(tasks)).not.toThrow();
  });

  it('reports the cycle path', () => {
    const { state, tasks } = chainTasks();
    taskOf(state, 'A').dependencies = ['C'];
    expect(findCycle(tasks)).toEqual(['A', 'C', 'B', 'A']);
    expect(() => cycleCheck(tasks)).toThrow('Dependency cycle detected: A -> C -> B -> A');
  });

  it('reports a self-dependency as a two-element cycle', () => {
    const { state, tasks } = chainTasks();
    taskOf(state, 'A').dependencies = ['A'];
    expect(() => cycleCheck(tasks)).toThrow(CycleDetectedError);
    expect(findCycle(tasks)).toEqual(['A', 'A']);
  });
});

describe('validateDependencyRefs', () => {
  it('reports missing and duplicate references', () => {
    const { state, tasks } = chainTasks();
    taskOf(state, 'A').dependencies = ['X', 'X'];
    expect(validateDependencyRefs(tasks).map((e) => e.code)).toEqual([
      'E_DEP_NOT_FOUND',
      'E_DEP_DUPLICATE',
      'E_DEP_NOT_FOUND',
    ]);
  });
});

describe('getDependentIds', () => {
  it('lists direct dependents', () => {
    expect(getDependentIds('B', chainTasks().tasks)).toEqual(['C', 'T001']);
  });
});
