/**
 * Milestone lifecycle state machine.
 *
 *   not_started → in_progress → complete → validated
 *                      ↑            │
 *                      └── failed ──┘
 *
 * Only the transitions in MILESTONE_TRANSITIONS exist; anything else is
 * rejected with LIFECYCLE_TRANSITION_INVALID.
 */

import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Milestone, MilestoneStatus } from '../../types/task.js';

/** What causes a transition. */
export type MilestoneTrigger =
  | 'task_started'
  | 'work_completed'
  | 'validation_passed'
  | 'validation_failed';

export interface TransitionRule {
  to: MilestoneStatus;
  trigger: MilestoneTrigger;
}

export const MILESTONE_TRANSITIONS: Record<MilestoneStatus, readonly TransitionRule[]> = {
  not_started: [{ to: 'in_progress', trigger: 'task_started' }],
  in_progress: [{ to: 'complete', trigger: 'work_completed' }],
  complete: [
    { to: 'validated', trigger: 'validation_passed' },
    { to: 'in_progress', trigger: 'validation_failed' },
  ],
  validated: [],
};

/**
 * The target status for a trigger from the given status, or null if the
 * trigger does not apply there.
 */
export function targetFor(from: MilestoneStatus, trigger: MilestoneTrigger): MilestoneStatus | null {
  return MILESTONE_TRANSITIONS[from].find((rule) => rule.trigger === trigger)?.to ?? null;
}

export function canTransition(from: MilestoneStatus, to: MilestoneStatus): boolean {
  return MILESTONE_TRANSITIONS[from].some((rule) => rule.to === to);
}

/**
 * Move a milestone along one edge of the lifecycle (mutates).
 * Returns the previous status.
 */
export function transitionMilestone(milestone: Milestone, trigger: MilestoneTrigger): MilestoneStatus {
  const from = milestone.status;
  const to = targetFor(from, trigger);
  if (to === null) {
    const allowed = MILESTONE_TRANSITIONS[from].map((r) => r.to);
    throw new TasklaneError(
      ExitCode.LIFECYCLE_TRANSITION_INVALID,
      `Milestone ${milestone.id} cannot handle ${trigger} while ${from}`,
      {
        details: { milestoneId: milestone.id, from, trigger, allowed },
        ...(allowed.length === 0 && { fix: `Milestone ${milestone.id} is validated and final` }),
      },
    );
  }
  milestone.status = to;
  return from;
}

/** Human description of a status, for renderers. */
export function describeStatus(status: MilestoneStatus): string {
  switch (status) {
    case 'not_started':
      return 'not started';
    case 'in_progress':
      return 'in progress';
    case 'complete':
      return 'complete, awaiting validation';
    case 'validated':
      return 'validated';
  }
}
