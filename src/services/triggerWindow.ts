import type {
  EndTrigger,
  RecurrenceUnit,
  RootEntity,
  ScheduleConfig,
  StartTrigger,
  WindowDecision,
} from '../types/notification';
import { ConfigurationError } from '../utils/errors';

const UNIT_MS: Record<RecurrenceUnit, number> = {
  seconds: 1000,
  minutes: 60 * 1000,
  hours: 60 * 60 * 1000,
  days: 24 * 60 * 60 * 1000,
  weeks: 7 * 24 * 60 * 60 * 1000,
};

export const MAX_RECURRENCE_COUNT = 1000;

export function cadenceMs(unit: RecurrenceUnit, count: number): number {
  if (!Number.isInteger(count) || count < 1 || count > MAX_RECURRENCE_COUNT) {
    throw new ConfigurationError(`Recurrence count must be an integer between 1 and ${MAX_RECURRENCE_COUNT}, got ${count}`);
  }
  const unitMs = UNIT_MS[unit];
  if (unitMs === undefined) {
    throw new ConfigurationError(`Unknown recurrence unit "${unit}"`);
  }
  return unitMs * count;
}

const END_TRIGGER_ROOT: Record<EndTrigger, RootEntity['kind']> = {
  until_job_start: 'job',
  until_subject_group_end: 'subject_group',
};

const START_TRIGGER_ROOT: Record<StartTrigger, RootEntity['kind']> = {
  before_job_start: 'job',
  after_job_end: 'job',
  after_job_saved: 'job',
  after_job_location_changed: 'job',
  after_photos_available: 'subject_group',
  after_subject_group_start: 'subject_group',
  after_subject_group_end: 'subject_group',
};

/**
 * Reject trigger and cadence combinations that can never be evaluated.
 * Called before any dispatch work.
 */
export function assertScheduleConfig(schedule: ScheduleConfig): void {
  const startRoot = START_TRIGGER_ROOT[schedule.startTrigger];
  if (startRoot === undefined) {
    throw new ConfigurationError(`Schedule ${schedule.name} has unknown start trigger "${schedule.startTrigger}"`);
  }
  if (startRoot !== schedule.triggerType) {
    throw new ConfigurationError(
      `Schedule ${schedule.name}: start trigger "${schedule.startTrigger}" does not apply to ${schedule.triggerType} schedules`
    );
  }
  if (schedule.endTrigger !== null) {
    const endRoot = END_TRIGGER_ROOT[schedule.endTrigger];
    if (endRoot === undefined) {
      throw new ConfigurationError(`Schedule ${schedule.name} has unknown end trigger "${schedule.endTrigger}"`);
    }
    if (endRoot !== schedule.triggerType) {
      throw new ConfigurationError(
        `Schedule ${schedule.name}: end trigger "${schedule.endTrigger}" does not apply to ${schedule.triggerType} schedules`
      );
    }
  }
  if (schedule.recurring) {
    cadenceMs(schedule.recurrenceUnit, schedule.recurrenceCount);
  }
}

function withinRecurrenceSpacing(schedule: ScheduleConfig, now: Date): boolean {
  if (!schedule.lastSentAt) return true;
  const elapsed = now.getTime() - schedule.lastSentAt.getTime();
  return elapsed >= cadenceMs(schedule.recurrenceUnit, schedule.recurrenceCount);
}

function hasStarted(schedule: ScheduleConfig, root: RootEntity, now: Date): boolean {
  const t = now.getTime();
  if (root.kind === 'job') {
    const { job } = root;
    switch (schedule.startTrigger) {
      case 'before_job_start':
        return t < job.startTime.getTime();
      case 'after_job_end':
        return t > job.endTime.getTime();
      case 'after_job_saved':
      case 'after_job_location_changed':
        // The triggering event already happened; event routing decides which schedules see it.
        return true;
      default:
        return false;
    }
  }

  const { subjectGroup } = root;
  switch (schedule.startTrigger) {
    case 'after_photos_available':
      return subjectGroup.photosAvailable;
    case 'after_subject_group_start':
      return t > subjectGroup.startTime.getTime();
    case 'after_subject_group_end':
      return t > subjectGroup.endTime.getTime();
    default:
      return false;
  }
}

type EndState = 'open' | 'end_at' | 'end_trigger';

function endState(schedule: ScheduleConfig, root: RootEntity, now: Date): EndState {
  const t = now.getTime();
  if (schedule.endAt && t > schedule.endAt.getTime()) return 'end_at';

  if (schedule.endTrigger === 'until_job_start' && root.kind === 'job') {
    return t > root.job.startTime.getTime() ? 'end_trigger' : 'open';
  }
  if (schedule.endTrigger === 'until_subject_group_end' && root.kind === 'subject_group') {
    return t > root.subjectGroup.endTime.getTime() ? 'end_trigger' : 'open';
  }
  return 'open';
}

const decision = (eligible: boolean, shouldDeactivate: boolean, reason: string): WindowDecision => ({
  eligible,
  shouldDeactivate,
  reason,
});

/**
 * Decide whether `schedule` may fire for `root` at `now`.
 *
 * Job and subject-group roots apply recurrence spacing differently: a recurring
 * job schedule is only spaced once its end trigger has passed (an open window
 * always fires), while a recurring subject-group schedule is spaced whenever
 * the window is open and never fires after its end trigger.
 */
export function evaluateWindow(schedule: ScheduleConfig, root: RootEntity, now: Date): WindowDecision {
  if (root.kind !== schedule.triggerType) {
    throw new ConfigurationError(`Schedule ${schedule.name} expects a ${schedule.triggerType} root, got ${root.kind}`);
  }
  assertScheduleConfig(schedule);

  if (!schedule.active) return decision(false, false, 'inactive');
  if (!hasStarted(schedule, root, now)) return decision(false, false, 'not started');

  const ended = endState(schedule, root, now);
  if (ended === 'end_at') return decision(false, true, 'past end date');

  if (ended === 'end_trigger') {
    if (!schedule.recurring) return decision(false, true, 'past end trigger');
    if (root.kind === 'job') {
      return withinRecurrenceSpacing(schedule, now)
        ? decision(true, false, 'recurring after end trigger')
        : decision(false, false, 'recurrence spacing');
    }
    return decision(false, false, 'past end trigger');
  }

  if (schedule.recurring) {
    if (root.kind === 'job') return decision(true, false, 'open');
    return withinRecurrenceSpacing(schedule, now)
      ? decision(true, false, 'open')
      : decision(false, false, 'recurrence spacing');
  }

  // One-shot schedules
  if (root.kind === 'job') {
    return schedule.lastSentAt
      ? decision(false, true, 'already sent')
      : decision(true, true, 'open, one-shot');
  }
  return schedule.lastSentAt
    ? decision(false, true, 'already sent')
    : decision(true, false, 'open, one-shot');
}
