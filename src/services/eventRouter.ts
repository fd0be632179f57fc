import { FilterQuery } from 'mongoose';
import { NotificationSchedule, INotificationSchedule } from '../models/NotificationSchedule';
import type { StartTrigger } from '../types/notification';
import type { EnqueueDispatch } from './queue';

export const JOB_EVENTS = ['saved', 'location_changed', 'tick'] as const;
export type JobEvent = (typeof JOB_EVENTS)[number];

// Time-based triggers are worth evaluating on any job event
const TIMED_JOB_TRIGGERS: StartTrigger[] = ['before_job_start', 'after_job_end'];

export const JOB_EVENT_TRIGGERS: Record<JobEvent, StartTrigger[]> = {
  saved: ['after_job_saved', ...TIMED_JOB_TRIGGERS],
  location_changed: ['after_job_location_changed', ...TIMED_JOB_TRIGGERS],
  tick: TIMED_JOB_TRIGGERS,
};

export interface ScheduleSummary {
  id: string;
  name: string;
  allSubjectGroups: boolean;
  subjectGroupIds: string[];
}

/**
 * Read-side queries used to fan events out to schedules.
 */
export interface ScheduleDirectory {
  activeJobSchedules(startTriggers: StartTrigger[]): Promise<ScheduleSummary[]>;
  activeSubjectGroupSchedules(subjectGroupId: string): Promise<ScheduleSummary[]>;
  activeRecurringSubjectGroupSchedules(): Promise<ScheduleSummary[]>;
}

function toSummary(doc: INotificationSchedule): ScheduleSummary {
  return {
    id: String(doc._id),
    name: doc.name,
    allSubjectGroups: doc.allSubjectGroups,
    subjectGroupIds: doc.subjectGroupIds,
  };
}

export class MongoScheduleDirectory implements ScheduleDirectory {
  private async find(filter: FilterQuery<INotificationSchedule>): Promise<ScheduleSummary[]> {
    const docs = await NotificationSchedule.find(filter);
    return docs.map(toSummary);
  }

  activeJobSchedules(startTriggers: StartTrigger[]): Promise<ScheduleSummary[]> {
    return this.find({ active: true, triggerType: 'job', startTrigger: { $in: startTriggers } });
  }

  activeSubjectGroupSchedules(subjectGroupId: string): Promise<ScheduleSummary[]> {
    return this.find({
      active: true,
      triggerType: 'subject_group',
      $or: [{ allSubjectGroups: true }, { subjectGroupIds: subjectGroupId }],
    });
  }

  activeRecurringSubjectGroupSchedules(): Promise<ScheduleSummary[]> {
    return this.find({ active: true, recurring: true, triggerType: 'subject_group' });
  }
}

/**
 * Turns business events into dispatch requests. Only selects candidates; the
 * trigger window decides whether each one actually fires.
 */
export class EventRouter {
  constructor(
    private readonly directory: ScheduleDirectory,
    private readonly enqueue: EnqueueDispatch
  ) {}

  async jobEvent(jobId: string, event: JobEvent): Promise<string[]> {
    const schedules = await this.directory.activeJobSchedules(JOB_EVENT_TRIGGERS[event]);
    for (const schedule of schedules) {
      await this.enqueue(schedule.id, { kind: 'job', id: jobId });
    }
    console.log(`[Events] Job ${jobId} ${event}: ${schedules.length} schedules queued`);
    return schedules.map((s) => s.id);
  }

  async subjectGroupEvent(subjectGroupId: string): Promise<string[]> {
    const schedules = await this.directory.activeSubjectGroupSchedules(subjectGroupId);
    for (const schedule of schedules) {
      await this.enqueue(schedule.id, { kind: 'subject_group', id: subjectGroupId });
    }
    console.log(`[Events] Subject group ${subjectGroupId}: ${schedules.length} schedules queued`);
    return schedules.map((s) => s.id);
  }

  /**
   * Re-check recurring subject-group schedules over their scoped groups.
   * Schedules scoped to all groups have no enumerable roots here and are
   * driven by subject-group events instead.
   */
  async recurrenceSweep(): Promise<number> {
    const schedules = await this.directory.activeRecurringSubjectGroupSchedules();
    let queued = 0;
    for (const schedule of schedules) {
      if (schedule.allSubjectGroups) continue;
      for (const subjectGroupId of schedule.subjectGroupIds) {
        await this.enqueue(schedule.id, { kind: 'subject_group', id: subjectGroupId });
        queued++;
      }
    }
    console.log(`[Events] Recurrence sweep queued ${queued} dispatches`);
    return queued;
  }
}
