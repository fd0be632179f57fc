import { Queue } from 'bullmq';
import { getRedisConfig } from '../config/redis';
import { config } from '../config';
import type { RootRef } from '../types/notification';

export const DISPATCH_QUEUE_NAME = 'schedule-dispatch';
export const RECURRENCE_SWEEP_JOB_ID = 'recurrence-sweep';

export type DispatchJobData =
  | { type: 'dispatch'; scheduleId: string; root: RootRef }
  | { type: 'sweep' };

let dispatchQueue: Queue<DispatchJobData> | null = null;

export function getDispatchQueue(): Queue<DispatchJobData> {
  if (!dispatchQueue) {
    dispatchQueue = new Queue<DispatchJobData>(DISPATCH_QUEUE_NAME, {
      connection: getRedisConfig(),
      defaultJobOptions: {
        // A retried dispatch would re-deliver to recipients that already succeeded;
        // the next trigger or sweep re-invokes it instead.
        attempts: 1,
        removeOnComplete: { count: 1000 },
        removeOnFail: { count: 5000 },
      },
    });
  }
  return dispatchQueue;
}

export type EnqueueDispatch = (scheduleId: string, root: RootRef) => Promise<void>;

export const enqueueDispatch: EnqueueDispatch = async (scheduleId, root) => {
  await getDispatchQueue().add(`dispatch:${root.kind}`, { type: 'dispatch', scheduleId, root });
};

/**
 * Register the repeatable recurrence sweep. Re-registering with the same
 * interval is a no-op in BullMQ.
 */
export async function scheduleRecurrenceSweep(everyMs: number = config.dispatch.recurrenceSweepMs): Promise<void> {
  await getDispatchQueue().add(
    RECURRENCE_SWEEP_JOB_ID,
    { type: 'sweep' },
    { repeat: { every: everyMs }, jobId: RECURRENCE_SWEEP_JOB_ID }
  );
  console.log(`[Queue] Recurrence sweep every ${everyMs}ms`);
}

