import { Worker, Job } from 'bullmq';
import { getRedisConfig } from './config/redis';
import { connectDatabase } from './config/database';
import { DispatchJobData, DISPATCH_QUEUE_NAME, scheduleRecurrenceSweep } from './services/queue';
import { assertDelivered } from './services/dispatcher';
import { loadRoot } from './services/relationshipProvider';
import { getRuntime } from './services/runtime';

async function processDispatch(job: Job<DispatchJobData>): Promise<void> {
  const { dispatcher, events, provider } = getRuntime();
  const data = job.data;

  if (data.type === 'sweep') {
    await events.recurrenceSweep();
    return;
  }

  const { scheduleId, root: ref } = data;
  console.log(`[Worker] Dispatching schedule ${scheduleId} for ${ref.kind} ${ref.id}`);

  try {
    const root = await loadRoot(provider, ref);
    if (!root) {
      console.log(`[Worker] ${ref.kind} ${ref.id} no longer exists, skipping schedule ${scheduleId}`);
      return;
    }

    const result = await dispatcher.dispatch(scheduleId, root);
    const sent = result.channels.map((c) => `${c.channel} ${c.sent}/${c.attempted}`).join(', ');
    console.log(`[Worker] Schedule ${scheduleId}: ${result.status} (${result.reason})${sent ? `: ${sent}` : ''}`);

    // Partial success is already recorded; surface the failures on the job
    assertDelivered(result);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Worker] Failed to dispatch schedule ${scheduleId}:`, message);
    throw err;
  }
}

async function startWorker(): Promise<void> {
  await connectDatabase();

  const worker = new Worker<DispatchJobData>(DISPATCH_QUEUE_NAME, processDispatch, {
    connection: getRedisConfig(),
    concurrency: 10,
  });

  worker.on('completed', (job) => {
    console.log(`[Worker] Job ${job.id} completed`);
  });

  worker.on('failed', (job, err) => {
    console.error(`[Worker] Job ${job?.id} failed:`, err.message);
  });

  await scheduleRecurrenceSweep();
  console.log('[Worker] Dispatch worker started');
}

startWorker().catch((err) => {
  console.error('[Worker] Failed to start:', err);
  process.exit(1);
});
