import { Queue, Worker } from 'bullmq';
import type IORedis from 'ioredis';
import type { AlertDriver, CycleResult } from './scheduler';

export const ALERT_QUEUE = 'alerts';
const SCHEDULER_ID = 'alerts';

/**
 * Redis-backed alternative to IntervalScheduler. The repeatable job lives
 * under a fixed scheduler id (a restart replaces it) and the worker runs one
 * cycle at a time.
 */
export async function startAlertQueue(
  driver: Pick<AlertDriver, 'runCycle'>,
  connection: IORedis,
  intervalMs: number
) {
  const queue = new Queue(ALERT_QUEUE, { connection });
  await queue.upsertJobScheduler(
    SCHEDULER_ID,
    { every: intervalMs },
    { name: 'check-alerts', opts: { removeOnComplete: true, removeOnFail: 50 } }
  );

  const worker = new Worker<unknown, CycleResult>(ALERT_QUEUE, async () => driver.runCycle(), {
    connection,
    concurrency: 1,
  });

  worker.on('completed', (job, result) => {
    console.log(`✔ Alert job completed: ${job.id} (${result.alerts.length} alert(s))`);
  });

  worker.on('failed', (job, err) => {
    console.error(`❌ Alert job failed: ${job?.id}`, err);
  });

  async function close() {
    await worker.close();
    await queue.close();
  }

  return { queue, worker, close };
}
