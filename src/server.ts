import { loadConfig } from './lib/config';
import { createRedisConnection } from './lib/redis';
import { buildApp } from './app';
import { createDashboardClient } from './clients/dashboard';
import { createTelegramDispatcher } from './clients/telegram';
import { buildSnapshot } from './services/aggregator';
import { evaluateAlerts } from './services/alerts';
import { AlertDriver, IntervalScheduler } from './queues/scheduler';
import { startAlertQueue } from './queues/alertQueue';

async function main() {
  const config = loadConfig();
  if (!config.dashboard.baseUrl) {
    console.warn('DASHBOARD_API_URL is not set; every section will use sample data');
  }

  const dashboard = createDashboardClient(config.dashboard);
  const loadSnapshot = () => buildSnapshot(dashboard);

  const driver = config.telegram
    ? new AlertDriver({
        loadSnapshot,
        evaluate: (snapshot) => evaluateAlerts(snapshot),
        dispatcher: createTelegramDispatcher(config.telegram),
      })
    : undefined;

  const app = await buildApp({ loadSnapshot, driver });
  await app.listen({ port: config.port, host: '0.0.0.0' });
  console.log(`Server listening on http://localhost:${config.port}`);

  const resources: {
    interval?: IntervalScheduler;
    queue?: Awaited<ReturnType<typeof startAlertQueue>>;
    redis?: ReturnType<typeof createRedisConnection>;
  } = {};

  if (!driver) {
    console.warn('TELEGRAM_TOKEN / ADMIN_CHAT_ID not set; alert scheduler disabled');
  } else if (config.scheduler === 'bullmq') {
    resources.redis = createRedisConnection(config.redisUrl);
    resources.queue = await startAlertQueue(driver, resources.redis, config.alertIntervalMs);
    console.log(`Alert queue scheduled every ${config.alertIntervalMs}ms`);
  } else {
    resources.interval = new IntervalScheduler(driver, config.alertIntervalMs);
    resources.interval.start();
    console.log(`Alert timer started, every ${config.alertIntervalMs}ms`);
  }

  async function shutdown() {
    resources.interval?.stop();
    const steps: Array<[string, () => Promise<unknown>]> = [
      ['queue', async () => resources.queue?.close()],
      ['http server', () => app.close()],
      ['redis', async () => resources.redis?.quit()],
    ];
    for (const [name, step] of steps) {
      try {
        await step();
      } catch (e) {
        console.error(`shutdown: closing ${name} failed`, e);
      }
    }
    process.exit(0);
  }
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
