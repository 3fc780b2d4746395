import type { Dispatcher } from '../clients/telegram';
import type { Snapshot } from '../types/snapshot';

export const DEFAULT_ALERT_INTERVAL_MS = 5 * 60_000;

export interface CycleResult {
  alerts: string[];
  dispatched: boolean;
}

export interface AlertDriverDeps {
  loadSnapshot: () => Promise<Snapshot>;
  evaluate: (snapshot: Snapshot) => string[];
  dispatcher: Dispatcher;
}

/**
 * One aggregate -> evaluate -> dispatch cycle. Alerts are sent as a single
 * message and only when there is at least one.
 */
export class AlertDriver {
  constructor(private readonly deps: AlertDriverDeps) {}

  async runCycle(): Promise<CycleResult> {
    const snapshot = await this.deps.loadSnapshot();
    const alerts = this.deps.evaluate(snapshot);
    if (!alerts.length) {
      return { alerts, dispatched: false };
    }
    try {
      await this.deps.dispatcher.send(alerts.join('\n'));
      return { alerts, dispatched: true };
    } catch (e) {
      console.error('alert dispatch error', e);
      return { alerts, dispatched: false };
    }
  }
}

/** In-process timer; a tick that lands while a cycle is still running is skipped. */
export class IntervalScheduler {
  private timer?: NodeJS.Timeout;
  private running = false;

  constructor(
    private readonly driver: Pick<AlertDriver, 'runCycle'>,
    private readonly intervalMs = DEFAULT_ALERT_INTERVAL_MS
  ) {}

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  get isRunning() {
    return this.running;
  }

  async tick() {
    if (this.running) {
      console.debug('alert cycle still running, tick skipped');
      return;
    }
    this.running = true;
    try {
      const { alerts, dispatched } = await this.driver.runCycle();
      console.debug(`alert cycle done: ${alerts.length} alert(s), dispatched=${dispatched}`);
    } catch (e) {
      console.error('alert cycle error', e);
    } finally {
      this.running = false;
    }
  }
}
