import { errorMessage, type Logger } from '@wellness-automation/shared';
import type { AutomationEngine, TickSummary } from '@wellness-automation/workflow-engine';

export interface TickDriverOptions {
  engine: Pick<AutomationEngine, 'tick'>;
  logger: Logger;
  clock?: () => Date;
}

/** Drives the engine's scheduler, escalation and dedup-expiry sweeps on a timer. */
export class TickDriver {
  private readonly engine: Pick<AutomationEngine, 'tick'>;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private timer: ReturnType<typeof setInterval> | undefined;
  private inFlight = false;

  constructor(options: TickDriverOptions) {
    this.engine = options.engine;
    this.logger = options.logger.child({ component: 'tick-driver' });
    this.clock = options.clock ?? (() => new Date());
  }

  /** Returns null when a previous tick is still running or this one failed. */
  async tick(): Promise<TickSummary | null> {
    if (this.inFlight) {
      return null;
    }

    this.inFlight = true;
    const now = this.clock();
    try {
      const summary = await this.engine.tick(now);
      this.logger.debug('engine tick complete', {
        at: now.toISOString(),
        scheduled: summary.scheduled,
        expiredDedupKeys: summary.expiredDedupKeys,
      });
      return summary;
    } catch (error) {
      this.logger.error('engine tick failed', { at: now.toISOString(), reason: errorMessage(error) });
      return null;
    } finally {
      this.inFlight = false;
    }
  }

  start(intervalMs: number): void {
    if (this.timer !== undefined) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, intervalMs);
  }

  stop(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }
}
