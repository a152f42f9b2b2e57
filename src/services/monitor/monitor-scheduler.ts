import { getErrorMessage } from '@/utils/error-handler';
import { logger } from '@/utils/logger';

export interface CycleRunner {
  runOnce(): Promise<unknown>;
}

export interface SchedulerOptions {
  intervalMs: number;
  /** Upper bound of the random delay added to every interval. */
  maxJitterMs: number;
  random?: () => number;
}

/**
 * Runs the cycle, sleeps interval + jitter, repeats. Cycles never overlap;
 * stop() cancels the pending sleep and waits for a running cycle to finish.
 */
export class MonitorScheduler {
  private running = false;
  private loop: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;
  private readonly random: () => number;

  constructor(
    private readonly cycle: CycleRunner,
    private readonly options: SchedulerOptions
  ) {
    this.random = options.random ?? Math.random;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      logger.warn('Monitor scheduler is already running');
      return;
    }

    this.running = true;
    logger.info('Monitor scheduler started', {
      intervalMs: this.options.intervalMs,
      maxJitterMs: this.options.maxJitterMs,
    });
    this.loop = this.runLoop();
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.cancelSleep();
    await this.loop;
    this.loop = null;
    logger.info('Monitor scheduler stopped');
  }

  nextDelayMs(): number {
    return this.options.intervalMs + Math.floor(this.random() * this.options.maxJitterMs);
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      try {
        await this.cycle.runOnce();
      } catch (error) {
        logger.error('Monitoring cycle failed', { error: getErrorMessage(error) });
      }

      if (!this.running) {
        break;
      }

      const delay = this.nextDelayMs();
      logger.info(`Next monitoring cycle in ${Math.round(delay / 1000)}s`);
      await this.sleep(delay);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.wake = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }

  private cancelSleep(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
