import { QualificationResult } from '../types/qualification';
import { toError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ExpiringEngine {
  expireConversations(now?: Date): Promise<QualificationResult[]>;
}

export type TimeoutHandler = (result: QualificationResult) => Promise<unknown> | unknown;

/**
 * Periodically closes idle conversations. Runs in-process because the
 * conversation store is per-process; at most one sweep runs at a time.
 */
export class TimeoutReaper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<number> | null = null;

  constructor(
    private readonly engine: ExpiringEngine,
    private readonly onTimeout: TimeoutHandler,
    private readonly intervalMs: number = 60000,
    private readonly clock: () => Date = () => new Date()
  ) {}

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.runOnce().catch((error) => {
        logger.error('Timeout sweep failed', { error: toError(error).message });
      });
    }, this.intervalMs);
    this.timer.unref();

    logger.info('Timeout reaper started', { intervalMs: this.intervalMs });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    logger.info('Timeout reaper stopped');
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** One sweep; a call while a sweep is in flight joins it. Resolves to the number expired. */
  runOnce(): Promise<number> {
    if (!this.running) {
      this.running = this.sweep().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private async sweep(): Promise<number> {
    const results = await this.engine.expireConversations(this.clock());

    for (const result of results) {
      try {
        await this.onTimeout(result);
      } catch (error) {
        logger.error('Timeout handoff failed', {
          phone: result.crm_data?.phone,
          error: toError(error).message,
        });
      }
    }

    return results.length;
  }
}
