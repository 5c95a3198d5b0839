import type { SyncStats } from '../types/directory.types';
import { Logger } from '../utils/logger';

export type SyncRunner = () => Promise<SyncStats>;

export type TriggerResult = { status: 'completed'; stats: SyncStats } | { status: 'skipped' };

export interface SyncStatus {
  running: boolean;
  periodic: boolean;
  intervalHours: number | null;
  lastSync: Date | null;
  lastStats: SyncStats | null;
}

// setTimeout overflows past ~24.8 days
const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Runs the directory sync at most once at a time. A trigger that arrives
 * while a run is in flight is dropped, not queued. While periodic, the next
 * run is due `intervalHours` after the last completed run, manual or not.
 */
export class EmployeeSyncScheduler {
  private running = false;
  private intervalHours: number | null = null;
  private timer: NodeJS.Timeout | null = null;
  private lastSync: Date | null = null;
  private lastStats: SyncStats | null = null;

  constructor(
    private readonly runSync: SyncRunner,
    private readonly logger: Logger
  ) {}

  get isRunning() {
    return this.running;
  }

  async trigger(): Promise<TriggerResult> {
    if (this.running) {
      this.logger.warn('Employee sync already running, trigger ignored');
      return { status: 'skipped' };
    }

    this.running = true;
    try {
      const stats = await this.runSync();
      this.lastSync = stats.finishedAt ?? new Date();
      this.lastStats = stats;
      return { status: 'completed', stats };
    } finally {
      this.running = false;
      this.arm();
    }
  }

  /**
   * Runs a sync now, then again `intervalHours` after each run completes.
   * Resolves once the first run has finished.
   */
  async start(intervalHours: number): Promise<void> {
    if (this.intervalHours !== null) {
      this.logger.warn('Periodic employee sync already started');
      return;
    }

    this.intervalHours = intervalHours;
    this.logger.info('Starting periodic employee sync', { intervalHours });
    await this.runScheduled();
  }

  stop() {
    this.intervalHours = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  status(): SyncStatus {
    return {
      running: this.running,
      periodic: this.intervalHours !== null,
      intervalHours: this.intervalHours,
      lastSync: this.lastSync,
      lastStats: this.lastStats,
    };
  }

  private async runScheduled(): Promise<void> {
    try {
      await this.trigger();
    } catch (err) {
      this.logger.error('Scheduled employee sync failed', err);
    }
  }

  private arm() {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.intervalHours === null) return;

    const delay = Math.min(this.intervalHours * 60 * 60 * 1000, MAX_TIMER_MS);
    this.timer = setTimeout(() => {
      void this.runScheduled();
    }, delay);
    this.timer.unref();
  }
}
