import type { ProgressInfo } from "@ragdesk/shared";

export type ProgressListener = (info: ProgressInfo) => void;

export interface ProgressTrackerOptions {
  minIntervalMs: number;
  now: () => number;
}

const defaultOptions: ProgressTrackerOptions = {
  minIntervalMs: 100,
  now: () => Date.now()
};

export function shouldShowProgress(estimatedSeconds: number, thresholdSeconds = 3): boolean {
  return estimatedSeconds >= thresholdSeconds;
}

/**
 * Counts completed units of a long operation and notifies a listener.
 * Updates arriving faster than `minIntervalMs` are coalesced; the final
 * `finish`/`cancel` notification always goes out.
 */
export class ProgressTracker {
  private readonly options: ProgressTrackerOptions;
  private readonly startedAt: number;
  private current = 0;
  private message = "";
  private lastEmittedAt: number | null = null;
  private closed = false;

  constructor(
    private readonly total: number,
    private readonly listener?: ProgressListener,
    options: Partial<ProgressTrackerOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
    this.startedAt = this.options.now();
  }

  update(increment = 1, message?: string): void {
    this.setCurrent(this.current + increment, message);
  }

  setCurrent(current: number, message?: string): void {
    if (this.closed) {
      return;
    }

    this.current = Math.min(Math.max(0, current), this.total);
    if (message !== undefined) {
      this.message = message;
    }
    this.emit(false);
  }

  finish(message = "Completed"): void {
    if (this.closed) {
      return;
    }
    this.current = this.total;
    this.message = message;
    this.emit(true);
    this.closed = true;
  }

  cancel(message = "Cancelled"): void {
    if (this.closed) {
      return;
    }
    this.message = message;
    this.emit(true);
    this.closed = true;
  }

  snapshot(): ProgressInfo {
    const now = this.options.now();
    const elapsedSeconds = Math.max(0, (now - this.startedAt) / 1000);
    const progressRate = this.total > 0 ? this.current / this.total : 1;
    const estimatedRemainingSeconds =
      this.current > 0 && this.current < this.total
        ? (elapsedSeconds / this.current) * (this.total - this.current)
        : this.current >= this.total
          ? 0
          : null;

    return {
      current: this.current,
      total: this.total,
      message: this.message,
      percentage: Math.round(progressRate * 1000) / 10,
      progressRate,
      elapsedSeconds,
      estimatedRemainingSeconds
    };
  }

  private emit(force: boolean): void {
    if (!this.listener) {
      return;
    }

    const now = this.options.now();
    if (!force && this.lastEmittedAt !== null && now - this.lastEmittedAt < this.options.minIntervalMs) {
      return;
    }

    this.lastEmittedAt = now;
    this.listener(this.snapshot());
  }
}
