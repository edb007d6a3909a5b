import { randomUUID } from "node:crypto";
import { CancelledError } from "../errors.js";
import { logger } from "../utils/logger.js";

export const DEFAULT_CANCEL_REASON = "user cancelled";

export type CancelListener = (reason: string) => void;

/**
 * Cooperative cancellation flag for one logical operation. Long-running loops
 * poll `throwIfCancelled()`; HTTP calls hand `signal` to fetch.
 */
export class CancellationToken {
  readonly id: string;
  readonly createdAt: Date;
  private cancelledAtValue: Date | null = null;
  private reasonValue: string | null = null;
  private readonly listeners = new Set<CancelListener>();
  private readonly controller = new AbortController();

  constructor(id: string = randomUUID(), createdAt: Date = new Date()) {
    this.id = id;
    this.createdAt = createdAt;
  }

  get isCancelled(): boolean {
    return this.cancelledAtValue !== null;
  }

  get cancelledAt(): Date | null {
    return this.cancelledAtValue;
  }

  get reason(): string | null {
    return this.reasonValue;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(reason: string = DEFAULT_CANCEL_REASON): boolean {
    if (this.isCancelled) {
      return false;
    }

    this.cancelledAtValue = new Date();
    this.reasonValue = reason;
    this.controller.abort(new CancelledError(this.id, reason));

    for (const listener of [...this.listeners]) {
      try {
        listener(reason);
      } catch (error) {
        logger.warn({ err: error, operationId: this.id }, "Cancellation listener failed");
      }
    }
    this.listeners.clear();
    return true;
  }

  throwIfCancelled(): void {
    if (this.isCancelled) {
      throw new CancelledError(this.id, this.reasonValue ?? DEFAULT_CANCEL_REASON);
    }
  }

  /**
   * Registers a listener and returns its unsubscribe function. A listener
   * added after cancellation runs immediately.
   */
  onCancel(listener: CancelListener): () => void {
    if (this.isCancelled) {
      listener(this.reasonValue ?? DEFAULT_CANCEL_REASON);
      return () => undefined;
    }

    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  listenerCount(): number {
    return this.listeners.size;
  }
}

export interface CancellationRegistryOptions {
  tokenTtlMs: number;
  sweepIntervalMs: number;
  now: () => number;
}

const defaultOptions: CancellationRegistryOptions = {
  tokenTtlMs: 60 * 60 * 1000,
  sweepIntervalMs: 5 * 60 * 1000,
  now: () => Date.now()
};

export interface CancellationRegistryStats {
  total: number;
  active: number;
  cancelled: number;
}

/**
 * Tokens for in-flight operations, addressable by id so a cancel request from
 * the HTTP layer can reach a background run. Owned by the app context.
 */
export class CancellationRegistry {
  private readonly tokens = new Map<string, CancellationToken>();
  private readonly options: CancellationRegistryOptions;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: Partial<CancellationRegistryOptions> = {}) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  create(id?: string): CancellationToken {
    const token = new CancellationToken(id ?? randomUUID(), new Date(this.options.now()));
    if (this.tokens.has(token.id)) {
      throw new Error(`Cancellation token already registered: ${token.id}`);
    }
    this.tokens.set(token.id, token);
    return token;
  }

  get(id: string): CancellationToken | null {
    return this.tokens.get(id) ?? null;
  }

  cancel(id: string, reason: string = DEFAULT_CANCEL_REASON): boolean {
    const token = this.tokens.get(id);
    if (!token) {
      return false;
    }
    return token.cancel(reason);
  }

  cancelAll(reason: string = DEFAULT_CANCEL_REASON): number {
    let cancelled = 0;
    for (const token of this.tokens.values()) {
      if (token.cancel(reason)) {
        cancelled += 1;
      }
    }
    return cancelled;
  }

  release(id: string): boolean {
    return this.tokens.delete(id);
  }

  sweep(maxAgeMs: number = this.options.tokenTtlMs): number {
    const cutoff = this.options.now() - maxAgeMs;
    let removed = 0;
    for (const [id, token] of this.tokens) {
      if (token.createdAt.getTime() < cutoff) {
        this.tokens.delete(id);
        removed += 1;
      }
    }

    if (removed > 0) {
      logger.debug({ removed, remaining: this.tokens.size }, "Swept expired cancellation tokens");
    }
    return removed;
  }

  start(): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.options.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  dispose(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.tokens.clear();
  }

  stats(): CancellationRegistryStats {
    let cancelled = 0;
    for (const token of this.tokens.values()) {
      if (token.isCancelled) {
        cancelled += 1;
      }
    }
    return {
      total: this.tokens.size,
      active: this.tokens.size - cancelled,
      cancelled
    };
  }
}
