import { randomUUID } from 'crypto';
import { setTimeout as delay } from 'timers/promises';
import type { Logger } from '../observability';
import { TransportError, errorMessage } from '../errors';
import { isCriticalJob, type ChatTransport, type NotificationJob, type NotificationKind } from '../types';
import { formatErrorNotification } from './formatter';

export interface DispatcherOptions {
  /** Chat used when enqueue() is not given one */
  chatId: string;
  /** Consecutive sends before the longer batch pause */
  batchSize: number;
  sendDelayMs: number;
  batchDelayMs: number;
  maxAttempts: number;
  /** Pending jobs allowed per chat before the oldest non-critical one is dropped */
  queueCapacity: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface EnqueueOptions {
  chatId?: string;
  render?: () => Promise<string>;
}

/**
 * A promise to enqueue one job later. Shutdown waits for every open
 * admission before draining, so work admitted before shutdown is never
 * refused.
 */
export interface Admission {
  enqueue(kind: NotificationKind, text: string, options?: EnqueueOptions): NotificationJob | null;
  /** Give the slot back without enqueuing; safe to call more than once */
  release(): void;
}

export interface DispatchFailure {
  jobId: string;
  kind: NotificationKind;
  chatId: string;
  reason: 'exhausted' | 'rejected' | 'dropped' | 'abandoned';
  attempts: number;
  error: string;
  at: Date;
}

export interface DispatcherStats {
  pending: number;
  inFlight: number;
  delivered: number;
  failed: number;
  dropped: number;
  lastProgressAt: number;
}

export interface ShutdownResult {
  flushed: boolean;
  abandoned: number;
}

interface ChatLane {
  chatId: string;
  pending: NotificationJob[];
  worker: Promise<void> | null;
  sentInBatch: number;
  lastSentAt: number | null;
}

const MAX_RECENT_FAILURES = 50;

/**
 * Rate-limited, retrying sender to the chat transport.
 *
 * Each chat gets its own FIFO lane drained by a single worker, so messages to
 * one chat leave in the order they were enqueued. Startup and error notices
 * share the lane with issue notifications.
 */
export class Dispatcher {
  private readonly lanes = new Map<string, ChatLane>();
  private readonly recentFailures: DispatchFailure[] = [];
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly backoffBaseMs: number;
  private readonly backoffMaxMs: number;

  private accepting = true;
  private abandoned = false;
  private openAdmissions = 0;
  private admissionWaiters: Array<() => void> = [];
  private inFlight = 0;
  private delivered = 0;
  private failed = 0;
  private dropped = 0;
  private lastProgressAt: number;

  constructor(
    private readonly transport: ChatTransport,
    private readonly options: DispatcherOptions,
    private readonly logger: Logger
  ) {
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? Date.now;
    this.backoffBaseMs = options.backoffBaseMs ?? 1000;
    this.backoffMaxMs = options.backoffMaxMs ?? 60_000;
    this.lastProgressAt = this.now();
  }

  /**
   * Queue a message for delivery. Returns immediately; never waits on the
   * transport. Returns null once shutdown has begun.
   */
  enqueue(kind: NotificationKind, text: string, options: EnqueueOptions = {}): NotificationJob | null {
    if (!this.accepting) {
      this.logger.warn(
        { kind, chatId: options.chatId ?? this.options.chatId },
        'Dispatcher is shutting down; notification not queued'
      );
      return null;
    }
    return this.push(kind, text, options);
  }

  /**
   * Reserve the right to enqueue after some async work (e.g. recording the
   * issue). Returns null once shutdown has begun.
   */
  admit(): Admission | null {
    if (!this.accepting) return null;

    this.openAdmissions++;
    let settled = false;
    const settle = () => {
      if (settled) return;
      settled = true;
      this.openAdmissions--;
      if (this.openAdmissions === 0) {
        for (const wake of this.admissionWaiters.splice(0)) wake();
      }
    };

    return {
      enqueue: (kind, text, options = {}) => {
        settle();
        return this.push(kind, text, options);
      },
      release: settle,
    };
  }

  notifyStartup(text: string): NotificationJob | null {
    return this.enqueue('startup', text);
  }

  /**
   * Report a non-retryable internal fault to operators through the same chat
   */
  reportError(source: string, error: unknown): NotificationJob | null {
    return this.enqueue('error', formatErrorNotification(source, errorMessage(error)));
  }

  isAccepting(): boolean {
    return this.accepting;
  }

  pendingCount(): number {
    let total = this.inFlight;
    for (const lane of this.lanes.values()) {
      total += lane.pending.length;
    }
    return total;
  }

  stats(): DispatcherStats {
    return {
      pending: this.pendingCount(),
      inFlight: this.inFlight,
      delivered: this.delivered,
      failed: this.failed,
      dropped: this.dropped,
      lastProgressAt: this.lastProgressAt,
    };
  }

  failures(): readonly DispatchFailure[] {
    return this.recentFailures;
  }

  isSaturated(threshold: number): boolean {
    return this.pendingCount() >= threshold;
  }

  /**
   * True when work is outstanding but nothing has completed for `timeoutMs`
   */
  isWedged(timeoutMs: number): boolean {
    return this.pendingCount() > 0 && this.now() - this.lastProgressAt > timeoutMs;
  }

  /**
   * Resolves once every lane is idle and no admission is open. Used by tests
   * and shutdown.
   */
  async idle(): Promise<void> {
    for (;;) {
      const workers = [...this.lanes.values()]
        .map((lane) => lane.worker)
        .filter((w): w is Promise<void> => w !== null);
      if (workers.length > 0) {
        await Promise.all(workers);
      } else if (this.openAdmissions > 0) {
        await new Promise<void>((resolve) => this.admissionWaiters.push(resolve));
      } else {
        return;
      }
    }
  }

  /**
   * Stop accepting jobs and let pending ones flush for up to `graceMs`.
   * Whatever is still queued afterwards is abandoned and logged.
   */
  async shutdown(graceMs: number): Promise<ShutdownResult> {
    this.accepting = false;
    this.logger.info(
      { pending: this.pendingCount(), admissions: this.openAdmissions, graceMs },
      'Dispatcher draining'
    );

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), graceMs);
      timer.unref();
    });

    const outcome = await Promise.race([this.idle().then(() => 'flushed' as const), timedOut]);
    clearTimeout(timer);

    if (outcome === 'flushed') {
      this.logger.info('Dispatcher flushed');
      return { flushed: true, abandoned: 0 };
    }

    this.abandoned = true;
    let abandoned = 0;
    for (const lane of this.lanes.values()) {
      for (const job of lane.pending.splice(0)) {
        abandoned++;
        this.recordFailure(job, 'abandoned', 'Shutdown grace period elapsed');
      }
    }
    this.logger.error({ abandoned }, 'Dispatcher shutdown grace period elapsed; pending notifications abandoned');
    return { flushed: false, abandoned };
  }

  // ── Private helpers ─────────────────────────────────────────────

  private push(kind: NotificationKind, text: string, options: EnqueueOptions): NotificationJob | null {
    const chatId = options.chatId ?? this.options.chatId;
    if (this.abandoned) {
      this.logger.error({ kind, chatId }, 'Dispatcher already abandoned its queue; notification not queued');
      return null;
    }

    if (this.pendingCount() === 0) {
      this.lastProgressAt = this.now();
    }

    const lane = this.getLane(chatId);
    if (lane.pending.length >= this.options.queueCapacity) {
      this.evictOne(lane);
    }

    const job: NotificationJob = {
      id: randomUUID(),
      kind,
      text,
      chatId,
      attempts: 0,
      createdAt: new Date(this.now()),
      render: options.render,
    };
    lane.pending.push(job);

    this.logger.debug({ jobId: job.id, kind, chatId, queued: lane.pending.length }, 'Notification queued');
    this.kick(lane);
    return job;
  }

  private getLane(chatId: string): ChatLane {
    let lane = this.lanes.get(chatId);
    if (!lane) {
      lane = { chatId, pending: [], worker: null, sentInBatch: 0, lastSentAt: null };
      this.lanes.set(chatId, lane);
    }
    return lane;
  }

  /**
   * Drop the oldest non-critical job; if every pending job is critical,
   * the oldest job goes. The incoming job is always kept.
   */
  private evictOne(lane: ChatLane): void {
    const index = lane.pending.findIndex((job) => !isCriticalJob(job));
    const [victim] = lane.pending.splice(index === -1 ? 0 : index, 1);
    if (!victim) return;

    this.dropped++;
    this.recordFailure(victim, 'dropped', 'Dispatch queue full');
    this.logger.error(
      { jobId: victim.id, kind: victim.kind, chatId: lane.chatId, capacity: this.options.queueCapacity },
      'Dispatch queue full; dropped oldest pending notification'
    );
  }

  private kick(lane: ChatLane): void {
    if (lane.worker) return;

    lane.worker = this.drain(lane)
      .catch((err: unknown) => {
        this.logger.error({ err, chatId: lane.chatId }, 'Dispatch worker stopped unexpectedly');
      })
      .finally(() => {
        lane.worker = null;
        if (lane.pending.length > 0 && !this.abandoned) {
          this.kick(lane);
        }
      });
  }

  private async drain(lane: ChatLane): Promise<void> {
    while (lane.pending.length > 0 && !this.abandoned) {
      await this.pace(lane);

      const job = lane.pending.shift();
      if (!job) break;

      this.inFlight++;
      try {
        await this.deliver(job);
      } finally {
        this.inFlight--;
        lane.sentInBatch++;
        lane.lastSentAt = this.now();
        this.lastProgressAt = lane.lastSentAt;
      }
    }
  }

  /**
   * Wait out the gap since the previous send: sendDelayMs inside a batch,
   * the longer batch pause once batchSize sends have gone out.
   */
  private async pace(lane: ChatLane): Promise<void> {
    if (lane.lastSentAt === null) return;

    let gap = this.options.sendDelayMs;
    if (lane.sentInBatch >= this.options.batchSize) {
      gap = Math.max(this.options.sendDelayMs, this.options.batchDelayMs);
      lane.sentInBatch = 0;
    }

    const wait = gap - (this.now() - lane.lastSentAt);
    if (wait > 0) {
      await this.sleep(wait);
    }
  }

  private async deliver(job: NotificationJob): Promise<void> {
    if (job.render) {
      const render = job.render;
      job.render = undefined;
      try {
        job.text = await render();
      } catch (err) {
        this.logger.warn({ jobId: job.id, kind: job.kind, err }, 'Notification render failed; sending fallback text');
      }
    }

    for (;;) {
      job.attempts++;
      try {
        await this.transport.sendMessage(job.chatId, job.text);
        this.delivered++;
        this.logger.info({ jobId: job.id, kind: job.kind, attempts: job.attempts }, 'Notification delivered');
        return;
      } catch (error) {
        if (!(error instanceof TransportError) || !error.retryable) {
          this.fail(job, 'rejected', error);
          return;
        }
        if (job.attempts >= this.options.maxAttempts || this.abandoned) {
          this.fail(job, 'exhausted', error);
          return;
        }

        const wait = this.backoff(job.attempts, error.retryAfterMs);
        this.logger.warn(
          { jobId: job.id, kind: job.kind, attempt: job.attempts, retryInMs: wait, err: error },
          'Notification send failed; retrying'
        );
        await this.sleep(wait);
      }
    }
  }

  /**
   * Exponential backoff: base, 2x base, 4x base, ... capped at backoffMaxMs.
   * A provider-requested wait wins when it is longer.
   */
  private backoff(attempt: number, retryAfterMs?: number): number {
    const exponential = Math.min(this.backoffBaseMs * Math.pow(2, attempt - 1), this.backoffMaxMs);
    return retryAfterMs !== undefined ? Math.max(exponential, retryAfterMs) : exponential;
  }

  private fail(job: NotificationJob, reason: 'exhausted' | 'rejected', error: unknown): void {
    this.failed++;
    this.recordFailure(job, reason, errorMessage(error));
    this.logger.error(
      { jobId: job.id, kind: job.kind, chatId: job.chatId, attempts: job.attempts, reason, err: error },
      'Notification dispatch failed'
    );

    // An error notice that cannot be delivered is only logged, never re-reported
    if (job.kind === 'error') return;

    this.reportError(
      'dispatcher',
      `Failed to deliver ${job.kind} notification after ${job.attempts} attempt(s): ${errorMessage(error)}`
    );
  }

  private recordFailure(job: NotificationJob, reason: DispatchFailure['reason'], error: string): void {
    this.recentFailures.push({
      jobId: job.id,
      kind: job.kind,
      chatId: job.chatId,
      reason,
      attempts: job.attempts,
      error,
      at: new Date(this.now()),
    });
    if (this.recentFailures.length > MAX_RECENT_FAILURES) {
      this.recentFailures.shift();
    }
  }
}
