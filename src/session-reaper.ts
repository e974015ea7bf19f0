import type { Item } from "./scheduler.js";
import type { TrainerMode } from "./validation.js";
import type { ReviewSession, SessionSummary } from "./session.js";
import type {
  BeginOptions,
  BeginOutcome,
  EndOutcome,
  SessionDirectory,
  SessionOperationOutcome,
} from "./registry.js";

const MINUTE_MS = 60 * 1000;

export interface ReaperOptions {
  idleTimeoutMs?: number;
  sweepIntervalMs?: number;
  // Milliseconds since epoch
  now?: () => number;
}

export interface EvictedSession {
  userId: string;
  summary: SessionSummary;
}

/**
 * Wraps a session directory and ends sessions nobody has touched for
 * `idleTimeoutMs`. Every call that reaches a live session counts as activity.
 */
export class IdleSessionReaper implements SessionDirectory {
  private readonly lastActivity = new Map<string, number>();
  private idleTimeoutMs: number;
  private sweepIntervalMs: number;
  private readonly now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly inner: SessionDirectory,
    options: ReaperOptions = {}
  ) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? 30 * MINUTE_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 10 * MINUTE_MS;
    this.now = options.now ?? Date.now;
  }

  async begin(
    userId: string,
    items: readonly Item[],
    mode: TrainerMode,
    now?: Date,
    options?: BeginOptions
  ): Promise<BeginOutcome> {
    const outcome = await this.inner.begin(userId, items, mode, now, options);
    if (outcome.status !== "nothing_due") {
      this.touch(userId);
    }
    return outcome;
  }

  async get(userId: string): Promise<ReviewSession | undefined> {
    const session = await this.inner.get(userId);
    if (session) this.touch(userId);
    return session;
  }

  async end(userId: string): Promise<EndOutcome> {
    this.lastActivity.delete(userId);
    return this.inner.end(userId);
  }

  async withSession<T>(userId: string, fn: (session: ReviewSession) => T): Promise<SessionOperationOutcome<Awaited<T>>> {
    const outcome = await this.inner.withSession(userId, fn);
    if (outcome.status === "ok") this.touch(userId);
    return outcome;
  }

  size(): number {
    return this.inner.size();
  }

  userIds(): string[] {
    return this.inner.userIds();
  }

  setIdleTimeout(ms: number): void {
    this.idleTimeoutMs = ms;
  }

  // Takes effect immediately when the sweep is running
  setSweepInterval(ms: number): void {
    if (ms === this.sweepIntervalMs) return;
    this.sweepIntervalMs = ms;
    if (this.sweepTimer) {
      this.stop();
      this.start();
    }
  }

  /**
   * End every session idle longer than the timeout. Sessions the reaper has
   * never seen (created around it) start their idle clock now.
   */
  async sweep(): Promise<EvictedSession[]> {
    const now = this.now();
    const evicted: EvictedSession[] = [];

    for (const userId of this.inner.userIds()) {
      const last = this.lastActivity.get(userId);
      if (last === undefined) {
        this.lastActivity.set(userId, now);
        continue;
      }
      if (now - last <= this.idleTimeoutMs) continue;

      this.lastActivity.delete(userId);
      const outcome = await this.inner.end(userId);
      if (outcome.status === "ended") {
        evicted.push({ userId, summary: outcome.summary });
      }
    }

    // Forget activity for sessions that ended behind our back
    const live = new Set(this.inner.userIds());
    for (const userId of this.lastActivity.keys()) {
      if (!live.has(userId)) this.lastActivity.delete(userId);
    }

    if (evicted.length > 0) {
      console.info(`Evicted ${evicted.length} idle review session(s): ${evicted.map((e) => e.userId).join(", ")}`);
    }
    return evicted;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        console.error("Idle session sweep failed:", error);
      });
    }, this.sweepIntervalMs);
    this.sweepTimer.unref();
    console.debug(`Idle session sweep started (timeout ${Math.round(this.idleTimeoutMs / MINUTE_MS)} min)`);
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
      console.debug("Idle session sweep stopped");
    }
  }

  private touch(userId: string): void {
    this.lastActivity.set(userId, this.now());
  }
}
