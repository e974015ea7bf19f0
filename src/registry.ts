import type { Item } from "./scheduler.js";
import type { TrainerMode } from "./validation.js";
import type { SentenceGenerator } from "./generator.js";
import { KeyedLock } from "./keyed-lock.js";
import { ReviewSession, type SessionSummary } from "./session.js";

export interface SessionDefaults {
  maxItems?: number;
  generator?: SentenceGenerator | null;
  distractorCount?: number;
  random?: () => number;
  clock?: () => Date;
}

export interface BeginOptions {
  collectionId?: string | null;
  maxItems?: number;
}

export type BeginOutcome =
  | { status: "started"; session: ReviewSession; queued: number }
  | { status: "already_active"; session: ReviewSession }
  | { status: "nothing_due"; totalItems: number };

export type EndOutcome = { status: "ended"; summary: SessionSummary } | { status: "not_found" };

export type SessionOperationOutcome<T> = { status: "ok"; value: T } | { status: "not_found" };

/**
 * Everything that serves requests depends on this shape, so decorators such
 * as the idle reaper can stand in for the registry.
 */
export interface SessionDirectory {
  begin(userId: string, items: readonly Item[], mode: TrainerMode, now?: Date, options?: BeginOptions): Promise<BeginOutcome>;
  get(userId: string): Promise<ReviewSession | undefined>;
  end(userId: string): Promise<EndOutcome>;
  withSession<T>(userId: string, fn: (session: ReviewSession) => T): Promise<SessionOperationOutcome<Awaited<T>>>;
  size(): number;
  userIds(): string[];
}

export class SessionRegistry implements SessionDirectory {
  private readonly sessions = new Map<string, ReviewSession>();
  private readonly locks = new KeyedLock();

  // A function so defaults can follow config reloads
  constructor(private readonly defaults: () => SessionDefaults = () => ({})) {}

  begin(
    userId: string,
    items: readonly Item[],
    mode: TrainerMode,
    now: Date = new Date(),
    options: BeginOptions = {}
  ): Promise<BeginOutcome> {
    return this.locks.run(userId, (): BeginOutcome => {
      const existing = this.sessions.get(userId);
      if (existing) {
        console.debug(`Session already active for user ${userId}`);
        return { status: "already_active", session: existing };
      }

      const defaults = this.defaults();
      const session = new ReviewSession({
        userId,
        mode,
        collectionId: options.collectionId ?? null,
        maxItems: options.maxItems ?? defaults.maxItems,
        generator: defaults.generator,
        distractorCount: defaults.distractorCount,
        random: defaults.random,
        clock: defaults.clock,
      });

      const queued = session.loadQueue(items, now);
      if (queued === 0) {
        console.info(`Nothing due for user ${userId} (${items.length} item(s) checked)`);
        return { status: "nothing_due", totalItems: items.length };
      }

      this.sessions.set(userId, session);
      console.info(`Started ${mode} session for user ${userId} with ${queued} item(s)`);
      return { status: "started", session, queued };
    });
  }

  get(userId: string): Promise<ReviewSession | undefined> {
    return this.locks.run(userId, () => this.sessions.get(userId));
  }

  end(userId: string): Promise<EndOutcome> {
    return this.locks.run(userId, (): EndOutcome => {
      const session = this.sessions.get(userId);
      if (!session) {
        console.debug(`No active session to end for user ${userId}`);
        return { status: "not_found" };
      }

      this.sessions.delete(userId);
      return { status: "ended", summary: session.end() };
    });
  }

  /**
   * Run one session operation while holding only this user's lock. A cloze
   * render waiting on generation blocks this user and nobody else.
   */
  withSession<T>(userId: string, fn: (session: ReviewSession) => T): Promise<SessionOperationOutcome<Awaited<T>>> {
    return this.locks.run(userId, async (): Promise<SessionOperationOutcome<Awaited<T>>> => {
      const session = this.sessions.get(userId);
      if (!session) return { status: "not_found" };
      return { status: "ok", value: await fn(session) };
    });
  }

  size(): number {
    return this.sessions.size;
  }

  userIds(): string[] {
    return [...this.sessions.keys()];
  }
}
