import { describe, it, expect } from "vitest";
import { SessionRegistry } from "./registry.js";
import { addDays, createItem, type Item } from "./scheduler.js";
import type { SentenceGenerator } from "./generator.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

function items(...ids: string[]): Item[] {
  return ids.map((id) => createItem({ id, front: `front ${id}`, back: `back ${id}` }, NOW));
}

describe("SessionRegistry", () => {
  it("starts one session per user and never replaces it", async () => {
    const registry = new SessionRegistry();

    const started = await registry.begin("u1", items("a", "b"), "direct_recall", NOW, { collectionId: "deck" });
    expect(started.status).toBe("started");
    if (started.status !== "started") return;
    expect(started.queued).toBe(2);
    expect(started.session.collectionId).toBe("deck");

    const again = await registry.begin("u1", items("c"), "cloze", NOW);
    expect(again).toEqual({ status: "already_active", session: started.session });
    expect(started.session.trainerMode).toBe("direct_recall");
    expect(registry.size()).toBe(1);
  });

  it("stores nothing when no item is due", async () => {
    const registry = new SessionRegistry();
    const notDue = createItem({ id: "a", front: "a", back: "b", reviewCount: 1, due: addDays(NOW, 3) }, NOW);

    const outcome = await registry.begin("u1", [notDue], "direct_recall", NOW);

    expect(outcome).toEqual({ status: "nothing_due", totalItems: 1 });
    expect(registry.size()).toBe(0);
    await expect(registry.get("u1")).resolves.toBeUndefined();
  });

  it("applies defaults when building sessions", async () => {
    const registry = new SessionRegistry(() => ({ maxItems: 1 }));
    const outcome = await registry.begin("u1", items("a", "b", "c"), "direct_recall", NOW);
    expect(outcome).toMatchObject({ status: "started", queued: 1 });
  });

  it("ends a session once", async () => {
    const registry = new SessionRegistry();
    await registry.begin("u1", items("a"), "direct_recall", NOW);

    const ended = await registry.end("u1");
    expect(ended).toMatchObject({ status: "ended", summary: { userId: "u1", itemsReviewed: 0 } });
    await expect(registry.end("u1")).resolves.toEqual({ status: "not_found" });
    expect(registry.userIds()).toEqual([]);
  });

  it("reports missing sessions from withSession", async () => {
    const registry = new SessionRegistry();
    await expect(registry.withSession("nobody", (session) => session.snapshot())).resolves.toEqual({
      status: "not_found",
    });
  });

  it("serializes one user's operations while others proceed", async () => {
    let release: (sentence: string) => void = () => {};
    const generator: SentenceGenerator = {
      generateSentence: () =>
        new Promise<string>((resolve) => {
          release = resolve;
        }),
    };
    const registry = new SessionRegistry(() => ({ generator }));
    const paris = createItem({ id: "p", front: "Paris", back: "Capital of France" }, NOW);
    await registry.begin("u1", [paris], "cloze", NOW);
    await registry.begin("u2", items("a"), "direct_recall", NOW);

    const events: string[] = [];
    const advancing = registry.withSession("u1", async (session) => {
      const result = await session.advance();
      events.push("u1 advance");
      return result;
    });
    const queued = registry.withSession("u1", (session) => {
      events.push("u1 snapshot");
      return session.snapshot().state;
    });

    const other = await registry.withSession("u2", (session) => {
      events.push("u2");
      return session.snapshot().state;
    });
    expect(other).toEqual({ status: "ok", value: "ready" });
    expect(events).toEqual(["u2"]);

    release("Paris is the capital of France.");
    const [advanced, state] = await Promise.all([advancing, queued]);

    expect(events).toEqual(["u2", "u1 advance", "u1 snapshot"]);
    expect(advanced).toMatchObject({ status: "ok", value: { mode: "cloze", itemId: "p" } });
    expect(state).toEqual({ status: "ok", value: "presenting" });
  });
});
