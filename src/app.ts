import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { zValidator } from "@hono/zod-validator";
import type { Config } from "./config.js";
import type { SessionDirectory } from "./registry.js";
import type { ItemStore } from "./store.js";
import { createItem, type Item } from "./scheduler.js";
import { isAdvanceFailure } from "./session.js";
import { describeMode } from "./trainer.js";
import { ContractViolationError } from "./errors.js";
import {
  AnswerSchema,
  BeginSessionSchema,
  ConfigUpdateSchema,
  ItemsUpsertSchema,
  SwitchModeSchema,
  formatZodErrors,
  type ValidatedConfigUpdate,
  type ValidatedItemInput,
} from "./validation.js";

export interface ConfigAccess {
  get(): Config;
  update(updates: ValidatedConfigUpdate): Config;
  path?: string;
}

export interface AppDeps {
  sessions: SessionDirectory;
  store: ItemStore;
  config: ConfigAccess;
  version?: string;
}

// Merge an incoming item over what is stored; scheduling fields the caller
// leaves out keep their stored (or initial) values
export function itemFromInput(input: ValidatedItemInput, collectionId: string, existing: Item | undefined, now: Date): Item {
  const base = existing ?? createItem({ id: input.id, front: input.front, back: input.back }, now);
  let due = base.due;
  if (input.due === null) {
    due = null;
  } else if (input.due !== undefined) {
    due = new Date(input.due);
  }

  return {
    ...base,
    collectionId,
    front: input.front,
    back: input.back,
    language: input.language ?? base.language,
    tags: input.tags ?? base.tags,
    interval: input.interval ?? base.interval,
    easiness: input.easiness ?? base.easiness,
    reviewCount: input.reviewCount ?? base.reviewCount,
    due,
  };
}

export function createApp(deps: AppDeps): Hono {
  const { sessions, store, config } = deps;
  const app = new Hono();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    console.debug(`→ ${method} ${path}`);

    await next();

    const duration = Date.now() - start;
    console.debug(`← ${method} ${path} ${c.res.status} (${duration}ms)`);
  });

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    if (err instanceof ContractViolationError) {
      console.warn(`Rejected ${c.req.method} ${c.req.path}: ${err.message}`);
      return c.json({ success: false, error: err.message }, 409);
    }
    console.error(`Unhandled error on ${c.req.method} ${c.req.path}:`, err);
    return c.json({ success: false, error: "Internal server error" }, 500);
  });

  // Health check endpoint
  app.get("/health", (c) => {
    return c.json({
      status: "ok",
      version: deps.version ?? "0.0.0",
      configPath: config.path ?? null,
      activeSessions: sessions.size(),
    });
  });

  // Get current config
  app.get("/config", (c) => {
    return c.json(config.get());
  });

  // Update config
  app.put(
    "/config",
    zValidator("json", ConfigUpdateSchema, (result, c) => {
      if (!result.success) {
        return c.json({ success: false, errors: formatZodErrors(result.error) }, 400);
      }
    }),
    (c) => {
      const updates = c.req.valid("json");
      const newConfig = config.update(updates);
      return c.json({ success: true, config: newConfig });
    }
  );

  // Seed or replace the items of a collection
  app.put(
    "/collections/:collectionId/items",
    zValidator("json", ItemsUpsertSchema, (result, c) => {
      if (!result.success) {
        return c.json({ success: false, errors: formatZodErrors(result.error) }, 400);
      }
    }),
    (c) => {
      const collectionId = c.req.param("collectionId");
      const { items } = c.req.valid("json");
      const now = new Date();

      const merged = items.map((input) => itemFromInput(input, collectionId, store.getItem(input.id), now));
      const upserted = store.upsertItems(merged);
      console.info(`Upserted ${upserted} item(s) into collection ${collectionId}`);

      return c.json({ success: true, upserted });
    }
  );

  // Begin a review session
  app.post(
    "/sessions",
    zValidator("json", BeginSessionSchema, (result, c) => {
      if (!result.success) {
        return c.json({ success: false, errors: formatZodErrors(result.error) }, 400);
      }
    }),
    async (c) => {
      const { userId, collectionId, mode } = c.req.valid("json");
      const items = store.listItems(collectionId);
      const outcome = await sessions.begin(userId, items, mode, new Date(), { collectionId });

      switch (outcome.status) {
        case "started":
          return c.json(
            {
              success: true,
              status: outcome.status,
              queued: outcome.queued,
              explanation: describeMode(mode),
              session: outcome.session.snapshot(),
            },
            201
          );
        case "already_active":
          return c.json({ success: false, status: outcome.status, session: outcome.session.snapshot() }, 409);
        case "nothing_due":
          return c.json({ success: true, status: outcome.status, totalItems: outcome.totalItems });
      }
    }
  );

  app.get("/sessions/:userId", async (c) => {
    const session = await sessions.get(c.req.param("userId"));
    if (!session) {
      return c.json({ success: false, error: "No active session" }, 404);
    }
    return c.json({ success: true, session: session.snapshot() });
  });

  // Present the next item; ends the session once the queue is drained
  app.post("/sessions/:userId/next", async (c) => {
    const userId = c.req.param("userId");
    const outcome = await sessions.withSession(userId, (session) => session.advance());
    if (outcome.status === "not_found") {
      return c.json({ success: false, error: "No active session" }, 404);
    }

    const result = outcome.value;
    if (result === null) {
      const ended = await sessions.end(userId);
      return c.json({
        success: true,
        done: true,
        summary: ended.status === "ended" ? ended.summary : null,
      });
    }

    if (isAdvanceFailure(result)) {
      return c.json({ success: false, failure: result }, 502);
    }

    return c.json({ success: true, done: false, presentation: result });
  });

  // Grade the presented item and persist its new schedule
  app.post(
    "/sessions/:userId/answer",
    zValidator("json", AnswerSchema, (result, c) => {
      if (!result.success) {
        return c.json({ success: false, errors: formatZodErrors(result.error) }, 400);
      }
    }),
    async (c) => {
      const { answer } = c.req.valid("json");
      const outcome = await sessions.withSession(c.req.param("userId"), (session) =>
        session.grade(answer, (item) => store.saveItem(item))
      );
      if (outcome.status === "not_found") {
        return c.json({ success: false, error: "No active session" }, 404);
      }

      const { item, progress, ...result } = outcome.value;
      return c.json({
        success: true,
        result,
        nextDue: item.due,
        interval: item.interval,
        easiness: item.easiness,
        progress,
      });
    }
  );

  // Switch trainer mode, e.g. to retry after a cloze failure
  app.put(
    "/sessions/:userId/mode",
    zValidator("json", SwitchModeSchema, (result, c) => {
      if (!result.success) {
        return c.json({ success: false, errors: formatZodErrors(result.error) }, 400);
      }
    }),
    async (c) => {
      const { mode } = c.req.valid("json");
      const outcome = await sessions.withSession(c.req.param("userId"), (session) => session.setMode(mode));
      if (outcome.status === "not_found") {
        return c.json({ success: false, error: "No active session" }, 404);
      }
      return c.json({ success: true, mode, explanation: describeMode(mode) });
    }
  );

  app.delete("/sessions/:userId", async (c) => {
    const outcome = await sessions.end(c.req.param("userId"));
    if (outcome.status === "not_found") {
      return c.json({ success: false, error: "No active session" }, 404);
    }
    return c.json({ success: true, summary: outcome.summary });
  });

  return app;
}
