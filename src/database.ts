import Database from "better-sqlite3";
import type { Item } from "./scheduler.js";
import type { ItemStore } from "./store.js";

type Db = Database.Database;

interface ItemRow {
  id: string;
  collection_id: string | null;
  front: string;
  back: string;
  language: string;
  tags: string;
  created_at: string;
  interval: number;
  easiness: number;
  review_count: number;
  due: string | null;
}

interface Migration {
  version: number;
  name: string;
  up: (db: Db) => void;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: "initial_schema",
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS items (
          id TEXT PRIMARY KEY,
          collection_id TEXT,
          front TEXT NOT NULL,
          back TEXT NOT NULL,
          language TEXT NOT NULL DEFAULT 'en',
          tags TEXT NOT NULL DEFAULT '[]',
          created_at TEXT NOT NULL,
          interval REAL NOT NULL DEFAULT 1.0,
          easiness REAL NOT NULL DEFAULT 2.5,
          review_count INTEGER NOT NULL DEFAULT 0,
          due TEXT
        )
      `);
      db.exec(`CREATE INDEX IF NOT EXISTS idx_items_collection ON items(collection_id)`);
      db.exec(`CREATE INDEX IF NOT EXISTS idx_items_due ON items(collection_id, due)`);
    },
  },
];

function ensureMigrationsTable(database: Db): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT DEFAULT CURRENT_TIMESTAMP
    )
  `);
}

function getCurrentVersion(database: Db): number {
  const row = database.prepare("SELECT MAX(version) as version FROM schema_migrations").get() as
    | { version: number | null }
    | undefined;
  return row?.version ?? 0;
}

function applyMigration(database: Db, migration: Migration): void {
  console.info(`Applying migration ${migration.version}: ${migration.name}`);
  database.transaction(() => {
    migration.up(database);
    database.prepare("INSERT INTO schema_migrations (version, name) VALUES (?, ?)").run(migration.version, migration.name);
  })();
}

export function runMigrations(database: Db): void {
  ensureMigrationsTable(database);
  const currentVersion = getCurrentVersion(database);

  const pendingMigrations = MIGRATIONS.filter((m) => m.version > currentVersion).sort((a, b) => a.version - b.version);

  if (pendingMigrations.length === 0) {
    console.debug("Database is up to date");
    return;
  }

  console.info(`Running ${pendingMigrations.length} pending migration(s)`);

  for (const migration of pendingMigrations) {
    applyMigration(database, migration);
  }

  console.info("All migrations applied successfully");
}

function parseTags(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((tag): tag is string => typeof tag === "string") : [];
  } catch (error) {
    console.warn("Ignoring malformed tags column:", error);
    return [];
  }
}

function rowToItem(row: ItemRow): Item {
  return {
    id: row.id,
    collectionId: row.collection_id,
    front: row.front,
    back: row.back,
    language: row.language,
    tags: parseTags(row.tags),
    createdAt: new Date(row.created_at),
    interval: row.interval,
    easiness: row.easiness,
    reviewCount: row.review_count,
    due: row.due ? new Date(row.due) : null,
  };
}

function itemToParams(item: Item): ItemRow {
  return {
    id: item.id,
    collection_id: item.collectionId,
    front: item.front,
    back: item.back,
    language: item.language,
    tags: JSON.stringify(item.tags),
    created_at: item.createdAt.toISOString(),
    interval: item.interval,
    easiness: item.easiness,
    review_count: item.reviewCount,
    due: item.due ? item.due.toISOString() : null,
  };
}

const UPSERT_SQL = `
  INSERT INTO items (id, collection_id, front, back, language, tags, created_at, interval, easiness, review_count, due)
  VALUES (@id, @collection_id, @front, @back, @language, @tags, @created_at, @interval, @easiness, @review_count, @due)
  ON CONFLICT(id) DO UPDATE SET
    collection_id = excluded.collection_id,
    front = excluded.front,
    back = excluded.back,
    language = excluded.language,
    tags = excluded.tags,
    interval = excluded.interval,
    easiness = excluded.easiness,
    review_count = excluded.review_count,
    due = excluded.due
`;

export class SqliteItemStore implements ItemStore {
  private readonly db: Db;

  // ":memory:" gives a private in-process database
  constructor(path: string) {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    runMigrations(this.db);
  }

  listItems(collectionId: string): Item[] {
    const rows = this.db
      .prepare("SELECT * FROM items WHERE collection_id = ? ORDER BY created_at, id")
      .all(collectionId) as ItemRow[];
    return rows.map(rowToItem);
  }

  getItem(id: string): Item | undefined {
    const row = this.db.prepare("SELECT * FROM items WHERE id = ?").get(id) as ItemRow | undefined;
    return row ? rowToItem(row) : undefined;
  }

  saveItem(item: Item): void {
    this.db.prepare(UPSERT_SQL).run(itemToParams(item));
  }

  upsertItems(items: readonly Item[]): number {
    const stmt = this.db.prepare(UPSERT_SQL);
    const insertAll = this.db.transaction((batch: readonly Item[]) => {
      for (const item of batch) {
        stmt.run(itemToParams(item));
      }
    });
    insertAll(items);
    return items.length;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      console.info("Database closed");
    }
  }
}
