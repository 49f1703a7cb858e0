import type { SqliteDb } from "./db";

type Migration = {
  id: string;
  run: (db: SqliteDb) => void;
};

type MigrationRow = { id: string };

function ensureMigrationsTable(db: SqliteDb) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    );
  `);
}

export function hasColumn(db: SqliteDb, tableName: string, columnName: string): boolean {
  const cols = db.prepare(`PRAGMA table_info(${tableName})`).all() as { name: string }[];
  return cols.some((col) => col.name === columnName);
}

const MIGRATIONS: Migration[] = [
  {
    // Ledgers created before dish/water tracking only had the macro columns.
    id: "20240901_001_food_analyses_dish_and_water",
    run: (db) => {
      if (!hasColumn(db, "food_analyses", "dish_name")) {
        db.prepare("ALTER TABLE food_analyses ADD COLUMN dish_name TEXT NOT NULL DEFAULT ''").run();
      }
      if (!hasColumn(db, "food_analyses", "dish_weight")) {
        db.prepare("ALTER TABLE food_analyses ADD COLUMN dish_weight REAL NOT NULL DEFAULT 0").run();
      }
      if (!hasColumn(db, "food_analyses", "water_ml")) {
        db.prepare("ALTER TABLE food_analyses ADD COLUMN water_ml REAL NOT NULL DEFAULT 0").run();
      }
    }
  },
  {
    id: "20240901_002_indexes",
    run: (db) => {
      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_subscriptions_end_date ON subscriptions (end_date);
        CREATE INDEX IF NOT EXISTS idx_subscriptions_user_id ON subscriptions (user_id);
        CREATE INDEX IF NOT EXISTS idx_food_analyses_user_created_at ON food_analyses (user_id, created_at);
      `);
    }
  }
];

function assertUniqueMigrationIds(migrations: Migration[]) {
  const seen = new Set<string>();
  for (const migration of migrations) {
    if (seen.has(migration.id)) {
      throw new Error(`Duplicate migration id: ${migration.id}`);
    }
    seen.add(migration.id);
  }
}

export function applyDbMigrations(db: SqliteDb): { applied: string[]; total: number } {
  assertUniqueMigrationIds(MIGRATIONS);
  ensureMigrationsTable(db);

  const appliedRows = db.prepare("SELECT id FROM schema_migrations").all() as MigrationRow[];
  const appliedIds = new Set(appliedRows.map((row) => row.id));
  const insertApplied = db.prepare("INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)");

  const newlyApplied: string[] = [];
  const txn = db.transaction(() => {
    for (const migration of MIGRATIONS) {
      if (appliedIds.has(migration.id)) continue;
      migration.run(db);
      insertApplied.run(migration.id, Date.now());
      newlyApplied.push(migration.id);
      appliedIds.add(migration.id);
    }
  });

  txn();
  return { applied: newlyApplied, total: MIGRATIONS.length };
}
