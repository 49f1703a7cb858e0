// Keep this in TS so production builds don't depend on copying .sql files into dist/.
// Indexes and columns added after the first release live in migrations.ts.
export const SCHEMA_SQL = `
-- One subscription window per Telegram user. Dates are epoch milliseconds.
CREATE TABLE IF NOT EXISTS subscriptions (
  user_id INTEGER PRIMARY KEY,
  start_date INTEGER NOT NULL,
  end_date INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  CHECK (end_date >= start_date)
);

-- Append-only nutrition/water ledger. Only addWater updates a row in place.
CREATE TABLE IF NOT EXISTS food_analyses (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL,
  analysis_text TEXT NOT NULL DEFAULT '',
  dish_name TEXT NOT NULL DEFAULT '',
  dish_weight REAL NOT NULL DEFAULT 0,
  calories REAL NOT NULL DEFAULT 0,
  protein REAL NOT NULL DEFAULT 0,
  fat REAL NOT NULL DEFAULT 0,
  carbs REAL NOT NULL DEFAULT 0,
  water_ml REAL NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL
);
`;
