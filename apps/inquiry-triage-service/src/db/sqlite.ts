import Database from "better-sqlite3";

export const OPPORTUNITIES_TABLE = "opportunities";

const CREATE_OPPORTUNITIES = `
CREATE TABLE IF NOT EXISTS ${OPPORTUNITIES_TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp TEXT,
    company_name TEXT,
    contact_email TEXT,
    company_website TEXT,
    description TEXT,
    status TEXT,
    ai_summary TEXT,
    alignment_score INTEGER
)`;

/**
 * Open the database file, run fn, and always close
 * Creates the file if it does not exist
 */
export function withConnection<T>(dbFile: string, fn: (db: Database.Database) => T): T {
  const db = new Database(dbFile);
  try {
    return fn(db);
  } finally {
    db.close();
  }
}

/**
 * Create the opportunities table if missing
 */
export function setupDatabase(dbFile: string): void {
  withConnection(dbFile, (db) => {
    db.exec(CREATE_OPPORTUNITIES);
  });
  console.log(`[db] Database '${dbFile}' and table '${OPPORTUNITIES_TABLE}' ready`);
}
