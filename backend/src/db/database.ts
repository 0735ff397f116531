/**
 * Database Connection & Migration Manager
 *
 * Owns the SQLite connection used by the track repository and applies schema
 * migrations. Migrations are stored in the migrations/ folder and applied in order.
 */

import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { StoreUnavailableError } from "../errors.js";

// Migrations directory
const MIGRATIONS_DIR = path.resolve(__dirname, "migrations");

interface Migration {
  version: number;
  name: string;
  sql: string;
}

interface AppliedMigration {
  version: number;
  name: string;
  applied_at: string;
}

export class DatabaseManager {
  private db: Database.Database | null = null;

  /**
   * @param dbPath - SQLite file path, or ":memory:" for an in-process database
   */
  constructor(private readonly dbPath: string) {}

  /**
   * Open the connection and run pending migrations.
   * Safe to call more than once.
   */
  initialize(): void {
    if (!this.db) {
      this.db = this.open();
    }

    // Create schema_migrations table if it doesn't exist
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    this.runMigrations();
  }

  /**
   * Get the open connection.
   * Throws StoreUnavailableError before initialize() or after close().
   */
  getConnection(): Database.Database {
    if (!this.db) {
      throw new StoreUnavailableError();
    }
    return this.db;
  }

  private open(): Database.Database {
    if (this.dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    const db = new Database(this.dbPath);

    // Enable WAL mode for better concurrency
    db.pragma("journal_mode = WAL");

    // Set busy timeout to handle concurrent access
    db.pragma("busy_timeout = 30000");

    return db;
  }

  /**
   * Load migration files from the migrations directory
   */
  private loadMigrations(): Migration[] {
    if (!fs.existsSync(MIGRATIONS_DIR)) {
      console.warn(`Migrations directory not found: ${MIGRATIONS_DIR}`);
      return [];
    }

    const files = fs.readdirSync(MIGRATIONS_DIR)
      .filter(f => f.endsWith(".sql"))
      .sort();

    const migrations: Migration[] = [];

    for (const file of files) {
      // e.g. "001_tracks.sql" -> version 1
      const match = file.match(/^(\d+)_(.+)\.sql$/);
      if (!match) {
        console.warn(`Skipping invalid migration filename: ${file}`);
        continue;
      }

      const version = parseInt(match[1], 10);
      const name = match[2];
      const sql = fs.readFileSync(path.join(MIGRATIONS_DIR, file), "utf-8");

      migrations.push({ version, name, sql });
    }

    return migrations;
  }

  private getAppliedMigrations(): AppliedMigration[] {
    const stmt = this.getConnection().prepare(
      "SELECT version, name, applied_at FROM schema_migrations ORDER BY version"
    );
    return stmt.all() as AppliedMigration[];
  }

  private runMigrations(): void {
    const db = this.getConnection();
    const appliedVersions = new Set(this.getAppliedMigrations().map(m => m.version));
    const pending = this.loadMigrations().filter(m => !appliedVersions.has(m.version));

    if (pending.length === 0) {
      return;
    }

    console.log(`Running ${pending.length} pending migration(s)...`);

    const record = db.prepare("INSERT INTO schema_migrations (version, name) VALUES (?, ?)");

    for (const migration of pending) {
      console.log(`  Applying migration ${migration.version}: ${migration.name}`);

      const apply = db.transaction(() => {
        db.exec(migration.sql);
        record.run(migration.version, migration.name);
      });

      try {
        apply();
      } catch (error) {
        console.error(`  Migration ${migration.version} failed:`, error);
        throw error;
      }
    }

    console.log("All migrations applied successfully");
  }

  /**
   * Get current schema version
   */
  getSchemaVersion(): number {
    const stmt = this.getConnection().prepare("SELECT MAX(version) as version FROM schema_migrations");
    const result = stmt.get() as { version: number | null };
    return result.version ?? 0;
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}

// Export the Database type for type annotations
export type { Database };
