import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

/**
 * Database connection manager. Pass ':memory:' for a throwaway database.
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'data/video-search.db') {
    this.dbPath = dbPath === ':memory:' ? dbPath : path.resolve(dbPath);

    if (this.dbPath !== ':memory:') {
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS catalog_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS videos (
        video_id TEXT PRIMARY KEY,
        index_id TEXT NOT NULL,
        task_handle TEXT NOT NULL,
        filename TEXT NOT NULL,
        file_path TEXT NOT NULL,
        duration_sec REAL,
        ingested_at TIMESTAMP NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_videos_file_path ON videos(file_path);

      CREATE TABLE IF NOT EXISTS ingestion_jobs (
        handle TEXT PRIMARY KEY,
        index_id TEXT NOT NULL,
        source TEXT NOT NULL,
        filename TEXT NOT NULL,
        status TEXT NOT NULL,
        video_id TEXT,
        error TEXT,
        created_at TIMESTAMP NOT NULL,
        updated_at TIMESTAMP NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_ingestion_status ON ingestion_jobs(status);
      CREATE INDEX IF NOT EXISTS idx_ingestion_created ON ingestion_jobs(created_at);

      CREATE TABLE IF NOT EXISTS usage_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TIMESTAMP NOT NULL,
        kind TEXT NOT NULL,
        quantity REAL NOT NULL,
        unit_cost REAL NOT NULL,
        cost REAL NOT NULL
      );
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }
}
