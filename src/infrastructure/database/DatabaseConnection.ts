import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

/**
 * Connection to the SQLite store that receives exported evaluation results
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath === ':memory:' ? dbPath : path.resolve(dbPath);

    if (this.dbPath !== ':memory:') {
      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
    }
    this.db.pragma('busy_timeout = 5000');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS eval_results (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        job_id TEXT NOT NULL,
        submitted_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT,
        status TEXT NOT NULL,
        target_url TEXT NOT NULL,
        total_questions INTEGER NOT NULL,
        questions_completed INTEGER NOT NULL,
        overall_score REAL,
        question_index INTEGER NOT NULL,
        question TEXT,
        expected_response TEXT,
        expected_agent TEXT,
        expected_reason TEXT,
        actual_response TEXT,
        actual_agent TEXT,
        actual_routing_reason TEXT,
        question_score REAL,
        scorer_name TEXT,
        scorer_score REAL,
        scorer_weight REAL,
        scorer_weighted_score REAL,
        scorer_rationale TEXT,
        report_json_path TEXT,
        report_html_path TEXT,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_eval_results_job ON eval_results(job_id);
      CREATE INDEX IF NOT EXISTS idx_eval_results_submitted ON eval_results(submitted_at);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): { totalRows: number; totalJobs: number; databaseSize: number } {
    const row = this.db
      .prepare('SELECT COUNT(*) AS totalRows, COUNT(DISTINCT job_id) AS totalJobs FROM eval_results')
      .get() as { totalRows: number; totalJobs: number };

    // Get database file size
    let databaseSize = 0;
    if (this.dbPath !== ':memory:' && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return { totalRows: row.totalRows, totalJobs: row.totalJobs, databaseSize };
  }
}
