import { createClient, type Client } from "@libsql/client";

export function createDbClient(url: string, authToken?: string): Client {
  if (!url) {
    throw new Error("DATABASE_URL is required");
  }

  return createClient({
    url,
    authToken,
  });
}

export async function initializeDatabase(client: Client): Promise<void> {
  await client.executeMultiple(`
    -- One row per extraction run
    CREATE TABLE IF NOT EXISTS signal_reports (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_email TEXT NOT NULL,
      analyzed_at TEXT NOT NULL,
      quality_score REAL NOT NULL,
      total_emails INTEGER NOT NULL DEFAULT 0,
      sent_emails INTEGER NOT NULL DEFAULT 0,
      llm_analysis_available INTEGER NOT NULL DEFAULT 0,
      report_json TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_signal_reports_user ON signal_reports(user_email, analyzed_at);
  `);
}
