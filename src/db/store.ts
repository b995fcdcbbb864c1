import type { Client, Row } from "@libsql/client";
import { serializeSignalBundle, type SerializedSignalBundle, type SignalBundle } from "../signals/index.js";

export interface StoredReport {
  id: number;
  userEmail: string;
  analyzedAt: string;
  qualityScore: number;
  createdAt: string;
  report: SerializedSignalBundle;
}

export interface ReportStats {
  total: number;
  users: number;
  avgQualityScore: number;
  last24h: number;
}

function toStoredReport(row: Row): StoredReport {
  const report: SerializedSignalBundle = JSON.parse(row.report_json as string);
  return {
    id: Number(row.id),
    userEmail: row.user_email as string,
    analyzedAt: row.analyzed_at as string,
    qualityScore: row.quality_score as number,
    createdAt: row.created_at as string,
    report,
  };
}

export class ReportStore {
  constructor(
    private readonly db: Client,
    private readonly now: () => Date = () => new Date()
  ) {}

  async saveReport(bundle: SignalBundle): Promise<number> {
    const serialized = serializeSignalBundle(bundle);

    const result = await this.db.execute({
      sql: `INSERT INTO signal_reports
            (user_email, analyzed_at, quality_score, total_emails, sent_emails,
             llm_analysis_available, report_json, created_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      args: [
        serialized.user_email,
        serialized.analyzed_at,
        serialized.analysis_quality_score,
        serialized.total_emails_analyzed,
        serialized.sent_emails_analyzed,
        serialized.communication_style.llm_analysis_available ? 1 : 0,
        JSON.stringify(serialized),
        this.now().toISOString(),
      ],
    });

    if (result.lastInsertRowid === undefined) {
      throw new Error("Report insert did not return a row id");
    }
    return Number(result.lastInsertRowid);
  }

  async getReport(id: number): Promise<StoredReport | null> {
    const result = await this.db.execute({
      sql: "SELECT * FROM signal_reports WHERE id = ?",
      args: [id],
    });

    return result.rows.length > 0 ? toStoredReport(result.rows[0]) : null;
  }

  async getLatestReport(userEmail: string): Promise<StoredReport | null> {
    const result = await this.db.execute({
      sql: `SELECT * FROM signal_reports
            WHERE user_email = ?
            ORDER BY analyzed_at DESC, id DESC
            LIMIT 1`,
      args: [userEmail.toLowerCase()],
    });

    return result.rows.length > 0 ? toStoredReport(result.rows[0]) : null;
  }

  async getRecentReports(userEmail: string, limit: number = 10): Promise<StoredReport[]> {
    const result = await this.db.execute({
      sql: `SELECT * FROM signal_reports
            WHERE user_email = ?
            ORDER BY analyzed_at DESC, id DESC
            LIMIT ?`,
      args: [userEmail.toLowerCase(), limit],
    });

    return result.rows.map(toStoredReport);
  }

  async getReportStats(): Promise<ReportStats> {
    const totals = await this.db.execute(
      `SELECT COUNT(*) as count,
              COUNT(DISTINCT user_email) as users,
              AVG(quality_score) as avg_quality
       FROM signal_reports`
    );
    const row = totals.rows[0];

    const yesterday = new Date(this.now().getTime() - 24 * 60 * 60 * 1000).toISOString();
    const last24hResult = await this.db.execute({
      sql: "SELECT COUNT(*) as count FROM signal_reports WHERE created_at >= ?",
      args: [yesterday],
    });

    return {
      total: row.count as number,
      users: row.users as number,
      avgQualityScore: Math.round(((row.avg_quality as number | null) ?? 0) * 100) / 100,
      last24h: last24hResult.rows[0].count as number,
    };
  }
}
