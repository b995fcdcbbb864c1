import http from "http";
import { z } from "zod";
import type { ReportStore, StoredReport } from "./db/index.js";
import {
  emailBatchSchema,
  serializeSignalBundle,
  SignalExtractor,
  SignalInputError,
  type ExtractorOptions,
} from "./signals/index.js";

export interface ApiRequest {
  method: string;
  url: string; // path and query
  rawBody?: string;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

export interface ApiServices {
  store: Pick<ReportStore, "saveReport" | "getLatestReport" | "getRecentReports" | "getReportStats">;
  extractorOptions: ExtractorOptions;
  maxEmailsToAnalyze: number;
}

const MAX_BODY_BYTES = 10 * 1024 * 1024;
const DEFAULT_REPORT_LIMIT = 10;
const MAX_REPORT_LIMIT = 100;

const analyzeRequestSchema = emailBatchSchema.extend({
  maxEmails: z.number().int().positive().optional(),
  enableLlm: z.boolean().optional(),
});

const json = (status: number, body: unknown): ApiResponse => ({ status, body });

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

function reportSummary(stored: StoredReport) {
  return {
    reportId: stored.id,
    analyzedAt: stored.analyzedAt,
    qualityScore: stored.qualityScore,
    report: stored.report,
  };
}

async function analyze(rawBody: string | undefined, services: ApiServices): Promise<ApiResponse> {
  let payload: unknown;
  try {
    payload = JSON.parse(rawBody ?? "");
  } catch {
    return json(400, { error: "Request body must be valid JSON" });
  }

  const parsed = analyzeRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return json(400, { error: "Invalid request", details: describeIssues(parsed.error) });
  }

  const { userEmail, emails, sentEmails, maxEmails, enableLlm } = parsed.data;
  if (emails.length === 0) {
    return json(422, { error: "No emails to analyze" });
  }

  const extractor = new SignalExtractor({
    ...services.extractorOptions,
    maxEmailsToAnalyze: Math.min(maxEmails ?? services.maxEmailsToAnalyze, services.maxEmailsToAnalyze),
    enrichment: enableLlm === false ? null : services.extractorOptions.enrichment,
  });

  try {
    const bundle = await extractor.extract({ userEmail, emails, sentEmails });
    const reportId = await services.store.saveReport(bundle);
    return json(200, { reportId, report: serializeSignalBundle(bundle) });
  } catch (error) {
    if (error instanceof SignalInputError) {
      return json(422, { error: error.message, details: error.details });
    }
    throw error;
  }
}

function readEmail(query: URLSearchParams): string | null {
  const email = query.get("email")?.trim();
  return email ? email : null;
}

async function latestReport(query: URLSearchParams, services: ApiServices): Promise<ApiResponse> {
  const email = readEmail(query);
  if (!email) {
    return json(400, { error: "Query parameter 'email' is required" });
  }

  const stored = await services.store.getLatestReport(email);
  if (!stored) {
    return json(404, { error: `No report for ${email}` });
  }
  return json(200, reportSummary(stored));
}

async function recentReports(query: URLSearchParams, services: ApiServices): Promise<ApiResponse> {
  const email = readEmail(query);
  if (!email) {
    return json(400, { error: "Query parameter 'email' is required" });
  }

  const rawLimit = query.get("limit");
  const limit = rawLimit === null ? DEFAULT_REPORT_LIMIT : Number(rawLimit);
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_REPORT_LIMIT) {
    return json(400, { error: `limit must be an integer between 1 and ${MAX_REPORT_LIMIT}` });
  }

  const reports = await services.store.getRecentReports(email, limit);
  return json(200, { reports: reports.map(reportSummary) });
}

type RouteHandler = (
  req: ApiRequest,
  query: URLSearchParams,
  services: ApiServices
) => Promise<ApiResponse>;

const routes: Record<string, Record<string, RouteHandler>> = {
  "/health": {
    GET: async () => json(200, { status: "ok" }),
  },
  "/stats": {
    GET: async (_req, _query, services) => json(200, await services.store.getReportStats()),
  },
  "/analyze": {
    POST: (req, _query, services) => analyze(req.rawBody, services),
  },
  "/reports/latest": {
    GET: (_req, query, services) => latestReport(query, services),
  },
  "/reports": {
    GET: (_req, query, services) => recentReports(query, services),
  },
};

/** Routes one request. Never throws: unexpected failures become a 500. */
export async function handleApiRequest(
  request: ApiRequest,
  services: ApiServices
): Promise<ApiResponse> {
  const url = new URL(request.url, "http://localhost");
  const route = routes[url.pathname.replace(/\/+$/, "") || "/"];

  if (!route) {
    return json(404, { error: "Not found" });
  }

  const handler = route[request.method.toUpperCase()];
  if (!handler) {
    return json(405, { error: `Method ${request.method} not allowed` });
  }

  try {
    return await handler(request, url.searchParams, services);
  } catch (error) {
    console.error(`${request.method} ${url.pathname} failed:`, error);
    return json(500, { error: "Internal server error" });
  }
}

class PayloadTooLargeError extends Error {
  constructor() {
    super(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    // Oversized bodies are drained without buffering
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size <= MAX_BODY_BYTES) {
        chunks.push(chunk);
      } else if (chunks.length > 0) {
        chunks.length = 0;
      }
    });
    req.on("end", () => {
      if (size > MAX_BODY_BYTES) {
        reject(new PayloadTooLargeError());
        return;
      }
      resolve(Buffer.concat(chunks).toString("utf8"));
    });
    req.on("error", reject);
  });
}

export function createApiServer(services: ApiServices): http.Server {
  return http.createServer(async (req, res) => {
    const send = (response: ApiResponse) => {
      res.writeHead(response.status, { "Content-Type": "application/json" });
      res.end(JSON.stringify(response.body));
    };

    try {
      const method = req.method ?? "GET";
      const rawBody = method === "POST" ? await readBody(req) : undefined;
      send(await handleApiRequest({ method, url: req.url ?? "/", rawBody }, services));
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        res.setHeader("Connection", "close");
        send(json(413, { error: error.message }));
        return;
      }
      console.error("Request handling failed:", error);
      send(json(500, { error: "Internal server error" }));
    }
  });
}
