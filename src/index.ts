import { config } from "dotenv";
config();

import { createEnrichment, loadSettings, type Settings } from "./config.js";
import { createDbClient, initializeDatabase, ReportStore } from "./db/index.js";
import { createApiServer } from "./server.js";

async function main(): Promise<void> {
  console.log("Inbox Signals - email metadata signal extraction");
  console.log("================================================\n");

  let settings: Settings;
  try {
    settings = loadSettings(process.env, { requireDatabase: true });
    console.log("Configuration validated");
  } catch (error) {
    console.error("Configuration error:", error);
    console.log("\nPlease set the required environment variables.");
    process.exit(1);
  }

  const dbClient = createDbClient(settings.databaseUrl ?? "", settings.databaseAuthToken);
  await initializeDatabase(dbClient);
  const store = new ReportStore(dbClient);
  console.log("Database initialized");

  const stats = await store.getReportStats();
  console.log(`Stored reports: ${stats.total} for ${stats.users} users (${stats.last24h} in last 24h)`);

  const enrichment = createEnrichment(settings);
  console.log(
    enrichment
      ? `LLM analysis enabled (${settings.llm.model}, ${settings.llm.requestsPerMinute}/min, ${settings.llm.requestsPerDay}/day)`
      : "LLM analysis disabled"
  );
  console.log(`Max emails per analysis: ${settings.maxEmailsToAnalyze}`);

  const server = createApiServer({
    store,
    maxEmailsToAnalyze: settings.maxEmailsToAnalyze,
    extractorOptions: {
      enrichment,
      maxEnrichmentEmails: settings.llm.maxEmailsToAnalyze,
    },
  });

  server.listen(settings.port, () => {
    console.log(`HTTP server listening on port ${settings.port}`);
  });

  const shutdown = () => {
    console.log("\nShutting down...");
    server.close(() => {
      dbClient.close();
      process.exit(0);
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
