/**
 * Run signal extraction over an exported mailbox batch and print a summary.
 * The export is JSON shaped as { userEmail, emails, sentEmails }.
 *
 * Usage: npx tsx scripts/analyze-export.ts <export.json> [--save] [--json]
 */

import "dotenv/config";
import { readFile } from "fs/promises";
import { createEnrichment, loadSettings } from "../src/config.js";
import { createDbClient, initializeDatabase, ReportStore } from "../src/db/index.js";
import {
  emailBatchSchema,
  formatSignalSummary,
  serializeSignalBundle,
  SignalExtractor,
} from "../src/signals/index.js";

async function main() {
  const args = process.argv.slice(2);
  const save = args.includes("--save");
  const asJson = args.includes("--json");
  const file = args.find((a) => !a.startsWith("--"));

  if (!file) {
    console.error("Usage: npx tsx scripts/analyze-export.ts <export.json> [--save] [--json]");
    process.exit(1);
  }

  const settings = loadSettings(process.env, { requireDatabase: save });

  const parsed = emailBatchSchema.safeParse(JSON.parse(await readFile(file, "utf8")));
  if (!parsed.success) {
    console.error(`❌ ${file} is not a valid export:`);
    for (const issue of parsed.error.issues) {
      console.error(`  - ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  const batch = parsed.data;
  console.log(
    `Analyzing ${batch.emails.length} emails (${batch.sentEmails.length} sent) for ${batch.userEmail}\n`
  );

  const extractor = new SignalExtractor({
    enrichment: createEnrichment(settings),
    maxEnrichmentEmails: settings.llm.maxEmailsToAnalyze,
    maxEmailsToAnalyze: settings.maxEmailsToAnalyze,
  });
  const bundle = await extractor.extract(batch);

  console.log(asJson ? JSON.stringify(serializeSignalBundle(bundle), null, 2) : formatSignalSummary(bundle));

  if (save) {
    const db = createDbClient(settings.databaseUrl ?? "", settings.databaseAuthToken);
    await initializeDatabase(db);
    const reportId = await new ReportStore(db).saveReport(bundle);
    console.log(`\n✅ Saved report #${reportId}`);
    db.close();
  }
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
