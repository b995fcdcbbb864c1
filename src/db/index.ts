export { createDbClient, initializeDatabase } from "./schema.js";
export { ReportStore } from "./store.js";
export type { ReportStats, StoredReport } from "./store.js";
