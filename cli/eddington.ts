/**
 * Eddington number report for an activity export.
 * Usage: npx tsx cli/eddington.ts <activities.json> [query-string] [historyRows]
 * Example: npx tsx cli/eddington.ts activities.json "kind=Ride" 20
 */
import { readFileSync } from "node:fs";
import { parseActivityData } from "../src/data/loadActivities.js";
import { analyzeEddington } from "../src/models/eddington/index.js";
import type { EddingtonAnalysis } from "../src/models/eddington/index.js";
import { isActive, parseSearchQuery, toUrlString } from "../src/models/search/index.js";

const file = process.argv[2];
const queryString = process.argv[3] ?? "";
const historyRows = Number(process.argv[4] ?? "10");

if (!file) {
    console.error("Usage: npx tsx cli/eddington.ts <activities.json> [query-string] [historyRows]");
    process.exit(1);
}

const data: unknown = JSON.parse(readFileSync(file, "utf-8"));
const activities = parseActivityData(data);
const query = parseSearchQuery(new URLSearchParams(queryString));

let analysis: EddingtonAnalysis;
try {
    analysis = analyzeEddington(activities, query);
} catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
}

console.log(`Query: ${isActive(query) ? toUrlString(query) : "(none)"}`);
console.log(`Activities: ${analysis.activityCount}, days with distance: ${analysis.dayCount}`);
console.log(`${analysis.chart.title}\n`);

console.log("--- Next targets ---");
console.log(`  ${"km".padStart(5)} ${"days".padStart(6)} ${"missing".padStart(8)}`);
for (const e of analysis.upcomingTargets) {
    console.log(`  ${String(e.distanceKm).padStart(5)} ${String(e.total).padStart(6)} ${String(e.missing).padStart(8)}`);
}

console.log("\n--- Yearly ---");
for (const [year, en] of analysis.yearly) {
    console.log(`  ${year}  ${en}`);
}

const rows = Number.isFinite(historyRows) && historyRows > 0 ? Math.floor(historyRows) : 10;
console.log(`\n--- History (last ${rows} days) ---`);
for (const p of analysis.history.slice(-rows)) {
    console.log(`  ${p.date}  ${p.eddingtonNumber}`);
}
