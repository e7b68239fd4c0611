import { readFileSync } from "node:fs";
import { parseActivityData } from "../src/data/loadActivities.js";
import { applySearchQuery, isActive, parseSearchQuery, toUrlString } from "../src/models/search/index.js";
import { toLocalDateStr } from "../src/models/dates.js";
import type { ActivityRecord } from "../src/api/types.js";

const file = process.argv[2];
const queryString = process.argv[3] ?? "";

if (!file) {
    console.error("Usage: npx tsx cli/search.ts <activities.json> [query-string]");
    console.error('Example: npx tsx cli/search.ts activities.json "kind=Run&start_begin=2024-01-01"');
    process.exit(1);
}

const data: unknown = JSON.parse(readFileSync(file, "utf-8"));
const activities = parseActivityData(data);
const query = parseSearchQuery(new URLSearchParams(queryString));

let matches: ActivityRecord[];
try {
    matches = applySearchQuery(activities, query);
} catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
}

console.log(`Query: ${isActive(query) ? toUrlString(query) : "(none)"}`);
console.log(`Matches: ${matches.length} of ${activities.length}\n`);

console.log(`  ${"id".padEnd(10)} ${"date".padEnd(10)} ${"kind".padEnd(12)} ${"equipment".padEnd(16)} ${"km".padStart(7)}  name`);
for (const a of matches) {
    const date = a.start ? toLocalDateStr(a.start) : "—";
    const km = a.distanceKm !== null ? a.distanceKm.toFixed(1) : "—";
    console.log(
        `  ${String(a.id).padEnd(10)} ${date.padEnd(10)} ${a.kind.padEnd(12)} ${a.equipment.padEnd(16)} ${km.padStart(7)}  ${a.name}`
    );
}
