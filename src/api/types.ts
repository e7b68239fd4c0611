// ─── Exported activity table (raw) ─────────────────────────────────

/** One row of an exported activity table, as found in JSON files */
export interface RawActivityRecord {
    id: number;
    equipment: string;
    kind: string;
    name: string;
    start: string | null; // ISO datetime, local time
    distance_km: number | null;
}

/** Wrapped export: { activities: [...] } */
export interface ActivityExport {
    activities: RawActivityRecord[];
}

// ─── Unified internal types ────────────────────────────────────────

/** Processed activity record used throughout the app */
export interface ActivityRecord {
    /** Stable identifier; row identity never depends on array position */
    id: number;
    equipment: string;
    kind: string;
    name: string;
    start: Date | null;
    distanceKm: number | null;
}

/** An ordered table of activities */
export type ActivityTable = readonly ActivityRecord[];

/** Record with both fields the distance statistics need */
export type TimedActivity = ActivityRecord & { start: Date; distanceKm: number };
