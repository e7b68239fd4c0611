import type { ActivityRecord } from "../api/types";
import { DATE_PATTERN, startOfDay } from "../models/dates";

function isRecordObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string): string {
    const value = raw[key];
    if (value === undefined || value === null) return "";
    return String(value);
}

function parseStart(value: unknown, id: number): Date | null {
    if (value === undefined || value === null || value === "") return null;
    if (typeof value !== "string") {
        throw new Error(`Activity ${id}: start must be an ISO timestamp string`);
    }
    // A bare date is local midnight, not UTC midnight
    const start = DATE_PATTERN.test(value) ? startOfDay(value) : new Date(value);
    if (Number.isNaN(start.getTime())) {
        throw new Error(`Activity ${id}: unparseable start "${value}"`);
    }
    return start;
}

function parseDistance(value: unknown, id: number): number | null {
    if (value === undefined || value === null) return null;
    const distance = typeof value === "number" ? value : Number(value);
    if (!Number.isFinite(distance)) {
        throw new Error(`Activity ${id}: distance_km must be a number`);
    }
    return distance;
}

/**
 * Convert one raw row. Also accepts our own re-exported format, where the
 * distance is already called "distanceKm".
 */
function parseRecord(raw: Record<string, unknown>): ActivityRecord {
    const id = typeof raw.id === "number" ? raw.id : Number(raw.id);
    if (raw.id === undefined || raw.id === null || !Number.isFinite(id)) {
        throw new Error("Activity record without a numeric id");
    }

    const distance = "distanceKm" in raw ? raw.distanceKm : raw.distance_km;

    return {
        id,
        equipment: readString(raw, "equipment"),
        kind: readString(raw, "kind"),
        name: readString(raw, "name"),
        start: parseStart(raw.start, id),
        distanceKm: parseDistance(distance, id),
    };
}

/**
 * Parse an activity table from already-decoded JSON. Handles:
 * - Flat array of records: [ { id, kind, ... }, ... ]
 * - Wrapped export: { activities: [...] }
 *
 * Table order is kept as-is; a repeated id keeps its first occurrence.
 */
export function parseActivityData(data: unknown): ActivityRecord[] {
    let rawRecords: unknown[];

    if (Array.isArray(data)) {
        rawRecords = data;
    } else if (isRecordObject(data) && Array.isArray(data.activities)) {
        rawRecords = data.activities;
    } else {
        throw new Error("Unrecognized activity data format");
    }

    const seen = new Set<number>();
    const records: ActivityRecord[] = [];
    for (const raw of rawRecords) {
        if (!isRecordObject(raw)) {
            throw new Error("Unrecognized activity data format: expected an object per activity");
        }
        const record = parseRecord(raw);
        if (seen.has(record.id)) {
            console.warn(`[activities] Dropping duplicate activity id ${record.id}`);
            continue;
        }
        seen.add(record.id);
        records.push(record);
    }
    return records;
}
