import type { ActivityRecord, TimedActivity } from "../../api/types";
import { toLocalDateStr } from "../dates";

/** Truncate toward zero; negative totals count as 0 km. */
export function toWholeKilometres(distanceKm: number): number {
    return Math.max(0, Math.trunc(distanceKm));
}

/** Activities usable for distance statistics: start and distance both present */
export function timedActivities(records: readonly ActivityRecord[]): TimedActivity[] {
    return records.filter(
        (r): r is TimedActivity => r.start !== null && r.distanceKm !== null && Number.isFinite(r.distanceKm),
    );
}

/**
 * Sum distance per local calendar date, truncated to whole kilometres after
 * summing. Records without a start or a distance are dropped. Keys come out
 * in chronological order.
 */
export function dailyTotals(records: readonly ActivityRecord[]): Map<string, number> {
    const sums = new Map<string, number>();
    for (const r of timedActivities(records)) {
        const date = toLocalDateStr(r.start);
        sums.set(date, (sums.get(date) ?? 0) + r.distanceKm);
    }

    const dates = [...sums.keys()].sort();
    const totals = new Map<string, number>();
    for (const date of dates) {
        totals.set(date, toWholeKilometres(sums.get(date) ?? 0));
    }
    return totals;
}
