import type { ActivityRecord } from "../../api/types";
import { dailyTotals, timedActivities, toWholeKilometres } from "./dailyTotals";
import type { EddingtonHistogram, EddingtonHistogramEntry, EddingtonHistoryPoint } from "./types";
import { UPCOMING_TARGET_WINDOW_KM } from "./types";

/**
 * Largest E such that at least E days each had E km or more.
 * Values are truncated to whole kilometres before comparison; no days gives 0.
 */
export function eddingtonNumber(totals: readonly number[]): number {
    const sorted = totals.map(toWholeKilometres).sort((a, b) => b - a);

    let en = 0;
    for (const distance of sorted) {
        if (distance < en + 1) break;
        en++;
    }
    return en;
}

/**
 * Days-exceeding-distance histogram for every whole distance from 0 to the
 * longest day. The Eddington number is the last distance of the prefix where
 * total >= distance; that prefix is contiguous because total never increases.
 */
export function eddingtonHistogram(totals: readonly number[]): EddingtonHistogram {
    if (totals.length === 0) return { entries: [], eddingtonNumber: 0 };

    const whole = totals.map(toWholeKilometres);
    const maxDistance = whole.reduce((max, d) => Math.max(max, d), 0);

    const counts = new Array<number>(maxDistance + 1).fill(0);
    for (const d of whole) counts[d] = (counts[d] ?? 0) + 1;

    // Reverse cumulative sum of counts
    const atLeast = new Array<number>(maxDistance + 1).fill(0);
    let running = 0;
    for (let d = maxDistance; d >= 0; d--) {
        running += counts[d] ?? 0;
        atLeast[d] = running;
    }

    const entries: EddingtonHistogramEntry[] = counts.map((count, d) => {
        const total = atLeast[d] ?? 0;
        return { distanceKm: d, count, total, missing: d - total };
    });

    let en = 0;
    for (const entry of entries) {
        if (entry.total < entry.distanceKm) break;
        en = entry.distanceKm;
    }

    return { entries, eddingtonNumber: en };
}

/** Histogram rows in (E, E + window]: the next numbers and the days each still needs. */
export function upcomingTargets(
    histogram: EddingtonHistogram,
    window: number = UPCOMING_TARGET_WINDOW_KM,
): EddingtonHistogramEntry[] {
    const en = histogram.eddingtonNumber;
    return histogram.entries.filter((e) => e.distanceKm > en && e.distanceKm <= en + window);
}

/** Eddington number per calendar year of the activity start, ascending by year. */
export function yearlyEddingtonNumbers(records: readonly ActivityRecord[]): Map<number, number> {
    const byYear = new Map<number, ActivityRecord[]>();
    for (const r of timedActivities(records)) {
        const year = r.start.getFullYear();
        const group = byYear.get(year);
        if (group) group.push(r);
        else byYear.set(year, [r]);
    }

    const yearly = new Map<number, number>();
    for (const year of [...byYear.keys()].sort((a, b) => a - b)) {
        const group = byYear.get(year) ?? [];
        yearly.set(year, eddingtonNumber([...dailyTotals(group).values()]));
    }
    return yearly;
}

/**
 * Running Eddington number, one point per day in chronological order.
 *
 * Keeps an ascending list of the daily totals that can still count. The first
 * day (or any day meeting an empty list) is always taken; later days are taken
 * only if they reach the current minimum. Totals smaller than the list size
 * are then dropped from the bottom, and the list size is the number so far.
 */
export function eddingtonHistory(records: readonly ActivityRecord[]): EddingtonHistoryPoint[] {
    const history: EddingtonHistoryPoint[] = [];
    const topDays: number[] = [];

    for (const [date, distance] of dailyTotals(records)) {
        const smallest = topDays[0];
        if (smallest === undefined) {
            topDays.push(distance);
        } else if (distance >= smallest) {
            topDays.push(distance);
            topDays.sort((a, b) => a - b);
        }

        while (topDays.length > 0 && (topDays[0] ?? 0) < topDays.length) {
            topDays.shift();
        }

        history.push({ date, eddingtonNumber: topDays.length });
    }

    return history;
}
