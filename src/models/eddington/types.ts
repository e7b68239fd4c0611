// Type definitions and constants for Eddington number statistics

// ─── Public interfaces ─────────────────────────────────────────────

export interface EddingtonHistogramEntry {
    distanceKm: number;
    /** Days whose whole-km total is exactly distanceKm */
    count: number;
    /** Days whose whole-km total is at least distanceKm */
    total: number;
    /** distanceKm - total; days still needed to reach this number */
    missing: number;
}

export interface EddingtonHistogram {
    /** One entry per distance from 0 to the longest day, ascending */
    entries: EddingtonHistogramEntry[];
    eddingtonNumber: number;
}

export interface EddingtonHistoryPoint {
    date: string; // "YYYY-MM-DD"
    eddingtonNumber: number;
}

export interface ChartPoint<X = number> {
    x: X;
    y: number;
}

export interface EddingtonChart {
    title: string;
    /** Step area: days exceeding each distance */
    area: ChartPoint[];
    /** y = x line the area has to reach for the next number */
    referenceLine: ChartPoint[];
    xDomain: [number, number];
    yDomain: [number, number];
    xTicks: number[];
    yTicks: number[];
}

export interface EddingtonHistoryChart {
    /** Step-after series; each point holds until the next one */
    points: ChartPoint<Date>[];
    xDomain: [Date, Date] | null;
    yDomain: [number, number];
    xTicks: Date[];
    yTicks: number[];
}

export interface EddingtonAnalysis {
    eddingtonNumber: number;
    histogram: EddingtonHistogramEntry[];
    /** Histogram rows just above the current number */
    upcomingTargets: EddingtonHistogramEntry[];
    yearly: Map<number, number>;
    history: EddingtonHistoryPoint[];
    chart: EddingtonChart;
    historyChart: EddingtonHistoryChart;
    /** Activities left after the search query */
    activityCount: number;
    /** Distinct days with a start time and a distance */
    dayCount: number;
}

// ─── Constants ─────────────────────────────────────────────────────

/** How far above the current number the "next targets" table reaches */
export const UPCOMING_TARGET_WINDOW_KM = 10;
/** Room above the Eddington number on the histogram's y axis */
export const CHART_Y_HEADROOM_KM = 10;
export const CHART_TICK_COUNT = 10;
export const HISTORY_TIME_TICK_COUNT = 8;
