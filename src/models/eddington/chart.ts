import { scaleLinear, scaleTime } from "d3-scale";
import { startOfDay } from "../dates";
import type {
    ChartPoint,
    EddingtonChart,
    EddingtonHistogram,
    EddingtonHistoryChart,
    EddingtonHistoryPoint,
} from "./types";
import { CHART_TICK_COUNT, CHART_Y_HEADROOM_KM, HISTORY_TIME_TICK_COUNT } from "./types";

/**
 * Data for the "days exceeding distance" plot: a step area over the
 * histogram totals, and the y = x line whose crossing marks the number.
 */
export function buildEddingtonChart(histogram: EddingtonHistogram): EddingtonChart {
    const en = histogram.eddingtonNumber;
    const maxDistance = histogram.entries.length > 0 ? histogram.entries.length - 1 : 0;

    const area: ChartPoint[] = histogram.entries.map((e) => ({ x: e.distanceKm, y: e.total }));
    const referenceLine: ChartPoint[] = [];
    for (let x = 1; x <= maxDistance; x++) {
        referenceLine.push({ x, y: x });
    }

    const xScale = scaleLinear().domain([0, maxDistance]);
    const yScale = scaleLinear().domain([0, en + CHART_Y_HEADROOM_KM]);

    return {
        title: `Eddington Number ${en}`,
        area,
        referenceLine,
        xDomain: [0, maxDistance],
        yDomain: [0, en + CHART_Y_HEADROOM_KM],
        xTicks: xScale.ticks(CHART_TICK_COUNT),
        yTicks: yScale.ticks(CHART_TICK_COUNT),
    };
}

/** Data for the running Eddington number plot, drawn as a step-after line. */
export function buildHistoryChart(history: readonly EddingtonHistoryPoint[]): EddingtonHistoryChart {
    const points: ChartPoint<Date>[] = history.map((p) => ({ x: startOfDay(p.date), y: p.eddingtonNumber }));
    const maxNumber = points.reduce((max, p) => Math.max(max, p.y), 0);
    const yScale = scaleLinear().domain([0, maxNumber]);

    const first = points[0];
    const last = points[points.length - 1];
    if (!first || !last) {
        return { points, xDomain: null, yDomain: [0, maxNumber], xTicks: [], yTicks: yScale.ticks(CHART_TICK_COUNT) };
    }

    const xScale = scaleTime().domain([first.x, last.x]);
    return {
        points,
        xDomain: [first.x, last.x],
        yDomain: [0, maxNumber],
        xTicks: xScale.ticks(HISTORY_TIME_TICK_COUNT),
        yTicks: yScale.ticks(CHART_TICK_COUNT),
    };
}
