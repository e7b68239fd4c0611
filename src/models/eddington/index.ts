// Eddington number statistics — orchestrator and public API
import type { ActivityTable } from "../../api/types";
import { applySearchQuery } from "../search/applySearchQuery";
import type { SearchQuery } from "../search/query";
import { buildEddingtonChart, buildHistoryChart } from "./chart";
import { dailyTotals } from "./dailyTotals";
import { eddingtonHistogram, eddingtonHistory, upcomingTargets, yearlyEddingtonNumbers } from "./eddington";
import type { EddingtonAnalysis } from "./types";

// ─── Public re-exports ─────────────────────────────────────────────

export type {
    EddingtonAnalysis,
    EddingtonChart,
    EddingtonHistogram,
    EddingtonHistogramEntry,
    EddingtonHistoryChart,
    EddingtonHistoryPoint,
    ChartPoint,
} from "./types";
export { UPCOMING_TARGET_WINDOW_KM, CHART_Y_HEADROOM_KM } from "./types";
export { dailyTotals, toWholeKilometres } from "./dailyTotals";
export {
    eddingtonNumber,
    eddingtonHistogram,
    eddingtonHistory,
    upcomingTargets,
    yearlyEddingtonNumbers,
} from "./eddington";
export { buildEddingtonChart, buildHistoryChart } from "./chart";

// ─── Main analysis function ────────────────────────────────────────

/**
 * Full pipeline behind the Eddington page: filter the table, total each day,
 * then derive the histogram, the next targets, yearly numbers, the running
 * history and chart data. Recomputed from scratch on every call.
 * @throws InvalidQueryError when the query's name pattern does not compile
 */
export function analyzeEddington(table: ActivityTable, query?: SearchQuery): EddingtonAnalysis {
    const activities = query ? applySearchQuery(table, query) : [...table];
    const totals = dailyTotals(activities);
    const histogram = eddingtonHistogram([...totals.values()]);
    const history = eddingtonHistory(activities);

    return {
        eddingtonNumber: histogram.eddingtonNumber,
        histogram: histogram.entries,
        upcomingTargets: upcomingTargets(histogram),
        yearly: yearlyEddingtonNumbers(activities),
        history,
        chart: buildEddingtonChart(histogram),
        historyChart: buildHistoryChart(history),
        activityCount: activities.length,
        dayCount: totals.size,
    };
}
