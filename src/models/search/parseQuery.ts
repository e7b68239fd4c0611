import { isCalendarDate } from "../dates";
import { categoryValues, emptySearchQuery, type SearchQuery } from "./query";

export type SearchParams = URLSearchParams | Record<string, string | string[] | undefined>;

function getAll(params: SearchParams, key: string): string[] {
    if (params instanceof URLSearchParams) return params.getAll(key);
    const value = params[key];
    if (value === undefined) return [];
    return Array.isArray(value) ? value : [value];
}

function getFirst(params: SearchParams, key: string): string | null {
    return getAll(params, key)[0] ?? null;
}

function parseDateParam(params: SearchParams, key: string): string | null {
    const raw = getFirst(params, key)?.trim();
    if (!raw) return null;
    if (!isCalendarDate(raw)) {
        console.warn(`[search] Ignoring malformed ${key}: "${raw}"`);
        return null;
    }
    return raw;
}

/**
 * Build a SearchQuery from untyped request parameters, using the same keys
 * `toUrlString` writes. Values are kept verbatim; unknown keys are ignored.
 */
export function parseSearchQuery(params: SearchParams): SearchQuery {
    const name = getFirst(params, "name");

    return {
        ...emptySearchQuery(),
        equipment: categoryValues(getAll(params, "equipment")),
        kind: categoryValues(getAll(params, "kind")),
        name: name && name.length > 0 ? name : null,
        nameCaseSensitive: getFirst(params, "name_case_sensitive") === "true",
        startBegin: parseDateParam(params, "start_begin"),
        startEnd: parseDateParam(params, "start_end"),
    };
}
