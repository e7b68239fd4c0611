// Search query model and its canonical external representations

// ─── Types ─────────────────────────────────────────────────────────

export interface SearchQuery {
    /** Matches when the activity's equipment equals any listed value */
    equipment: string[];
    /** Matches when the activity's kind equals any listed value */
    kind: string[];
    /** Regular expression searched for anywhere in the activity name */
    name: string | null;
    nameCaseSensitive: boolean;
    /** Inclusive calendar dates, "YYYY-MM-DD" */
    startBegin: string | null;
    startEnd: string | null;
}

/** Flat view of a query for form rendering; absent values become "" */
export interface SearchQueryDisplay {
    equipment: string[];
    kind: string[];
    name: string;
    nameCaseSensitive: boolean;
    startBegin: string;
    startEnd: string;
    active: boolean;
}

export function emptySearchQuery(): SearchQuery {
    return {
        equipment: [],
        kind: [],
        name: null,
        nameCaseSensitive: false,
        startBegin: null,
        startEnd: null,
    };
}

/** Equipment/kind values that constrain anything; "" entries are ignored. */
export function categoryValues(values: readonly string[]): string[] {
    return values.filter((value) => value !== "");
}

/** Case sensitivity on its own does not constrain anything. */
export function isActive(query: SearchQuery): boolean {
    return (
        categoryValues(query.equipment).length > 0 ||
        categoryValues(query.kind).length > 0 ||
        !!query.name ||
        !!query.startBegin ||
        !!query.startEnd
    );
}

export function toDisplay(query: SearchQuery): SearchQueryDisplay {
    return {
        equipment: [...query.equipment],
        kind: [...query.kind],
        name: query.name ?? "",
        nameCaseSensitive: query.nameCaseSensitive,
        startBegin: query.startBegin ?? "",
        startEnd: query.startEnd ?? "",
        active: isActive(query),
    };
}

// ─── URL encoding ──────────────────────────────────────────────────

/**
 * Form-style percent encoding: space becomes "+", and only ASCII letters,
 * digits and "_.-~" stay unescaped.
 */
export function encodeQueryValue(value: string): string {
    return encodeURIComponent(value)
        .replace(/[!'()*]/g, (c) => "%" + c.charCodeAt(0).toString(16).toUpperCase())
        .replace(/%20/g, "+");
}

/**
 * Encode a query as a URL query string (without the leading "?").
 * Field order is fixed so the same query always yields the same string.
 */
export function toUrlString(query: SearchQuery): string {
    const variables: [string, string][] = [];
    for (const equipment of categoryValues(query.equipment)) {
        variables.push(["equipment", equipment]);
    }
    for (const kind of categoryValues(query.kind)) {
        variables.push(["kind", kind]);
    }
    if (query.name) {
        variables.push(["name", query.name]);
    }
    if (query.nameCaseSensitive) {
        variables.push(["name_case_sensitive", "true"]);
    }
    if (query.startBegin) {
        variables.push(["start_begin", query.startBegin]);
    }
    if (query.startEnd) {
        variables.push(["start_end", query.startEnd]);
    }

    return variables.map(([key, value]) => `${key}=${encodeQueryValue(value)}`).join("&");
}
