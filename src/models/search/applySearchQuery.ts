import type { ActivityRecord, ActivityTable } from "../../api/types";
import { endOfDay, startOfDay } from "../dates";
import { categoryValues, type SearchQuery } from "./query";

export class InvalidQueryError extends Error {
    readonly pattern: string;

    constructor(pattern: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Invalid name pattern "${pattern}": ${reason}`, { cause });
        this.name = "InvalidQueryError";
        this.pattern = pattern;
    }
}

type RowPredicate = (activity: ActivityRecord) => boolean;

/** Equality against any of the listed values */
function matchesAny(field: "equipment" | "kind", values: readonly string[]): RowPredicate {
    const allowed = new Set(values);
    return (activity) => allowed.has(activity[field]);
}

function compileNamePattern(pattern: string, caseSensitive: boolean): RegExp {
    try {
        return new RegExp(pattern, caseSensitive ? "" : "i");
    } catch (err) {
        throw new InvalidQueryError(pattern, err);
    }
}

/**
 * Translate the populated fields of a query into row predicates.
 * An empty equipment/kind list is an absent filter, not "match nothing".
 */
function buildPredicates(query: SearchQuery): RowPredicate[] {
    const predicates: RowPredicate[] = [];

    const equipment = categoryValues(query.equipment);
    if (equipment.length > 0) {
        predicates.push(matchesAny("equipment", equipment));
    }
    const kind = categoryValues(query.kind);
    if (kind.length > 0) {
        predicates.push(matchesAny("kind", kind));
    }
    if (query.name) {
        // No "g" flag: RegExp.test must not carry lastIndex between rows.
        const pattern = compileNamePattern(query.name, query.nameCaseSensitive);
        predicates.push((activity) => pattern.test(activity.name));
    }
    if (query.startBegin) {
        const beginMs = startOfDay(query.startBegin).getTime();
        predicates.push((activity) => activity.start !== null && activity.start.getTime() >= beginMs);
    }
    if (query.startEnd) {
        const endMs = endOfDay(query.startEnd).getTime();
        predicates.push((activity) => activity.start !== null && activity.start.getTime() <= endMs);
    }

    return predicates;
}

/**
 * Return the activities matching every active part of the query, in table
 * order. Records are returned as-is, so ids and identity are preserved.
 * @throws InvalidQueryError when the name pattern is not a valid regular expression
 */
export function applySearchQuery(table: ActivityTable, query: SearchQuery): ActivityRecord[] {
    const predicates = buildPredicates(query);
    if (predicates.length === 0) return [...table];
    return table.filter((activity) => predicates.every((predicate) => predicate(activity)));
}

/** @internal Exported for testing only. */
export const _internals = {
    buildPredicates,
    compileNamePattern,
};
