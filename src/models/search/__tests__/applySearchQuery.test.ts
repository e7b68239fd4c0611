import { describe, it, expect } from "vitest";
import { applySearchQuery, InvalidQueryError, _internals } from "../applySearchQuery";
import { emptySearchQuery, type SearchQuery } from "../query";
import { makeActivity, smallTable } from "../../__tests__/fixtures/activities";

function query(overrides: Partial<SearchQuery>): SearchQuery {
    return { ...emptySearchQuery(), ...overrides };
}

function ids(records: { id: number }[]): number[] {
    return records.map((r) => r.id);
}

// ── Empty query ─────────────────────────────────────────────────────

describe("applySearchQuery — empty query", () => {
    it("returns every row in table order", () => {
        const table = smallTable();
        expect(ids(applySearchQuery(table, emptySearchQuery()))).toEqual([1, 2, 3]);
    });

    it("returns the same record objects in a new array", () => {
        const table = smallTable();
        const result = applySearchQuery(table, emptySearchQuery());
        expect(result).not.toBe(table);
        result.forEach((r, i) => expect(r).toBe(table[i]));
    });

    it("ignores case sensitivity on its own", () => {
        expect(ids(applySearchQuery(smallTable(), query({ nameCaseSensitive: true })))).toEqual([1, 2, 3]);
    });

    it("returns empty for an empty table", () => {
        expect(applySearchQuery([], emptySearchQuery())).toEqual([]);
    });
});

// ── Category filters ────────────────────────────────────────────────

describe("applySearchQuery — equipment and kind", () => {
    it("keeps rows whose equipment is listed", () => {
        expect(ids(applySearchQuery(smallTable(), query({ equipment: ["B"] })))).toEqual([2, 3]);
    });

    it("ORs values within one field", () => {
        expect(ids(applySearchQuery(smallTable(), query({ equipment: ["A", "B"] })))).toEqual([1, 2, 3]);
    });

    it("filters on kind", () => {
        expect(ids(applySearchQuery(smallTable(), query({ kind: ["Y"] })))).toEqual([3]);
    });

    it("ANDs different fields", () => {
        expect(ids(applySearchQuery(smallTable(), query({ equipment: ["B"], kind: ["X"] })))).toEqual([2]);
    });

    it("treats empty lists as no constraint", () => {
        expect(ids(applySearchQuery(smallTable(), query({ equipment: [], kind: [] })))).toEqual([1, 2, 3]);
    });

    it("ignores empty values in a list", () => {
        expect(ids(applySearchQuery(smallTable(), query({ equipment: [""] })))).toEqual([1, 2, 3]);
        expect(ids(applySearchQuery(smallTable(), query({ equipment: ["", "A"] })))).toEqual([1]);
    });

    it("matches values exactly, including surrounding spaces", () => {
        const table = [makeActivity({ id: 1, equipment: "Bike " }), makeActivity({ id: 2, equipment: "Bike" })];
        expect(ids(applySearchQuery(table, query({ equipment: ["Bike "] })))).toEqual([1]);
    });

    it("returns nothing for an unknown value", () => {
        expect(applySearchQuery(smallTable(), query({ equipment: ["C"] }))).toEqual([]);
    });

    it("only returns rows whose equipment is in the set", () => {
        const table = ["A", "B", "C", "B", "A"].map((equipment, i) => makeActivity({ id: i + 1, equipment }));
        const result = applySearchQuery(table, query({ equipment: ["A", "C"] }));
        expect(ids(result)).toEqual([1, 3, 5]);
        for (const r of result) expect(["A", "C"]).toContain(r.equipment);
    });
});

// ── Name pattern ────────────────────────────────────────────────────

describe("applySearchQuery — name", () => {
    it("matches case-insensitively by default", () => {
        expect(ids(applySearchQuery(smallTable(), query({ name: "test2" })))).toEqual([2]);
    });

    it("respects case sensitivity", () => {
        expect(applySearchQuery(smallTable(), query({ name: "test2", nameCaseSensitive: true }))).toEqual([]);
        expect(ids(applySearchQuery(smallTable(), query({ name: "Test2", nameCaseSensitive: true })))).toEqual([2]);
    });

    it("searches anywhere within the name", () => {
        const table = [
            makeActivity({ id: 1, name: "Evening ride to the lake" }),
            makeActivity({ id: 2, name: "Lake loop" }),
            makeActivity({ id: 3, name: "Hill repeats" }),
        ];
        expect(ids(applySearchQuery(table, query({ name: "lake" })))).toEqual([1, 2]);
    });

    it("accepts regular expression syntax", () => {
        expect(ids(applySearchQuery(smallTable(), query({ name: "^Test[13]$" })))).toEqual([1, 3]);
    });

    it("gives the same answer for every row with the same name", () => {
        const table = [1, 2, 3, 4].map((id) => makeActivity({ id, name: "Tempo" }));
        expect(ids(applySearchQuery(table, query({ name: "tempo" })))).toEqual([1, 2, 3, 4]);
    });

    it("treats an empty name as absent", () => {
        expect(ids(applySearchQuery(smallTable(), query({ name: "" })))).toEqual([1, 2, 3]);
    });

    it("throws InvalidQueryError on a malformed pattern", () => {
        expect(() => applySearchQuery(smallTable(), query({ name: "(" }))).toThrow(InvalidQueryError);
    });

    it("throws on a malformed pattern even for an empty table", () => {
        expect(() => applySearchQuery([], query({ name: "[a-" }))).toThrow(InvalidQueryError);
    });

    it("carries the pattern and cause", () => {
        let caught: unknown = null;
        try {
            applySearchQuery(smallTable(), query({ name: "(" }));
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(InvalidQueryError);
        if (caught instanceof InvalidQueryError) {
            expect(caught.pattern).toBe("(");
            expect(caught.name).toBe("InvalidQueryError");
            expect(caught.cause).toBeInstanceOf(SyntaxError);
            expect(caught.message.startsWith('Invalid name pattern "(": ')).toBe(true);
        }
    });
});

// ── Date range ──────────────────────────────────────────────────────

describe("applySearchQuery — start date range", () => {
    it("filters on start_begin", () => {
        expect(ids(applySearchQuery(smallTable(), query({ startBegin: "2025-01-01" })))).toEqual([2]);
    });

    it("filters on start_end", () => {
        expect(ids(applySearchQuery(smallTable(), query({ startEnd: "2024-12-24" })))).toEqual([1]);
    });

    it("includes both ends of the range", () => {
        const table = [
            makeActivity({ id: 1, start: new Date("2024-05-31T23:59:59.999") }),
            makeActivity({ id: 2, start: new Date("2024-06-01T00:00:00") }),
            makeActivity({ id: 3, start: new Date("2024-06-30T23:59:59.999") }),
            makeActivity({ id: 4, start: new Date("2024-07-01T00:00:00") }),
        ];
        const result = applySearchQuery(table, query({ startBegin: "2024-06-01", startEnd: "2024-06-30" }));
        expect(ids(result)).toEqual([2, 3]);
    });

    it("excludes rows without a start from any date filter", () => {
        const table = smallTable();
        expect(ids(applySearchQuery(table, query({ startEnd: "2099-12-31" })))).toEqual([1, 2]);
        expect(ids(applySearchQuery(table, query({ startBegin: "1970-01-01" })))).toEqual([1, 2]);
    });

    it("returns nothing when the range is inverted", () => {
        expect(applySearchQuery(smallTable(), query({ startBegin: "2025-01-01", startEnd: "2024-12-31" }))).toEqual([]);
    });
});

// ── Ordering ────────────────────────────────────────────────────────

describe("applySearchQuery — ordering", () => {
    it("returns an order-preserving subset of the table", () => {
        const table = [7, 3, 9, 1, 5].map((id, i) =>
            makeActivity({ id, kind: i % 2 === 0 ? "Run" : "Ride", name: `Activity ${id}` }),
        );
        const queries: SearchQuery[] = [
            query({ kind: ["Run"] }),
            query({ kind: ["Ride"] }),
            query({ name: "[135]" }),
            query({ kind: ["Run"], name: "9|5" }),
        ];
        for (const q of queries) {
            const positions = applySearchQuery(table, q).map((r) => table.indexOf(r));
            expect(positions.every((p) => p >= 0)).toBe(true);
            expect([...positions].sort((a, b) => a - b)).toEqual(positions);
        }
    });
});

// ── Internals ───────────────────────────────────────────────────────

describe("buildPredicates", () => {
    it("builds nothing for an empty query", () => {
        expect(_internals.buildPredicates(emptySearchQuery())).toHaveLength(0);
    });

    it("builds one predicate per populated field", () => {
        const predicates = _internals.buildPredicates(
            query({ equipment: ["A"], kind: ["X"], name: "a", startBegin: "2024-01-01", startEnd: "2024-12-31" }),
        );
        expect(predicates).toHaveLength(5);
    });

    it("compiles patterns without the global flag", () => {
        expect(_internals.compileNamePattern("run", false).flags).toBe("i");
        expect(_internals.compileNamePattern("run", true).flags).toBe("");
    });
});
