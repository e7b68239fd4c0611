// Calendar-date helpers. All dates are local; "YYYY-MM-DD" strings sort chronologically.

export const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Format a local Date as "YYYY-MM-DD" without UTC conversion */
export function toLocalDateStr(d: Date): string {
    const y = String(d.getFullYear()).padStart(4, "0");
    const m = String(d.getMonth() + 1).padStart(2, "0");
    const day = String(d.getDate()).padStart(2, "0");
    return `${y}-${m}-${day}`;
}

/** True for "YYYY-MM-DD" strings naming a real calendar day */
export function isCalendarDate(value: string): boolean {
    const match = DATE_PATTERN.exec(value);
    if (!match) return false;
    // setFullYear: the Date constructor maps years 0-99 to 1900-1999
    const d = new Date(2000, 0, 1);
    d.setFullYear(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
    return toLocalDateStr(d) === value;
}

/** Local midnight (00:00:00.000) of a "YYYY-MM-DD" date */
export function startOfDay(date: string): Date {
    return new Date(date + "T00:00:00");
}

/** Last representable instant (23:59:59.999) of a "YYYY-MM-DD" date */
export function endOfDay(date: string): Date {
    return new Date(date + "T23:59:59.999");
}
