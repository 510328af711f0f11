import { addMonths, differenceInCalendarMonths, format, isValid, parse, startOfMonth } from "date-fns";

const DAY_FORMAT = "yyyy-MM-dd";

/** Month keys are the first calendar day of the month, `YYYY-MM-01`. */
export function toMonthKey(date: Date): string {
    return format(startOfMonth(date), DAY_FORMAT);
}

export function currentMonthKey(now: Date = new Date()): string {
    return toMonthKey(now);
}

/**
 * Accepts `YYYY-MM` or any `YYYY-MM-DD` inside the month and returns the
 * first day of that month, or null when the value is not a date.
 */
export function parseMonth(value: string): Date | null {
    const trimmed = value.trim();
    const pattern = trimmed.length === 7 ? "yyyy-MM" : DAY_FORMAT;
    const parsed = parse(trimmed, pattern, new Date());
    return isValid(parsed) ? startOfMonth(parsed) : null;
}

export function normalizeMonthKey(value: string): string | null {
    const month = parseMonth(value);
    return month ? toMonthKey(month) : null;
}

export function shiftMonthKey(key: string, months: number): string {
    const month = parseMonth(key);
    if (!month) throw new RangeError(`Invalid month key: ${key}`);
    return toMonthKey(addMonths(month, months));
}

export function monthsBetween(fromKey: string, toKey: string): number {
    const from = parseMonth(fromKey);
    const to = parseMonth(toKey);
    if (!from || !to) throw new RangeError(`Invalid month range: ${fromKey}..${toKey}`);
    return differenceInCalendarMonths(to, from);
}
