import { differenceInMonths, format, isValid, parse } from "date-fns";

export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";
export const TIME_OF_DAY_FORMAT = "HH:mm:ss";
export const DATE_FORMAT = "yyyy-MM-dd";

const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 3_600_000;

type Maybe<T> = T | null | undefined;

export type LateEarlyResult =
    | { kind: "measured"; lateMinutes: number; earlyMinutes: number }
    | { kind: "unavailable"; lateMinutes: 0; earlyMinutes: 0; reason: string };

function parseWith(value: Maybe<string>, pattern: string): Date | null {
    if (!value) return null;
    const parsed = parse(value.trim(), pattern, new Date());
    return isValid(parsed) ? parsed : null;
}

export function parseTimestamp(value: Maybe<string>): Date | null {
    return parseWith(value, TIMESTAMP_FORMAT);
}

export function parseDate(value: Maybe<string>): Date | null {
    return parseWith(value, DATE_FORMAT);
}

export function formatTimestamp(date: Date): string {
    return format(date, TIMESTAMP_FORMAT);
}

/**
 * Hours between login and logout minus the break, never negative.
 * Missing or malformed timestamps count as zero hours.
 */
export function workingHours(login: Maybe<string>, logout: Maybe<string>, breakMinutes: Maybe<number>): number {
    const start = parseTimestamp(login);
    const end = parseTimestamp(logout);
    if (!start || !end) return 0;

    const hours = (end.getTime() - start.getTime()) / MS_PER_HOUR - (breakMinutes ?? 0) / 60;
    return Math.max(hours, 0);
}

// Places a HH:mm:ss time of day on the calendar day of `day`.
function onSameDay(day: Date, timeOfDay: string): Date | null {
    if (!parseWith(timeOfDay, TIME_OF_DAY_FORMAT)) return null;
    return parseTimestamp(`${format(day, DATE_FORMAT)} ${timeOfDay.trim()}`);
}

function unavailable(reason: string): LateEarlyResult {
    return { kind: "unavailable", lateMinutes: 0, earlyMinutes: 0, reason };
}

/**
 * Minutes an employee logged in after, and logged out before, their expected
 * times of day. Any missing or unparseable input yields the zero result
 * tagged `unavailable` instead of an error.
 */
export function lateEarly(
    actualLogin: Maybe<string>,
    expectedLogin: Maybe<string>,
    actualLogout: Maybe<string>,
    expectedLogout: Maybe<string>,
): LateEarlyResult {
    if (!actualLogin || !expectedLogin || !actualLogout || !expectedLogout) {
        return unavailable("missing input");
    }

    const login = parseTimestamp(actualLogin);
    const logout = parseTimestamp(actualLogout);
    if (!login || !logout) return unavailable("unparseable timestamp");

    const expectedIn = onSameDay(login, expectedLogin);
    const expectedOut = onSameDay(logout, expectedLogout);
    if (!expectedIn || !expectedOut) return unavailable("unparseable time of day");

    const late = login > expectedIn ? (login.getTime() - expectedIn.getTime()) / MS_PER_MINUTE : 0;
    const early = logout < expectedOut ? (expectedOut.getTime() - logout.getTime()) / MS_PER_MINUTE : 0;
    return { kind: "measured", lateMinutes: late, earlyMinutes: early };
}

export const TENURE_NOT_AVAILABLE = "N/A";

export function tenure(hireDate: Maybe<string>, now: Date = new Date()): string {
    const hired = parseDate(hireDate);
    if (!hired) return TENURE_NOT_AVAILABLE;

    const totalMonths = differenceInMonths(now, hired);
    const years = Math.trunc(totalMonths / 12);
    const months = totalMonths % 12;
    return `${years} years, ${months} months`;
}
