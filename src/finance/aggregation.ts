import { differenceInCalendarDays } from "date-fns";
import { normalizeMonthKey, parseMonth } from "../utils/months";

export interface AmountEntry {
    month: string;
    amount: number;
}

export interface MonthPoint {
    month: string; // YYYY-MM-01
    total: number;
}

export interface BreakdownItem {
    label: string;
    total: number;
}

export interface RevenueTargets {
    margin: number;
    daily: number;
    weekly: number;
    monthly: number;
    yearly: number;
}

export interface RevenueAverages {
    daily: number;
    weekly: number;
    monthly: number;
    yearly: number;
}

// Calendar approximations used by the finance views, not exact calendar math.
export const WORKING_DAYS_PER_WEEK = 5;
export const WEEKS_PER_MONTH = 4.33;
export const MONTHS_PER_YEAR = 12;
export const DEFAULT_PROFIT_MARGIN = 0.1;

export function sumAmounts(entries: readonly { amount: number }[]): number {
    return entries.reduce((total, entry) => total + (entry.amount ?? 0), 0);
}

/**
 * Totals per calendar month in ascending order. Stored dates anywhere inside a
 * month land on the same first-of-month key; rows whose month cannot be read
 * are left out.
 */
export function sumByMonth(entries: readonly AmountEntry[]): MonthPoint[] {
    const totals = new Map<string, number>();
    for (const entry of entries) {
        const key = normalizeMonthKey(entry.month);
        if (!key) continue;
        totals.set(key, (totals.get(key) ?? 0) + (entry.amount ?? 0));
    }

    return [...totals.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([month, total]) => ({ month, total }));
}

export function sumBy<T extends { amount: number }>(entries: readonly T[], labelOf: (entry: T) => string): BreakdownItem[] {
    const totals = new Map<string, number>();
    for (const entry of entries) {
        const label = labelOf(entry);
        totals.set(label, (totals.get(label) ?? 0) + (entry.amount ?? 0));
    }

    return [...totals.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([label, total]) => ({ label, total }));
}

/** Revenue needed to keep `margin` of it as profit after `totalExpense`. */
export function minimumRevenueTarget(totalExpense: number, margin: number = DEFAULT_PROFIT_MARGIN): RevenueTargets {
    if (!(margin >= 0 && margin < 1)) {
        throw new RangeError(`Profit margin must be in [0, 1), got ${margin}`);
    }

    const monthly = totalExpense > 0 ? totalExpense / (1 - margin) : 0;
    const weekly = monthly / WEEKS_PER_MONTH;
    return {
        margin,
        monthly,
        weekly,
        daily: weekly / WORKING_DAYS_PER_WEEK,
        yearly: monthly * MONTHS_PER_YEAR,
    };
}

/**
 * Average revenue per day over the span from the first to the last month key
 * (inclusive of the first day), scaled by fixed day counts.
 */
export function historicalAverages(series: readonly MonthPoint[]): RevenueAverages {
    const months = series.map((point) => parseMonth(point.month)).filter((month): month is Date => month !== null);
    if (months.length === 0) return { daily: 0, weekly: 0, monthly: 0, yearly: 0 };

    const first = new Date(Math.min(...months.map((month) => month.getTime())));
    const last = new Date(Math.max(...months.map((month) => month.getTime())));
    const spanDays = differenceInCalendarDays(last, first) + 1;

    const daily = series.reduce((total, point) => total + point.total, 0) / spanDays;
    return { daily, weekly: daily * 7, monthly: daily * 30, yearly: daily * 365 };
}
