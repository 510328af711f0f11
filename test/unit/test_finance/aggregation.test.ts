import {
    historicalAverages,
    minimumRevenueTarget,
    sumBy,
    sumByMonth,
} from "../../../src/finance/aggregation";

describe("sumByMonth", () => {
    it("groups by calendar month in ascending order and skips unreadable months", () => {
        const series = sumByMonth([
            { month: "2024-02-15", amount: 100 },
            { month: "2024-01-01", amount: 50 },
            { month: "2024-02-01", amount: 25 },
            { month: "someday", amount: 999 },
        ]);

        expect(series).toEqual([
            { month: "2024-01-01", total: 50 },
            { month: "2024-02-01", total: 125 },
        ]);
    });

    it("returns an empty series for no entries", () => {
        expect(sumByMonth([])).toEqual([]);
    });
});

describe("sumBy", () => {
    it("totals entries per label", () => {
        const breakdown = sumBy(
            [
                { category: "Salary", amount: 5000 },
                { category: "Rent", amount: 1200 },
                { category: "Salary", amount: 4000 },
            ],
            (entry) => entry.category,
        );

        expect(breakdown).toEqual([
            { label: "Rent", total: 1200 },
            { label: "Salary", total: 9000 },
        ]);
    });
});

describe("minimumRevenueTarget", () => {
    it("grosses expenses up by the profit margin", () => {
        const targets = minimumRevenueTarget(90000, 0.1);

        expect(targets.monthly).toBeCloseTo(100000, 6);
        expect(targets.weekly).toBeCloseTo(100000 / 4.33, 6);
        expect(targets.daily).toBeCloseTo(100000 / 4.33 / 5, 6);
        expect(targets.yearly).toBeCloseTo(1200000, 6);
    });

    it("is zero when there are no expenses", () => {
        expect(minimumRevenueTarget(0)).toEqual({ margin: 0.1, monthly: 0, weekly: 0, daily: 0, yearly: 0 });
        expect(minimumRevenueTarget(-10).monthly).toBe(0);
    });

    it("rejects margins outside [0, 1)", () => {
        expect(() => minimumRevenueTarget(1000, 1)).toThrow(RangeError);
        expect(() => minimumRevenueTarget(1000, -0.1)).toThrow(RangeError);
    });
});

describe("historicalAverages", () => {
    it("spreads the total over the days from first to last month", () => {
        // 2024-01-01..2024-03-01 is 60 days apart, 61 counting the first day
        const averages = historicalAverages([
            { month: "2024-01-01", total: 3100 },
            { month: "2024-03-01", total: 3000 },
        ]);

        expect(averages.daily).toBeCloseTo(100, 9);
        expect(averages.weekly).toBeCloseTo(700, 9);
        expect(averages.monthly).toBeCloseTo(3000, 9);
        expect(averages.yearly).toBeCloseTo(36500, 9);
    });

    it("is zero for an empty series", () => {
        expect(historicalAverages([])).toEqual({ daily: 0, weekly: 0, monthly: 0, yearly: 0 });
    });
});
