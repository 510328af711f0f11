import Settings from "../config/settings";
import { ExpenseRepository } from "../repositories/expense.repository";
import { RevenueRepository } from "../repositories/revenue.repository";
import {
    BreakdownItem,
    MonthPoint,
    RevenueAverages,
    RevenueTargets,
    historicalAverages,
    minimumRevenueTarget,
    sumAmounts,
    sumBy,
    sumByMonth,
} from "../finance/aggregation";
import { ForecastPoint, forecastSeries } from "../finance/forecast";
import { InsightRequest, InsightResult, InsightsService } from "./insights.service";
import { BadRequestError } from "../utils/errors";
import { requireMonthKey } from "../utils/validation";

export interface MonthlyFinanceSummary {
    month: string;
    totalExpense: number;
    totalRevenue: number;
    profit: number;
    profitMarginPercent: number | null;
    targets: RevenueTargets;
    expenseByCategory: BreakdownItem[];
    revenueBySource: BreakdownItem[];
}

export interface FinanceForecast {
    expenses: ForecastPoint[];
    revenues: ForecastPoint[];
}

export interface RevenueInsights {
    month: string;
    request: InsightRequest;
    probability: number;
    insights: InsightResult;
}

export const INSIGHT_DEFAULT_PRICE = 100;
export const INSIGHT_DEFAULT_CHANNEL = "Subscriptions";

// Most frequent label; ties go to the alphabetically first one.
export function mostFrequent(labels: readonly string[]): string | null {
    const counts = new Map<string, number>();
    for (const label of labels) counts.set(label, (counts.get(label) ?? 0) + 1);

    let best: string | null = null;
    for (const [label, count] of [...counts.entries()].sort(([a], [b]) => a.localeCompare(b))) {
        if (best === null || count > (counts.get(best) ?? 0)) best = label;
    }
    return best;
}

export function subscriptionProbability(totalRevenue: number, minimumMonthly: number): number {
    if (minimumMonthly <= 0) return 0.5;
    return Math.min(totalRevenue / (minimumMonthly * 1.5), 1);
}

export class FinanceService {
    constructor(
        private expenseRepo: ExpenseRepository,
        private revenueRepo: RevenueRepository,
        private insights: InsightsService,
    ) {}

    async monthlySummary(targetMonth: string, margin: number = Settings.TARGET_PROFIT_MARGIN): Promise<MonthlyFinanceSummary> {
        if (!(margin >= 0 && margin < 1)) {
            throw new BadRequestError(`Profit margin must be between 0 and 1, got ${margin}`);
        }

        const month = requireMonthKey(targetMonth);
        const expenses = await this.expenseRepo.findByMonth(month);
        const revenues = await this.revenueRepo.findByMonth(month);

        const totalExpense = sumAmounts(expenses);
        const totalRevenue = sumAmounts(revenues);
        const profit = totalRevenue - totalExpense;

        return {
            month,
            totalExpense,
            totalRevenue,
            profit,
            profitMarginPercent: totalRevenue > 0 ? (profit / totalRevenue) * 100 : null,
            targets: minimumRevenueTarget(totalExpense, margin),
            expenseByCategory: sumBy(expenses, (expense) => expense.category),
            revenueBySource: sumBy(revenues, (revenue) => revenue.source),
        };
    }

    async expenseTrend(): Promise<MonthPoint[]> {
        return sumByMonth(await this.expenseRepo.findAll());
    }

    async revenueTrend(): Promise<MonthPoint[]> {
        return sumByMonth(await this.revenueRepo.findAll());
    }

    async averageRevenue(): Promise<RevenueAverages> {
        return historicalAverages(await this.revenueTrend());
    }

    /** Expense and revenue are projected independently, each from its own history. */
    async forecast(): Promise<FinanceForecast> {
        return {
            expenses: forecastSeries(await this.expenseTrend()),
            revenues: forecastSeries(await this.revenueTrend()),
        };
    }

    async revenueInsights(targetMonth: string): Promise<RevenueInsights> {
        const summary = await this.monthlySummary(targetMonth);
        const averages = await this.averageRevenue();
        const revenues = await this.revenueRepo.findByMonth(summary.month);

        const request: InsightRequest = {
            price: averages.monthly > 0 ? averages.monthly / 100 : INSIGHT_DEFAULT_PRICE,
            age: 35,
            income: 50000,
            trialUsed: true,
            marketingChannel: mostFrequent(revenues.map((revenue) => revenue.source)) ?? INSIGHT_DEFAULT_CHANNEL,
        };
        const probability = subscriptionProbability(summary.totalRevenue, summary.targets.monthly);

        return {
            month: summary.month,
            request,
            probability,
            insights: await this.insights.getRecommendations(request, probability),
        };
    }
}
