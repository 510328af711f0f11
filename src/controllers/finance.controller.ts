import { Request, Response } from "express";
import { FinanceService } from "../services/finance.service";
import { InsightsService } from "../services/insights.service";
import { AppDataSource } from "../config/datasource";
import { ExpenseRepository } from "../repositories/expense.repository";
import { RevenueRepository } from "../repositories/revenue.repository";
import { Expense } from "../entities/expense.entity";
import { Revenue } from "../entities/revenue.entity";
import { monthQuerySchema } from "../validators/ledger.validator";
import { validatePayload } from "../utils/validation";

export class FinanceController {
    private readonly financeService: FinanceService;

    constructor(insights: InsightsService = new InsightsService()) {
        this.financeService = new FinanceService(
            new ExpenseRepository(AppDataSource.getRepository(Expense)),
            new RevenueRepository(AppDataSource.getRepository(Revenue)),
            insights,
        );
    }

    /** GET /finance/summary?month[&margin] */
    async monthlySummary(req: Request, res: Response) {
        const { month, margin } = validatePayload(monthQuerySchema, req.query);
        res.json(await this.financeService.monthlySummary(month, margin));
    }

    async trends(_req: Request, res: Response) {
        res.json({
            expenses: await this.financeService.expenseTrend(),
            revenues: await this.financeService.revenueTrend(),
        });
    }

    async averageRevenue(_req: Request, res: Response) {
        res.json(await this.financeService.averageRevenue());
    }

    async forecast(_req: Request, res: Response) {
        res.json(await this.financeService.forecast());
    }

    async revenueInsights(req: Request, res: Response) {
        const { month } = validatePayload(monthQuerySchema, req.query);
        res.json(await this.financeService.revenueInsights(month));
    }
}
