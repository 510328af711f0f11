import { Request, Response } from "express";
import { LedgerService } from "../services/ledger.service";
import { AppDataSource } from "../config/datasource";
import { ExpenseRepository } from "../repositories/expense.repository";
import { RevenueRepository } from "../repositories/revenue.repository";
import { EmployeeRepository } from "../repositories/employee.repository";
import { Expense } from "../entities/expense.entity";
import { Revenue } from "../entities/revenue.entity";
import { Employee } from "../entities/employee.entity";
import { expenseInsertSchema, monthQuerySchema, revenueInsertSchema } from "../validators/ledger.validator";
import { idSchema } from "../validators/common.validator";
import { validatePayload } from "../utils/validation";

export class LedgerController {
    private readonly ledgerService: LedgerService;

    constructor() {
        this.ledgerService = new LedgerService(
            new ExpenseRepository(AppDataSource.getRepository(Expense)),
            new RevenueRepository(AppDataSource.getRepository(Revenue)),
            new EmployeeRepository(AppDataSource.getRepository(Employee)),
        );
    }

    async addExpense(req: Request, res: Response) {
        const expense = validatePayload(expenseInsertSchema, req.body);
        res.status(201).json(await this.ledgerService.addExpense(expense));
    }

    async listExpenses(req: Request, res: Response) {
        const { month } = validatePayload(monthQuerySchema, req.query);
        res.json(await this.ledgerService.listExpenses(month));
    }

    async updateExpense(req: Request, res: Response) {
        const id = validatePayload(idSchema, req.params.id);
        const changes = validatePayload(expenseInsertSchema, req.body);
        res.json(await this.ledgerService.updateExpense(id, changes));
    }

    async deleteExpense(req: Request, res: Response) {
        const id = validatePayload(idSchema, req.params.id);
        await this.ledgerService.deleteExpense(id);
        res.status(204).send();
    }

    async addRevenue(req: Request, res: Response) {
        const revenue = validatePayload(revenueInsertSchema, req.body);
        res.status(201).json(await this.ledgerService.addRevenue(revenue));
    }

    async listRevenues(req: Request, res: Response) {
        const { month } = validatePayload(monthQuerySchema, req.query);
        res.json(await this.ledgerService.listRevenues(month));
    }

    async updateRevenue(req: Request, res: Response) {
        const id = validatePayload(idSchema, req.params.id);
        const changes = validatePayload(revenueInsertSchema, req.body);
        res.json(await this.ledgerService.updateRevenue(id, changes));
    }

    async deleteRevenue(req: Request, res: Response) {
        const id = validatePayload(idSchema, req.params.id);
        await this.ledgerService.deleteRevenue(id);
        res.status(204).send();
    }
}
