import { Request, Response } from "express";
import { PayrollService } from "../services/payroll.service";
import { AppDataSource } from "../config/datasource";
import { EmployeeRepository } from "../repositories/employee.repository";
import { ExpenseRepository } from "../repositories/expense.repository";
import { Employee } from "../entities/employee.entity";
import { Expense } from "../entities/expense.entity";
import { monthQuerySchema } from "../validators/ledger.validator";
import { validatePayload } from "../utils/validation";

export class PayrollController {
    private readonly payrollService: PayrollService;

    constructor() {
        this.payrollService = new PayrollService(
            new EmployeeRepository(AppDataSource.getRepository(Employee)),
            new ExpenseRepository(AppDataSource.getRepository(Expense)),
        );
    }

    /** GET /payroll?month — reconciles the month before summarizing it. */
    async payrollSummary(req: Request, res: Response) {
        const { month } = validatePayload(monthQuerySchema, req.query);
        res.json(await this.payrollService.payrollSummary(month));
    }

    /** POST /payroll/reconcile?month — fills in missing salary expenses only. */
    async reconcile(req: Request, res: Response) {
        const { month } = validatePayload(monthQuerySchema, req.query);
        res.json(await this.payrollService.reconcileSalaries(month));
    }
}
