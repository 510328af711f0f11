import { Request, Response } from "express";
import { EmployeeService } from "../services/employee.service";
import { PayrollService } from "../services/payroll.service";
import { AppDataSource } from "../config/datasource";
import { EmployeeRepository } from "../repositories/employee.repository";
import { ExpenseRepository } from "../repositories/expense.repository";
import { Employee } from "../entities/employee.entity";
import { Expense } from "../entities/expense.entity";
import { employeeBatchUpdateSchema, employeeInsertSchema } from "../validators/employee.validator";
import { idSchema } from "../validators/common.validator";
import { readIdempotencyKey } from "../middlewares/idempotency.middleware";
import { AuthenticatedSession } from "../middlewares/adminSession.middleware";
import { validatePayload } from "../utils/validation";

export class EmployeeController {
    private readonly employeeService: EmployeeService;

    constructor() {
        const employeeRepo = new EmployeeRepository(AppDataSource.getRepository(Employee));
        this.employeeService = new EmployeeService(
            AppDataSource,
            employeeRepo,
            new PayrollService(employeeRepo, new ExpenseRepository(AppDataSource.getRepository(Expense))),
        );
    }

    /** POST /employees — 201 with the new employee. */
    async createEmployee(req: Request, res: Response, session: AuthenticatedSession) {
        const idempotencyKey = readIdempotencyKey(req);
        const employee = validatePayload(employeeInsertSchema, req.body);

        const created = await this.employeeService.createEmployee(employee, idempotencyKey);
        console.log(`Employee ${created.id} created by ${session.email}`);
        res.status(201).json(created);
    }

    /** GET /employees */
    async getEmployees(_req: Request, res: Response) {
        res.json(await this.employeeService.listEmployees());
    }

    /** GET /employees/:id — includes tenure. */
    async getEmployee(req: Request, res: Response) {
        const id = validatePayload(idSchema, req.params.id);
        res.json(await this.employeeService.getEmployee(id));
    }

    /**
     * PATCH /employees — batch edit. Rows apply independently, so the response
     * is 200 with both the applied and the failed rows.
     */
    async updateEmployees(req: Request, res: Response, session: AuthenticatedSession) {
        const updates = validatePayload(employeeBatchUpdateSchema, req.body);

        const outcome = await this.employeeService.updateEmployees(updates);
        console.log(`${outcome.updated.length} employee(s) updated by ${session.email}, ${outcome.failed.length} failed`);
        res.json(outcome);
    }

    /** DELETE /employees/:id — removes the employee and every dependent record. */
    async deleteEmployee(req: Request, res: Response, session: AuthenticatedSession) {
        const id = validatePayload(idSchema, req.params.id);

        const result = await this.employeeService.deleteEmployee(id);
        console.log(`Employee ${id} deleted by ${session.email}`);
        res.json(result);
    }
}
