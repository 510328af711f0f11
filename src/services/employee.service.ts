import { DataSource } from "typeorm";
import redisClient from "../config/redis";
import Settings from "../config/settings";
import { EmployeeRepository } from "../repositories/employee.repository";
import { ExpenseRepository } from "../repositories/expense.repository";
import { Employee } from "../entities/employee.entity";
import { Expense } from "../entities/expense.entity";
import { Attendance } from "../entities/attendance.entity";
import { Task } from "../entities/task.entity";
import { PerformanceReview } from "../entities/performanceReview.entity";
import { LeaveRequest } from "../entities/leaveRequest.entity";
import { EmployeeInsert, EmployeeUpdate, EmployeeWithTenure, IEmployee } from "../interfaces/employee.interface";
import { PayrollService, SalarySync } from "./payroll.service";
import { ConflictError, NotFoundError, describeError } from "../utils/errors";
import { currentMonthKey } from "../utils/months";
import { tenure } from "../utils/timeMetrics";

export const EMPLOYEES_CACHE_KEY = "employees:all";

export interface EmployeeUpdateOutcome {
    updated: { employee: Employee; salary: SalarySync }[];
    failed: { id: number; error: string }[];
}

export interface CascadeDeleteResult {
    employeeId: number;
    removed: {
        attendance: number;
        tasks: number;
        reviews: number;
        leaves: number;
        expenses: number;
    };
}

export class EmployeeService {
    constructor(
        private dataSource: DataSource,
        private employeeRepo: EmployeeRepository,
        private payroll: PayrollService,
    ) {}

    private async invalidateEmployeeCache() {
        await redisClient.del(EMPLOYEES_CACHE_KEY);
    }

    /**
     * Creates an employee and, when active, their salary expense for the
     * current month, in one transaction. Duplicate submissions are rejected
     * through the idempotency key.
     */
    async createEmployee(employeeInfo: EmployeeInsert, idempotencyKey: string, now: Date = new Date()): Promise<Employee> {
        const idempotencyRedisKey = `idempotency:employee:${idempotencyKey}`;

        const existing = await redisClient.get(idempotencyRedisKey);
        if (existing) {
            throw new ConflictError("Duplicate request: operation already performed with this idempotency key");
        }

        const month = currentMonthKey(now);
        const created = await this.dataSource.transaction(async (manager) => {
            const employeeRepo = new EmployeeRepository(manager.getRepository(Employee));
            const payroll = new PayrollService(employeeRepo, new ExpenseRepository(manager.getRepository(Expense)));

            const employee = await employeeRepo.createEmployee(employeeInfo);
            await payroll.syncSalaryOnEmployeeUpdate(employee, month);
            return employee;
        });

        await redisClient.setEx(
            idempotencyRedisKey,
            Settings.IDEMPOTENCY_TTL,
            JSON.stringify({ employeeId: created.id, createdAt: now }),
        );
        await this.invalidateEmployeeCache();

        return created;
    }

    /**
     * Lists all employees with their tenure. The rows are cached briefly;
     * tenure is worked out on every read since it depends on the date.
     */
    async listEmployees(now: Date = new Date()): Promise<EmployeeWithTenure[]> {
        const cached = await redisClient.get(EMPLOYEES_CACHE_KEY);
        let employees: IEmployee[];
        if (cached) {
            employees = JSON.parse(cached);
        } else {
            employees = await this.employeeRepo.getAllEmployees();
            await redisClient.setEx(EMPLOYEES_CACHE_KEY, Settings.CACHE_TTL, JSON.stringify(employees));
        }

        return employees.map((employee) => ({ ...employee, tenure: tenure(employee.hireDate, now) }));
    }

    async getEmployee(id: number, now: Date = new Date()): Promise<EmployeeWithTenure> {
        const employee = await this.employeeRepo.getEmployeeById(id);
        if (!employee) {
            throw new NotFoundError(`Employee with ID ${id} not found`);
        }
        return { ...employee, tenure: tenure(employee.hireDate, now) };
    }

    /**
     * Applies a batch of edits row by row. Each active employee's salary
     * expense for the month is upserted right after their row is saved. Rows
     * are independent: a failing row is reported and the rest still apply.
     */
    async updateEmployees(updates: EmployeeUpdate[], now: Date = new Date()): Promise<EmployeeUpdateOutcome> {
        const month = currentMonthKey(now);
        const outcome: EmployeeUpdateOutcome = { updated: [], failed: [] };

        for (const { id, ...changes } of updates) {
            try {
                const employee = await this.employeeRepo.updateEmployee(id, changes);
                if (!employee) {
                    outcome.failed.push({ id, error: `Employee with ID ${id} not found` });
                    continue;
                }
                const salary = await this.payroll.syncSalaryOnEmployeeUpdate(employee, month);
                outcome.updated.push({ employee, salary });
            } catch (error) {
                console.error(`Failed to update employee ${id}:`, error);
                outcome.failed.push({ id, error: describeError(error) });
            }
        }

        if (outcome.updated.length > 0) {
            await this.invalidateEmployeeCache();
        }
        return outcome;
    }

    /**
     * Removes an employee together with their attendance, tasks, reviews,
     * leave requests and expenses (historical salary entries included) in a
     * single transaction.
     */
    async deleteEmployee(id: number): Promise<CascadeDeleteResult> {
        const employee = await this.employeeRepo.getEmployeeById(id);
        if (!employee) {
            throw new NotFoundError(`Employee with ID ${id} not found`);
        }

        const removed = await this.dataSource.transaction(async (manager) => {
            const attendance = await manager.delete(Attendance, { employeeId: id });
            const tasks = await manager.delete(Task, { employeeId: id });
            const reviews = await manager.delete(PerformanceReview, { employeeId: id });
            const leaves = await manager.delete(LeaveRequest, { employeeId: id });
            const expenses = await manager.delete(Expense, { employeeId: id });
            await manager.delete(Employee, { id });

            return {
                attendance: attendance.affected ?? 0,
                tasks: tasks.affected ?? 0,
                reviews: reviews.affected ?? 0,
                leaves: leaves.affected ?? 0,
                expenses: expenses.affected ?? 0,
            };
        });

        await this.invalidateEmployeeCache();
        return { employeeId: id, removed };
    }
}
