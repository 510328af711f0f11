import { ExpenseRepository } from "../repositories/expense.repository";
import { RevenueRepository } from "../repositories/revenue.repository";
import { EmployeeRepository } from "../repositories/employee.repository";
import { Expense } from "../entities/expense.entity";
import { Revenue } from "../entities/revenue.entity";
import { ExpenseInsert, ExpenseView, RevenueInsert } from "../interfaces/ledger.interface";
import { ConflictError, NotFoundError } from "../utils/errors";
import { requireMonthKey } from "../utils/validation";

/**
 * Manual expense and revenue entries. Months are stored as the first day of
 * the month whatever day the caller sent.
 */
export class LedgerService {
    constructor(
        private expenseRepo: ExpenseRepository,
        private revenueRepo: RevenueRepository,
        private employeeRepo: EmployeeRepository,
    ) {}

    private async assertEmployeeExists(employeeId: number | null | undefined) {
        if (employeeId === null || employeeId === undefined) return;
        const employee = await this.employeeRepo.getEmployeeById(employeeId);
        if (!employee) {
            throw new NotFoundError(`Employee with ID ${employeeId} not found`);
        }
    }

    /** One Salary row per (employee, month); `ownId` is the row being edited. */
    private async assertSalaryEntryFree(expense: ExpenseInsert, month: string, ownId?: number) {
        if (expense.category !== "Salary" || expense.employeeId === null || expense.employeeId === undefined) return;
        const existing = await this.expenseRepo.findSalaryEntry(expense.employeeId, month);
        if (existing && existing.id !== ownId) {
            throw new ConflictError(
                `Salary for employee ${expense.employeeId} in ${month} is already recorded as expense ${existing.id}`,
            );
        }
    }

    async addExpense(expense: ExpenseInsert): Promise<Expense> {
        const month = requireMonthKey(expense.month);
        await this.assertEmployeeExists(expense.employeeId);
        await this.assertSalaryEntryFree(expense, month);
        return this.expenseRepo.createExpense({ ...expense, month });
    }

    async listExpenses(month: string): Promise<ExpenseView[]> {
        const rows = await this.expenseRepo.findByMonth(requireMonthKey(month));
        const ids = rows.map((row) => row.employeeId).filter((id): id is number => id !== null);
        const employees = await this.employeeRepo.getEmployeesByIds([...new Set(ids)]);
        const names = new Map(employees.map((employee) => [employee.id, employee.name]));

        return rows.map((row) => ({
            ...row,
            employeeName: row.employeeId === null ? null : (names.get(row.employeeId) ?? null),
        }));
    }

    async updateExpense(id: number, changes: ExpenseInsert): Promise<Expense> {
        const month = requireMonthKey(changes.month);
        await this.assertEmployeeExists(changes.employeeId);
        await this.assertSalaryEntryFree(changes, month, id);
        const updated = await this.expenseRepo.updateExpense(id, {
            ...changes,
            month,
            description: changes.description ?? null,
            employeeId: changes.employeeId ?? null,
        });
        if (!updated) {
            throw new NotFoundError(`Expense with ID ${id} not found`);
        }
        return updated;
    }

    async deleteExpense(id: number): Promise<void> {
        const deleted = await this.expenseRepo.deleteExpense(id);
        if (!deleted) {
            throw new NotFoundError(`Expense with ID ${id} not found`);
        }
    }

    async addRevenue(revenue: RevenueInsert): Promise<Revenue> {
        return this.revenueRepo.createRevenue({ ...revenue, month: requireMonthKey(revenue.month) });
    }

    async listRevenues(month: string): Promise<Revenue[]> {
        return this.revenueRepo.findByMonth(requireMonthKey(month));
    }

    async updateRevenue(id: number, changes: RevenueInsert): Promise<Revenue> {
        const updated = await this.revenueRepo.updateRevenue(id, {
            ...changes,
            month: requireMonthKey(changes.month),
            description: changes.description ?? null,
        });
        if (!updated) {
            throw new NotFoundError(`Revenue with ID ${id} not found`);
        }
        return updated;
    }

    async deleteRevenue(id: number): Promise<void> {
        const deleted = await this.revenueRepo.deleteRevenue(id);
        if (!deleted) {
            throw new NotFoundError(`Revenue with ID ${id} not found`);
        }
    }
}
