import { Expense } from "../entities/expense.entity";
import { IEmployee } from "../interfaces/employee.interface";
import { EmployeeRepository } from "../repositories/employee.repository";
import { ExpenseRepository } from "../repositories/expense.repository";
import { BreakdownItem, sumBy } from "../finance/aggregation";
import { requireMonthKey } from "../utils/validation";

export interface SalaryReconciliation {
    month: string;
    created: Expense[];
    alreadyRecorded: number;
}

export type SalarySync =
    | { action: "skipped"; reason: string }
    | { action: "created" | "updated"; expense: Expense };

export interface PayrollLine {
    employeeId: number;
    name: string;
    department: string;
    monthlySalary: number;
    annualSalary: number;
}

export interface PayrollSummary {
    month: string;
    lines: PayrollLine[];
    totalPayroll: number;
    averageMonthlySalary: number;
    byDepartment: BreakdownItem[];
}

export function salaryDescription(employee: Pick<IEmployee, "id" | "name">): string {
    return `Salary for ${employee.name} (ID: ${employee.id})`;
}

/**
 * Keeps exactly one "Salary" expense per active employee and month.
 *
 * `reconcileSalaries` only fills gaps and is what runs at startup and when a
 * month is opened; `syncSalaryOnEmployeeUpdate` is the single upsert path and
 * runs when an employee record is edited.
 */
export class PayrollService {
    constructor(
        private employeeRepo: EmployeeRepository,
        private expenseRepo: ExpenseRepository,
    ) {}

    async reconcileSalaries(targetMonth: string): Promise<SalaryReconciliation> {
        const month = requireMonthKey(targetMonth);

        const employees = await this.employeeRepo.getActiveEmployees();
        if (employees.length === 0) return { month, created: [], alreadyRecorded: 0 };

        const existing = await this.expenseRepo.findSalaryEntries(month);
        const recorded = new Set<number>();
        for (const entry of existing) {
            if (entry.employeeId !== null) recorded.add(entry.employeeId);
        }

        // One insert per statement: a failure part-way leaves earlier inserts in place.
        const created: Expense[] = [];
        for (const employee of employees) {
            if (recorded.has(employee.id)) continue;
            created.push(
                await this.expenseRepo.createExpense({
                    category: "Salary",
                    amount: employee.salary,
                    month,
                    description: salaryDescription(employee),
                    employeeId: employee.id,
                }),
            );
            recorded.add(employee.id);
        }

        if (created.length > 0) {
            console.log(`Recorded ${created.length} salary expense(s) for ${month}`);
        }

        return { month, created, alreadyRecorded: employees.length - created.length };
    }

    async syncSalaryOnEmployeeUpdate(employee: IEmployee, targetMonth: string): Promise<SalarySync> {
        const month = requireMonthKey(targetMonth);
        if (employee.status !== "Active") {
            return { action: "skipped", reason: `Employee ${employee.id} is ${employee.status}` };
        }

        const changes = { amount: employee.salary, description: salaryDescription(employee) };
        const existing = await this.expenseRepo.findSalaryEntry(employee.id, month);
        if (existing) {
            const updated = await this.expenseRepo.updateExpense(existing.id, changes);
            return { action: "updated", expense: updated ?? { ...existing, ...changes } };
        }

        const expense = await this.expenseRepo.createExpense({
            category: "Salary",
            month,
            employeeId: employee.id,
            ...changes,
        });
        return { action: "created", expense };
    }

    /**
     * Payroll for one month. Gap-fills the month first, then prefers the
     * recorded salary expense over the employee's current salary.
     */
    async payrollSummary(targetMonth: string): Promise<PayrollSummary> {
        const { month } = await this.reconcileSalaries(targetMonth);

        const employees = await this.employeeRepo.getActiveEmployees();
        const entries = await this.expenseRepo.findSalaryEntries(month);
        const amountByEmployee = new Map<number, number>();
        for (const entry of entries) {
            if (entry.employeeId !== null) amountByEmployee.set(entry.employeeId, entry.amount);
        }

        const lines = employees.map((employee) => {
            const monthlySalary = amountByEmployee.get(employee.id) ?? employee.salary;
            return {
                employeeId: employee.id,
                name: employee.name,
                department: employee.department,
                monthlySalary,
                annualSalary: monthlySalary * 12,
            };
        });

        const totalPayroll = lines.reduce((total, line) => total + line.monthlySalary, 0);
        return {
            month,
            lines,
            totalPayroll,
            averageMonthlySalary: lines.length > 0 ? totalPayroll / lines.length : 0,
            byDepartment: sumBy(
                lines.map((line) => ({ department: line.department, amount: line.monthlySalary })),
                (line) => line.department,
            ),
        };
    }
}
