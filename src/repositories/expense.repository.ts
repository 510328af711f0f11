import { Repository } from "typeorm";
import { Expense } from "../entities/expense.entity";
import { ExpenseInsert } from "../interfaces/ledger.interface";

export class ExpenseRepository {
    private readonly db: Repository<Expense>;

    constructor(repository: Repository<Expense>) {
        this.db = repository;
    }

    async createExpense(expense: ExpenseInsert): Promise<Expense> {
        const entity = this.db.create({
            ...expense,
            description: expense.description ?? null,
            employeeId: expense.employeeId ?? null,
        });
        return this.db.save(entity);
    }

    async findById(id: number): Promise<Expense | null> {
        return this.db.findOne({ where: { id } });
    }

    async findByMonth(month: string): Promise<Expense[]> {
        return this.db.find({ where: { month }, order: { id: "ASC" } });
    }

    async findAll(): Promise<Expense[]> {
        return this.db.find({ order: { month: "ASC", id: "ASC" } });
    }

    async findSalaryEntries(month: string): Promise<Expense[]> {
        return this.db.find({ where: { category: "Salary", month } });
    }

    async findSalaryEntry(employeeId: number, month: string): Promise<Expense | null> {
        return this.db.findOne({ where: { category: "Salary", month, employeeId } });
    }

    async updateExpense(id: number, changes: Partial<ExpenseInsert>): Promise<Expense | null> {
        await this.db.update({ id }, changes);
        return this.findById(id);
    }

    async deleteExpense(id: number): Promise<boolean> {
        const result = await this.db.delete({ id });
        return result.affected !== 0;
    }
}
