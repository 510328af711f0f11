import { Entity, Column, Index, PrimaryGeneratedColumn } from "typeorm";
import { ExpenseCategory } from "../interfaces/ledger.interface";

@Entity({ name: "expenses" })
@Index(["category", "month"])
@Index(["employeeId"])
export class Expense {
    @PrimaryGeneratedColumn({ name: "exp_id" })
    id!: number;

    @Column({ type: "varchar", length: 32 })
    category!: ExpenseCategory;

    @Column({ type: "double" })
    amount!: number;

    // always the first day of the month, YYYY-MM-01
    @Column({ type: "varchar", length: 10 })
    month!: string;

    @Column({ type: "text", nullable: true })
    description!: string | null;

    @Column({ name: "emp_id", type: "integer", nullable: true })
    employeeId!: number | null;
}
