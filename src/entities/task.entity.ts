import { Entity, Column, Index, PrimaryGeneratedColumn } from "typeorm";
import { TaskPriority, TaskStatus } from "../interfaces/task.interface";

@Entity({ name: "tasks" })
@Index(["employeeId"])
export class Task {
    @PrimaryGeneratedColumn({ name: "task_id" })
    id!: number;

    @Column({ name: "emp_id", type: "integer" })
    employeeId!: number;

    @Column({ name: "task_name", type: "varchar", length: 255 })
    name!: string;

    @Column({ type: "text", nullable: true })
    description!: string | null;

    @Column({ name: "assigned_date", type: "varchar", length: 10 })
    assignedDate!: string;

    @Column({ name: "due_date", type: "varchar", length: 10, nullable: true })
    dueDate!: string | null;

    @Column({ name: "submission_date", type: "varchar", length: 10, nullable: true })
    submissionDate!: string | null;

    @Column({ type: "varchar", length: 32 })
    status!: TaskStatus;

    @Column({ type: "varchar", length: 16 })
    priority!: TaskPriority;
}
