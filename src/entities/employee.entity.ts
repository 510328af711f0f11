import { Entity, Column, Index, PrimaryGeneratedColumn } from "typeorm";
import { EmployeeStatus } from "../interfaces/employee.interface";

@Entity({ name: "employees" })
@Index(["status"])
export class Employee {
    @PrimaryGeneratedColumn({ name: "emp_id" })
    id!: number;

    @Column({ type: "varchar", length: 255 })
    name!: string;

    @Column({ type: "varchar", length: 255 })
    role!: string;

    @Column({ type: "varchar", length: 64, default: "Unknown" })
    department!: string;

    @Column({ type: "double", default: 0 })
    salary!: number;

    @Column({ name: "expected_login", type: "varchar", length: 8, nullable: true })
    expectedLogin!: string | null;

    @Column({ name: "expected_logout", type: "varchar", length: 8, nullable: true })
    expectedLogout!: string | null;

    @Column({ name: "hire_date", type: "varchar", length: 10, nullable: true })
    hireDate!: string | null;

    @Column({ type: "varchar", length: 16, default: "Active" })
    status!: EmployeeStatus;
}
