import { Entity, Column, Index, PrimaryGeneratedColumn } from "typeorm";
import { LeaveStatus, LeaveType } from "../interfaces/leaveRequest.interface";

@Entity({ name: "leaves" })
@Index(["employeeId"])
@Index(["status"])
export class LeaveRequest {
    @PrimaryGeneratedColumn({ name: "leave_id" })
    id!: number;

    @Column({ name: "emp_id", type: "integer" })
    employeeId!: number;

    @Column({ name: "start_date", type: "varchar", length: 10 })
    startDate!: string;

    @Column({ name: "end_date", type: "varchar", length: 10 })
    endDate!: string;

    @Column({ type: "varchar", length: 16 })
    type!: LeaveType;

    @Column({ type: "varchar", length: 16, default: "Pending" })
    status!: LeaveStatus;

    @Column({ type: "text", nullable: true })
    reason!: string | null;
}
