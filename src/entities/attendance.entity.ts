import { Entity, Column, Index, PrimaryGeneratedColumn } from "typeorm";

@Entity({ name: "attendance" })
@Index(["employeeId"])
export class Attendance {
    @PrimaryGeneratedColumn({ name: "att_id" })
    id!: number;

    @Column({ name: "emp_id", type: "integer" })
    employeeId!: number;

    @Column({ name: "login_time", type: "varchar", length: 19 })
    loginTime!: string;

    @Column({ name: "break_duration", type: "integer", default: 0 })
    breakDuration!: number;

    @Column({ name: "logout_time", type: "varchar", length: 19, nullable: true })
    logoutTime!: string | null;

    @Column({ type: "text", nullable: true })
    notes!: string | null;
}
