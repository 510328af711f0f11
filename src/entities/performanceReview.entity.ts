import { Entity, Column, Index, PrimaryGeneratedColumn } from "typeorm";

@Entity({ name: "performance_reviews" })
@Index(["employeeId"])
export class PerformanceReview {
    @PrimaryGeneratedColumn({ name: "review_id" })
    id!: number;

    @Column({ name: "emp_id", type: "integer" })
    employeeId!: number;

    @Column({ name: "review_date", type: "varchar", length: 10 })
    reviewDate!: string;

    @Column({ type: "integer" })
    rating!: number;

    @Column({ type: "text", nullable: true })
    comments!: string | null;

    @Column({ type: "varchar", length: 255 })
    reviewer!: string;
}
