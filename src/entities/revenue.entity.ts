import { Entity, Column, Index, PrimaryGeneratedColumn } from "typeorm";
import { RevenueSource } from "../interfaces/ledger.interface";

@Entity({ name: "revenues" })
@Index(["month"])
export class Revenue {
    @PrimaryGeneratedColumn({ name: "rev_id" })
    id!: number;

    @Column({ type: "varchar", length: 32 })
    source!: RevenueSource;

    @Column({ type: "double" })
    amount!: number;

    @Column({ type: "varchar", length: 10 })
    month!: string;

    @Column({ type: "text", nullable: true })
    description!: string | null;
}
