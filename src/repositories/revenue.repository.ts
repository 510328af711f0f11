import { Repository } from "typeorm";
import { Revenue } from "../entities/revenue.entity";
import { RevenueInsert } from "../interfaces/ledger.interface";

export class RevenueRepository {
    private readonly db: Repository<Revenue>;

    constructor(repository: Repository<Revenue>) {
        this.db = repository;
    }

    async createRevenue(revenue: RevenueInsert): Promise<Revenue> {
        const entity = this.db.create({ ...revenue, description: revenue.description ?? null });
        return this.db.save(entity);
    }

    async findById(id: number): Promise<Revenue | null> {
        return this.db.findOne({ where: { id } });
    }

    async findByMonth(month: string): Promise<Revenue[]> {
        return this.db.find({ where: { month }, order: { id: "ASC" } });
    }

    async findAll(): Promise<Revenue[]> {
        return this.db.find({ order: { month: "ASC", id: "ASC" } });
    }

    async updateRevenue(id: number, changes: Partial<RevenueInsert>): Promise<Revenue | null> {
        await this.db.update({ id }, changes);
        return this.findById(id);
    }

    async deleteRevenue(id: number): Promise<boolean> {
        const result = await this.db.delete({ id });
        return result.affected !== 0;
    }
}
