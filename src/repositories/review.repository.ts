import { Between, Repository } from "typeorm";
import { PerformanceReview } from "../entities/performanceReview.entity";
import { ReviewFilter, ReviewInsert } from "../interfaces/review.interface";

export class ReviewRepository {
    private readonly db: Repository<PerformanceReview>;

    constructor(repository: Repository<PerformanceReview>) {
        this.db = repository;
    }

    async createReview(review: ReviewInsert): Promise<PerformanceReview> {
        const entity = this.db.create({ ...review, comments: review.comments ?? null });
        return this.db.save(entity);
    }

    async findInRange(filter: ReviewFilter): Promise<PerformanceReview[]> {
        return this.db.find({
            where: {
                reviewDate: Between(filter.from, filter.to),
                ...(filter.employeeId !== undefined ? { employeeId: filter.employeeId } : {}),
            },
            order: { reviewDate: "ASC" },
        });
    }
}
