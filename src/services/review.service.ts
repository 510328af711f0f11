import { ReviewRepository } from "../repositories/review.repository";
import { EmployeeRepository } from "../repositories/employee.repository";
import { PerformanceReview } from "../entities/performanceReview.entity";
import { ReviewFilter, ReviewInsert, ReviewSummary, ReviewView } from "../interfaces/review.interface";
import { NotFoundError } from "../utils/errors";

export const HIGH_RATING = 4;

export function summarizeReviews(reviews: readonly ReviewView[]): ReviewSummary {
    const distribution = new Map<number, number>();
    for (const review of reviews) {
        distribution.set(review.rating, (distribution.get(review.rating) ?? 0) + 1);
    }

    const total = reviews.reduce((sum, review) => sum + review.rating, 0);
    return {
        averageRating: reviews.length > 0 ? Math.round((total / reviews.length) * 100) / 100 : 0,
        totalReviews: reviews.length,
        highRatings: reviews.filter((review) => review.rating >= HIGH_RATING).length,
        ratingDistribution: [...distribution.entries()]
            .sort(([a], [b]) => a - b)
            .map(([rating, count]) => ({ rating, count })),
    };
}

export class ReviewService {
    constructor(
        private reviewRepo: ReviewRepository,
        private employeeRepo: EmployeeRepository,
    ) {}

    async submitReview(review: ReviewInsert): Promise<PerformanceReview> {
        const employee = await this.employeeRepo.getEmployeeById(review.employeeId);
        if (!employee) {
            throw new NotFoundError(`Employee with ID ${review.employeeId} not found`);
        }
        return this.reviewRepo.createReview(review);
    }

    async listReviews(filter: ReviewFilter): Promise<{ reviews: ReviewView[]; summary: ReviewSummary }> {
        const rows = await this.reviewRepo.findInRange(filter);
        const employees = await this.employeeRepo.getEmployeesByIds([...new Set(rows.map((row) => row.employeeId))]);
        const names = new Map(employees.map((employee) => [employee.id, employee.name]));

        const reviews = rows.map((row) => ({ ...row, name: names.get(row.employeeId) ?? "Unknown" }));
        return { reviews, summary: summarizeReviews(reviews) };
    }
}
