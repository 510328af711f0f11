import { Request, Response } from "express";
import { ReviewService } from "../services/review.service";
import { AppDataSource } from "../config/datasource";
import { ReviewRepository } from "../repositories/review.repository";
import { EmployeeRepository } from "../repositories/employee.repository";
import { PerformanceReview } from "../entities/performanceReview.entity";
import { Employee } from "../entities/employee.entity";
import { reviewInsertSchema } from "../validators/review.validator";
import { dateRangeSchema } from "../validators/common.validator";
import { validatePayload } from "../utils/validation";

export class ReviewController {
    private readonly reviewService: ReviewService;

    constructor() {
        this.reviewService = new ReviewService(
            new ReviewRepository(AppDataSource.getRepository(PerformanceReview)),
            new EmployeeRepository(AppDataSource.getRepository(Employee)),
        );
    }

    async submitReview(req: Request, res: Response) {
        const review = validatePayload(reviewInsertSchema, req.body);
        res.status(201).json(await this.reviewService.submitReview(review));
    }

    async listReviews(req: Request, res: Response) {
        const filter = validatePayload(dateRangeSchema, req.query);
        res.json(await this.reviewService.listReviews(filter));
    }
}
