export interface ReviewInsert {
    employeeId: number;
    reviewDate: string;
    rating: number; // 1-5
    comments?: string | null;
    reviewer: string;
}

export interface IPerformanceReview {
    id: number;
    employeeId: number;
    reviewDate: string;
    rating: number;
    comments: string | null;
    reviewer: string;
}

export interface ReviewFilter {
    from: string;
    to: string;
    employeeId?: number;
}

export interface ReviewView extends IPerformanceReview {
    name: string;
}

export interface ReviewSummary {
    averageRating: number;
    totalReviews: number;
    highRatings: number;
    ratingDistribution: { rating: number; count: number }[];
}
