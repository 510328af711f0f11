import Joi from "joi";
import { ReviewInsert } from "../interfaces/review.interface";
import { dateString } from "./common.validator";

export const reviewInsertSchema = Joi.object<ReviewInsert>({
    employeeId: Joi.number().integer().positive().required(),
    reviewDate: dateString().required(),
    rating: Joi.number().integer().min(1).max(5).required(),
    comments: Joi.string().allow("", null),
    reviewer: Joi.string().trim().min(1).required(),
});
