import Joi from "joi";
import { EXPENSE_CATEGORIES, ExpenseInsert, REVENUE_SOURCES, RevenueInsert } from "../interfaces/ledger.interface";

// YYYY-MM or any YYYY-MM-DD; stored as the first of the month
const monthString = () => Joi.string().pattern(/^\d{4}-\d{2}(-\d{2})?$/, "YYYY-MM");

export const expenseInsertSchema = Joi.object<ExpenseInsert>({
    category: Joi.string()
        .valid(...EXPENSE_CATEGORIES)
        .required(),
    amount: Joi.number().min(0).required(),
    month: monthString().required(),
    description: Joi.string().allow("", null),
    employeeId: Joi.number().integer().positive().allow(null),
});

export const revenueInsertSchema = Joi.object<RevenueInsert>({
    source: Joi.string()
        .valid(...REVENUE_SOURCES)
        .required(),
    amount: Joi.number().min(0).required(),
    month: monthString().required(),
    description: Joi.string().allow("", null),
});

export const monthQuerySchema = Joi.object<{ month: string; margin?: number }>({
    month: monthString().required(),
    margin: Joi.number().min(0).less(1),
});
