import Joi from "joi";
import { TASK_PRIORITIES, TASK_STATUSES, TaskInsert } from "../interfaces/task.interface";
import { dateString } from "./common.validator";

export const taskInsertSchema = Joi.object<TaskInsert>({
    employeeId: Joi.number().integer().positive().required(),
    name: Joi.string().trim().min(1).required(),
    description: Joi.string().allow("", null),
    assignedDate: dateString().required(),
    dueDate: dateString().allow(null),
    submissionDate: dateString().allow(null),
    status: Joi.string()
        .valid(...TASK_STATUSES)
        .default("Pending"),
    priority: Joi.string()
        .valid(...TASK_PRIORITIES)
        .default("Medium"),
});
