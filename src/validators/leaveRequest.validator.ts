import Joi from "joi";
import {
    LEAVE_STATUSES,
    LEAVE_TYPES,
    LeaveDecision,
    LeaveRequestFilter,
    LeaveRequestInsert,
} from "../interfaces/leaveRequest.interface";
import { dateString } from "./common.validator";

export const leaveRequestInsertSchema = Joi.object<LeaveRequestInsert>({
    employeeId: Joi.number().integer().positive().required(),
    startDate: dateString().required(),
    endDate: dateString().required(),
    type: Joi.string()
        .valid(...LEAVE_TYPES)
        .required(),
    reason: Joi.string().allow("", null),
});

export const leaveRequestFilterSchema = Joi.object<LeaveRequestFilter>({
    employeeId: Joi.number().integer().positive(),
    status: Joi.string().valid(...LEAVE_STATUSES),
});

export const leaveDecisionSchema = Joi.object<{ status: LeaveDecision }>({
    status: Joi.string().valid("Approved", "Rejected").required(),
});
