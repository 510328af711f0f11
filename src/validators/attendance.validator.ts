import Joi from "joi";
import { AttendanceInsert } from "../interfaces/attendance.interface";
import { timestampString } from "./common.validator";

export const attendanceInsertSchema = Joi.object<AttendanceInsert>({
    employeeId: Joi.number().integer().positive().required(),
    loginTime: timestampString().required(),
    logoutTime: timestampString().allow(null),
    breakDuration: Joi.number().integer().min(0).default(0),
    notes: Joi.string().allow("", null),
});
