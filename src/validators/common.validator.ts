import Joi from "joi";

export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;
export const TIME_OF_DAY_PATTERN = /^\d{2}:\d{2}:\d{2}$/;

export const dateString = () => Joi.string().pattern(DATE_PATTERN, "YYYY-MM-DD");
export const timestampString = () => Joi.string().pattern(TIMESTAMP_PATTERN, "YYYY-MM-DD HH:mm:ss");
export const timeOfDayString = () => Joi.string().pattern(TIME_OF_DAY_PATTERN, "HH:mm:ss");

export const idSchema = Joi.number().integer().positive().required();

export const dateRangeSchema = Joi.object<{ from: string; to: string; employeeId?: number }>({
    from: dateString().required(),
    to: dateString().required(),
    employeeId: Joi.number().integer().positive(),
});
