import Joi from "joi";
import { BadRequestError } from "./errors";
import { normalizeMonthKey } from "./months";

/** Validates and converts a payload, mapping Joi details to a BadRequestError. */
export function validatePayload<T>(schema: Joi.Schema<T>, payload: unknown): T {
    const result = schema.validate(payload, { abortEarly: false });
    if (result.error) {
        throw new BadRequestError(result.error.details.map((err) => err.message).join(", "));
    }
    return result.value;
}

export function requireMonthKey(value: string): string {
    const key = normalizeMonthKey(value);
    if (!key) throw new BadRequestError(`Invalid month: ${value}`);
    return key;
}
