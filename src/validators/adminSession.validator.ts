import Joi from "joi";

export const adminLoginSchema = Joi.object<{ email: string; password: string }>({
    email: Joi.string().email().required(),
    password: Joi.string().required(),
});

export const adminNavigateSchema = Joi.object<{ page: string }>({
    page: Joi.string().trim().min(1).required(),
});
