import Joi from "joi";
import { DEPARTMENTS, EMPLOYEE_STATUSES, EmployeeInsert, EmployeeUpdate, LEGACY_DEPARTMENT } from "../interfaces/employee.interface";
import { dateString, timeOfDayString } from "./common.validator";

const employeeFields = {
    name: Joi.string().trim().min(1).required(),
    role: Joi.string().trim().min(1).required(),
    department: Joi.string()
        .valid(...DEPARTMENTS)
        .required(),
    salary: Joi.number().min(0).required(),
    expectedLogin: timeOfDayString().required(),
    expectedLogout: timeOfDayString().required(),
    hireDate: dateString().required(),
    status: Joi.string()
        .valid(...EMPLOYEE_STATUSES)
        .default("Active"),
};

export const employeeInsertSchema = Joi.object<EmployeeInsert>(employeeFields);

export const employeeBatchUpdateSchema = Joi.array<EmployeeUpdate[]>()
    .items(
        Joi.object<EmployeeUpdate>({
            id: Joi.number().integer().positive().required(),
            ...employeeFields,
            department: Joi.string()
                .valid(...DEPARTMENTS, LEGACY_DEPARTMENT)
                .required(),
        }),
    )
    .min(1)
    .required();
