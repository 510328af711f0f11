import { MigrationInterface } from "typeorm";
import { CreateCoreTables1700000000001 } from "./1700000000001-CreateCoreTables";
import { AddEmployeeDepartment1700000000002 } from "./1700000000002-AddEmployeeDepartment";
import { AddEmployeeStatus1700000000003 } from "./1700000000003-AddEmployeeStatus";
import { AddEmployeeHireDate1700000000004 } from "./1700000000004-AddEmployeeHireDate";
import { AddExpenseEmployee1700000000005 } from "./1700000000005-AddExpenseEmployee";

// Applied in this order, once, when the data source initializes.
export const migrations: (new () => MigrationInterface)[] = [
    CreateCoreTables1700000000001,
    AddEmployeeDepartment1700000000002,
    AddEmployeeStatus1700000000003,
    AddEmployeeHireDate1700000000004,
    AddExpenseEmployee1700000000005,
];
