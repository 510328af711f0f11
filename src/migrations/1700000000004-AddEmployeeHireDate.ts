import { TableColumnOptions } from "typeorm";
import { AddColumnWithBackfill } from "./addColumnWithBackfill";

export class AddEmployeeHireDate1700000000004 extends AddColumnWithBackfill {
    protected readonly table = "employees";
    protected readonly column: TableColumnOptions = {
        name: "hire_date",
        type: "varchar",
        length: "10",
        isNullable: true,
    };
    protected readonly backfill = "2023-01-01";
}
