import { TableColumnOptions } from "typeorm";
import { AddColumnWithBackfill } from "./addColumnWithBackfill";

export class AddEmployeeDepartment1700000000002 extends AddColumnWithBackfill {
    protected readonly table = "employees";
    protected readonly column: TableColumnOptions = {
        name: "department",
        type: "varchar",
        length: "64",
        isNullable: true,
    };
    protected readonly backfill = "Unknown";
}
