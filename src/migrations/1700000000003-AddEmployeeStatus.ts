import { TableColumnOptions } from "typeorm";
import { AddColumnWithBackfill } from "./addColumnWithBackfill";

export class AddEmployeeStatus1700000000003 extends AddColumnWithBackfill {
    protected readonly table = "employees";
    protected readonly column: TableColumnOptions = {
        name: "status",
        type: "varchar",
        length: "16",
        isNullable: true,
        default: "'Active'",
    };
    protected readonly backfill = "Active";
}
