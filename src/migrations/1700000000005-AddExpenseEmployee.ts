import { TableColumnOptions } from "typeorm";
import { AddColumnWithBackfill } from "./addColumnWithBackfill";

// Non-salary expenses stay unattributed, so there is nothing to back-fill.
export class AddExpenseEmployee1700000000005 extends AddColumnWithBackfill {
    protected readonly table = "expenses";
    protected readonly column: TableColumnOptions = {
        name: "emp_id",
        type: "integer",
        isNullable: true,
    };
}
