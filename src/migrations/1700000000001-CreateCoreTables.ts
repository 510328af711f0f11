import { MigrationInterface, QueryRunner, Table, TableColumnOptions } from "typeorm";

const primaryKey = (name: string): TableColumnOptions => ({
    name,
    type: "integer",
    isPrimary: true,
    isGenerated: true,
    generationStrategy: "increment",
});

const text = (name: string, length = "255", isNullable = true): TableColumnOptions => ({
    name,
    type: "varchar",
    length,
    isNullable,
});

const employeeRef: TableColumnOptions = { name: "emp_id", type: "integer", isNullable: true };

/**
 * Creates every table that does not exist yet. Tables created here already
 * carry the current column set, so the back-fill steps that follow are no-ops
 * on a fresh database.
 */
export class CreateCoreTables1700000000001 implements MigrationInterface {
    private readonly tables: Table[] = [
        new Table({
            name: "employees",
            columns: [
                primaryKey("emp_id"),
                text("name"),
                text("role"),
                { ...text("department", "64"), default: "'Unknown'" },
                { name: "salary", type: "double", isNullable: true },
                text("expected_login", "8"),
                text("expected_logout", "8"),
                text("hire_date", "10"),
                { ...text("status", "16"), default: "'Active'" },
            ],
            indices: [{ columnNames: ["status"] }],
        }),
        new Table({
            name: "attendance",
            columns: [
                primaryKey("att_id"),
                employeeRef,
                text("login_time", "19"),
                { name: "break_duration", type: "integer", default: 0 },
                text("logout_time", "19"),
                { name: "notes", type: "text", isNullable: true },
            ],
            indices: [{ columnNames: ["emp_id"] }],
        }),
        new Table({
            name: "tasks",
            columns: [
                primaryKey("task_id"),
                employeeRef,
                text("task_name"),
                { name: "description", type: "text", isNullable: true },
                text("assigned_date", "10"),
                text("due_date", "10"),
                text("submission_date", "10"),
                text("status", "32"),
                text("priority", "16"),
            ],
            indices: [{ columnNames: ["emp_id"] }],
        }),
        new Table({
            name: "expenses",
            columns: [
                primaryKey("exp_id"),
                text("category", "32"),
                { name: "amount", type: "double", isNullable: true },
                text("month", "10"),
                { name: "description", type: "text", isNullable: true },
                employeeRef,
            ],
            indices: [{ columnNames: ["category", "month"] }, { columnNames: ["emp_id"] }],
        }),
        new Table({
            name: "revenues",
            columns: [
                primaryKey("rev_id"),
                text("source", "32"),
                { name: "amount", type: "double", isNullable: true },
                text("month", "10"),
                { name: "description", type: "text", isNullable: true },
            ],
            indices: [{ columnNames: ["month"] }],
        }),
        new Table({
            name: "performance_reviews",
            columns: [
                primaryKey("review_id"),
                employeeRef,
                text("review_date", "10"),
                { name: "rating", type: "integer", isNullable: true },
                { name: "comments", type: "text", isNullable: true },
                text("reviewer"),
            ],
            indices: [{ columnNames: ["emp_id"] }],
        }),
        new Table({
            name: "leaves",
            columns: [
                primaryKey("leave_id"),
                employeeRef,
                text("start_date", "10"),
                text("end_date", "10"),
                text("type", "16"),
                { ...text("status", "16"), default: "'Pending'" },
                { name: "reason", type: "text", isNullable: true },
            ],
            indices: [{ columnNames: ["emp_id"] }, { columnNames: ["status"] }],
        }),
    ];

    public async up(queryRunner: QueryRunner): Promise<void> {
        for (const table of this.tables) {
            if (await queryRunner.hasTable(table.name)) continue;
            await queryRunner.createTable(table, true, false, true);
        }
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        for (const table of [...this.tables].reverse()) {
            await queryRunner.dropTable(table.name, true);
        }
    }
}
