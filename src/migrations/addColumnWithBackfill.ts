import { MigrationInterface, QueryRunner, TableColumn, TableColumnOptions } from "typeorm";

/**
 * A forward-only step that adds one column to a table created by an older
 * release and fills it for rows that predate it. Safe to run any number of
 * times.
 */
export abstract class AddColumnWithBackfill implements MigrationInterface {
    protected abstract readonly table: string;
    protected abstract readonly column: TableColumnOptions;
    protected readonly backfill: string | null = null;

    public async up(queryRunner: QueryRunner): Promise<void> {
        if (!(await queryRunner.hasTable(this.table))) return;

        if (!(await queryRunner.hasColumn(this.table, this.column.name))) {
            await queryRunner.addColumn(this.table, new TableColumn(this.column));
        }

        if (this.backfill !== null) {
            await queryRunner.query(
                `UPDATE ${this.table} SET ${this.column.name} = ? WHERE ${this.column.name} IS NULL`,
                [this.backfill],
            );
        }
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        if (await queryRunner.hasColumn(this.table, this.column.name)) {
            await queryRunner.dropColumn(this.table, this.column.name);
        }
    }
}
