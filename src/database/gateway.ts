import { DataSource } from "typeorm";
import { describeError } from "../utils/errors";

export type QueryParam = string | number | null;

export type ReadResult<T> = { ok: true; rows: T[] } | { ok: false; error: string };

export type WriteResult =
    | { ok: true; insertId: number | null; affected: number }
    | { ok: false; error: string };

export interface WriteOptions {
    returnId?: boolean;
}

function extractInsertId(raw: unknown): number | null {
    if (typeof raw === "number") return raw;
    if (typeof raw === "bigint") return Number(raw);
    if (typeof raw !== "object" || raw === null) return null;
    // mysql2 result header
    if ("insertId" in raw && typeof raw.insertId === "number") return raw.insertId;
    // better-sqlite3 run info
    if ("lastInsertRowid" in raw) return extractInsertId(raw.lastInsertRowid);
    return null;
}

/**
 * Parameterized access to the store for reports that do not map onto a single
 * entity. Failures come back as values; nothing here throws.
 */
export class DatabaseGateway {
    constructor(private readonly dataSource: DataSource) {}

    async fetchRows<T extends object>(sql: string, params: QueryParam[] = []): Promise<ReadResult<T>> {
        try {
            const rows: unknown = await this.dataSource.query(sql, params);
            return { ok: true, rows: Array.isArray(rows) ? rows : [] };
        } catch (error) {
            console.error("Error fetching data:", describeError(error));
            return { ok: false, error: describeError(error) };
        }
    }

    async execute(sql: string, params: QueryParam[] = [], options: WriteOptions = {}): Promise<WriteResult> {
        const runner = this.dataSource.createQueryRunner();
        try {
            const result = await runner.query(sql, params, true);
            return {
                ok: true,
                insertId: options.returnId ? extractInsertId(result.raw) : null,
                affected: result.affected ?? 0,
            };
        } catch (error) {
            console.error("Error executing query:", describeError(error));
            return { ok: false, error: describeError(error) };
        } finally {
            await runner.release();
        }
    }
}
