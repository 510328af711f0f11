import { format } from "date-fns";
import { DatabaseGateway, ReadResult } from "../database/gateway";
import { MonthPoint, sumByMonth } from "../finance/aggregation";
import { currentMonthKey } from "../utils/months";
import { DATE_FORMAT } from "../utils/timeMetrics";

export const RECENT_ACTIVITY_LIMIT = 5;

export interface DashboardOverview {
    activeEmployees: number;
    attendanceToday: number;
    pendingTasks: number;
    monthExpenses: number;
    employeesByDepartment: { department: string; count: number }[];
    expenseTrend: MonthPoint[];
    recentCheckIns: { name: string; loginTime: string }[];
    recentTasks: { taskName: string; name: string; status: string }[];
    // sections that could not be read; their figures fall back to zero/empty
    errors: string[];
}

// COUNT/SUM come back as number, bigint or numeric string depending on the driver.
function toNumber(value: unknown): number {
    if (typeof value === "number") return value;
    if (typeof value === "bigint" || typeof value === "string") {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : 0;
    }
    return 0;
}

function toText(value: unknown): string {
    return value === null || value === undefined ? "" : String(value);
}

type Row = Record<string, unknown>;

/** Headline figures, read through the gateway so one failing query does not sink the page. */
export class DashboardService {
    constructor(private readonly gateway: DatabaseGateway) {}

    async overview(now: Date = new Date()): Promise<DashboardOverview> {
        const errors: string[] = [];
        const rowsOf = (section: string, result: ReadResult<Row>): Row[] => {
            if (result.ok) return result.rows;
            errors.push(`${section}: ${result.error}`);
            return [];
        };
        const scalar = (rows: Row[], column: string) => toNumber(rows[0]?.[column]);

        const active = rowsOf(
            "active employees",
            await this.gateway.fetchRows<Row>("SELECT COUNT(*) AS count FROM employees WHERE status = ?", ["Active"]),
        );
        const attendance = rowsOf(
            "attendance today",
            await this.gateway.fetchRows<Row>("SELECT COUNT(*) AS count FROM attendance WHERE login_time LIKE ?", [
                `${format(now, DATE_FORMAT)}%`,
            ]),
        );
        const tasks = rowsOf(
            "pending tasks",
            await this.gateway.fetchRows<Row>("SELECT COUNT(*) AS count FROM tasks WHERE status = ?", ["Pending"]),
        );
        const expenses = rowsOf(
            "month expenses",
            await this.gateway.fetchRows<Row>("SELECT SUM(amount) AS total FROM expenses WHERE month = ?", [
                currentMonthKey(now),
            ]),
        );
        const departments = rowsOf(
            "departments",
            await this.gateway.fetchRows<Row>(
                "SELECT department, COUNT(*) AS count FROM employees WHERE status = ? GROUP BY department ORDER BY department",
                ["Active"],
            ),
        );
        const trend = rowsOf(
            "expense trend",
            await this.gateway.fetchRows<Row>("SELECT month, SUM(amount) AS total FROM expenses GROUP BY month ORDER BY month"),
        );
        const checkIns = rowsOf(
            "recent check-ins",
            await this.gateway.fetchRows<Row>(
                `SELECT a.login_time AS login_time, e.name AS name FROM attendance a
                 JOIN employees e ON a.emp_id = e.emp_id ORDER BY a.login_time DESC LIMIT ${RECENT_ACTIVITY_LIMIT}`,
            ),
        );
        const recentTasks = rowsOf(
            "recent tasks",
            await this.gateway.fetchRows<Row>(
                `SELECT t.task_name AS task_name, e.name AS name, t.status AS status FROM tasks t
                 JOIN employees e ON t.emp_id = e.emp_id ORDER BY t.assigned_date DESC LIMIT ${RECENT_ACTIVITY_LIMIT}`,
            ),
        );

        return {
            activeEmployees: scalar(active, "count"),
            attendanceToday: scalar(attendance, "count"),
            pendingTasks: scalar(tasks, "count"),
            monthExpenses: scalar(expenses, "total"),
            employeesByDepartment: departments.map((row) => ({
                department: toText(row.department),
                count: toNumber(row.count),
            })),
            expenseTrend: sumByMonth(trend.map((row) => ({ month: toText(row.month), amount: toNumber(row.total) }))),
            recentCheckIns: checkIns.map((row) => ({ name: toText(row.name), loginTime: toText(row.login_time) })),
            recentTasks: recentTasks.map((row) => ({
                taskName: toText(row.task_name),
                name: toText(row.name),
                status: toText(row.status),
            })),
            errors,
        };
    }
}
