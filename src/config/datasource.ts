import { DataSource, DataSourceOptions } from "typeorm";
import Settings from "./settings";
import { Employee } from "../entities/employee.entity";
import { Attendance } from "../entities/attendance.entity";
import { Task } from "../entities/task.entity";
import { Expense } from "../entities/expense.entity";
import { Revenue } from "../entities/revenue.entity";
import { PerformanceReview } from "../entities/performanceReview.entity";
import { LeaveRequest } from "../entities/leaveRequest.entity";
import { migrations } from "../migrations";

export const entities = [Employee, Attendance, Task, Expense, Revenue, PerformanceReview, LeaveRequest];

function buildOptions(): DataSourceOptions {
    // Schema is owned by the migration steps, never synchronized from entities.
    const shared = {
        entities,
        migrations,
        migrationsRun: true,
        synchronize: false,
        logging: Settings.DB_LOGGING,
    };

    if (Settings.DB_TYPE === "better-sqlite3") {
        return { ...shared, type: "better-sqlite3", database: Settings.DB_NAME };
    }

    return {
        ...shared,
        type: "mysql",
        host: Settings.DB_HOST,
        port: Settings.DB_PORT,
        username: Settings.DB_USER,
        password: Settings.DB_PASSWORD,
        database: Settings.DB_NAME,
    };
}

export const AppDataSource = new DataSource(buildOptions());
