import "reflect-metadata";
import "dotenv/config";
import app from "./app";
import { AppDataSource } from "./config/datasource";
import redisClient from "./config/redis";
import Settings from "./config/settings";
import { PayrollService } from "./services/payroll.service";
import { EmployeeRepository } from "./repositories/employee.repository";
import { ExpenseRepository } from "./repositories/expense.repository";
import { Employee } from "./entities/employee.entity";
import { Expense } from "./entities/expense.entity";
import { currentMonthKey } from "./utils/months";

/**
 * Initialize all required services
 * @returns Promise<boolean> - true if all services initialized successfully
 */
async function initializeServices(): Promise<boolean> {
    try {
        // Migrations run as part of initialization
        console.log("Initializing Database connection...");
        await AppDataSource.initialize();
        console.log("Database connection established successfully");
    } catch (error) {
        console.error("Database connection failed:", error);
        return false;
    }

    try {
        console.log("Connecting to Redis...");
        await redisClient.connect();

        const pingResponse = await redisClient.ping();
        if (pingResponse !== "PONG") {
            throw new Error("Redis ping failed");
        }

        console.log("Redis connection established successfully");
    } catch (error) {
        console.error("Redis connection failed:", error);
        await AppDataSource.destroy();
        return false;
    }

    return true;
}

// Record any missing salary expenses for the month the process starts in.
async function reconcileCurrentMonth(): Promise<void> {
    const payroll = new PayrollService(
        new EmployeeRepository(AppDataSource.getRepository(Employee)),
        new ExpenseRepository(AppDataSource.getRepository(Expense)),
    );
    try {
        const { month, created } = await payroll.reconcileSalaries(currentMonthKey());
        console.log(`Salary reconciliation for ${month}: ${created.length} new entr${created.length === 1 ? "y" : "ies"}`);
    } catch (error) {
        console.error("Salary reconciliation failed:", error);
    }
}

/**
 * Gracefully shutdown all services
 */
async function gracefulShutdown(signal: string): Promise<void> {
    console.log(`\n${signal} received. Starting graceful shutdown...`);

    try {
        console.log("Closing Redis connection...");
        await redisClient.quit();
        console.log("Redis connection closed");
    } catch (error) {
        console.error("Error closing Redis connection:", error);
    }

    try {
        console.log("Closing Database connection...");
        await AppDataSource.destroy();
        console.log("Database connection closed");
    } catch (error) {
        console.error("Error closing Database connection:", error);
    }

    console.log("Shutdown complete");
    process.exit(0);
}

/**
 * Start the application
 */
async function startApp(): Promise<void> {
    console.log("Starting application...\n");

    const servicesInitialized = await initializeServices();
    if (!servicesInitialized) {
        console.error("\nFailed to initialize all required services");
        console.error("Application startup aborted");
        process.exit(1);
    }

    await reconcileCurrentMonth();

    app.listen(Settings.PORT, () => {
        console.log("\nAll services initialized successfully");
        console.log(`Server is running on port ${Settings.PORT}`);
        console.log(`Environment: ${Settings.NODE_ENV}`);
    });

    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
}

startApp().catch((error) => {
    console.error("\nUnexpected error during application startup:", error);
    process.exit(1);
});
