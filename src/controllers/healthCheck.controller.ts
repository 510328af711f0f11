import os from "os";
import { Request, Response } from "express";
import { AppDataSource } from "../config/datasource";
import redisClient from "../config/redis";
import Settings from "../config/settings";
import { describeError } from "../utils/errors";

type DependencyStatus = { status: "connected"; [detail: string]: unknown } | { status: "disconnected"; error: string };

// Get system information
export function getSystemInfo() {
    const totalMem = os.totalmem();
    const freeMem = os.freemem();
    const usedMem = totalMem - freeMem;

    return {
        hostname: os.hostname(),
        platform: os.platform(),
        arch: os.arch(),
        cpus: os.cpus().length,
        uptime: os.uptime(),
        memory: {
            total: `${(totalMem / 1024 / 1024 / 1024).toFixed(2)} GB`,
            free: `${(freeMem / 1024 / 1024 / 1024).toFixed(2)} GB`,
            used: `${(usedMem / 1024 / 1024 / 1024).toFixed(2)} GB`,
            usage: `${((usedMem / totalMem) * 100).toFixed(2)}%`,
        },
        loadAverage: os.loadavg(),
    };
}

async function getDatabaseInfo(): Promise<DependencyStatus> {
    try {
        await AppDataSource.query("SELECT 1");
        return { status: "connected", type: Settings.DB_TYPE };
    } catch (error) {
        return { status: "disconnected", error: describeError(error) };
    }
}

async function getRedisInfo(): Promise<DependencyStatus> {
    try {
        const pong = await redisClient.ping();
        return { status: "connected", ping: pong };
    } catch (error) {
        return { status: "disconnected", error: describeError(error) };
    }
}

export class HealthCheck {
    /** GET /health — 503 when the database or Redis is unreachable. */
    async getFullSystemHealth(_req: Request, res: Response) {
        const database = await getDatabaseInfo();
        const redis = await getRedisInfo();
        const isHealthy = database.status === "connected" && redis.status === "connected";

        res.status(isHealthy ? 200 : 503).json({
            status: isHealthy ? "healthy" : "unhealthy",
            timestamp: new Date().toISOString(),
            system: getSystemInfo(),
            database,
            redis,
        });
    }

    // Separate endpoint for system check only
    async getSystemHealth(_req: Request, res: Response) {
        res.json({
            status: "healthy",
            timestamp: new Date().toISOString(),
            system: getSystemInfo(),
        });
    }
}
