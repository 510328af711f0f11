import { Request, Response } from "express";
import { DashboardService } from "../services/dashboard.service";
import { DatabaseGateway } from "../database/gateway";
import { AppDataSource } from "../config/datasource";

export class DashboardController {
    private readonly dashboardService = new DashboardService(new DatabaseGateway(AppDataSource));

    async overview(_req: Request, res: Response) {
        res.json(await this.dashboardService.overview());
    }
}
