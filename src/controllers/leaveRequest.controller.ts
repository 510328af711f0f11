import { Request, Response } from "express";
import { LeaveRequestService } from "../services/leaveRequest.service";
import { NotificationService } from "../services/notification.service";
import { AppDataSource } from "../config/datasource";
import { EmployeeRepository } from "../repositories/employee.repository";
import { LeaveRequestRepository } from "../repositories/leaveRequest.repository";
import { Employee } from "../entities/employee.entity";
import { LeaveRequest } from "../entities/leaveRequest.entity";
import {
    leaveDecisionSchema,
    leaveRequestFilterSchema,
    leaveRequestInsertSchema,
} from "../validators/leaveRequest.validator";
import { idSchema } from "../validators/common.validator";
import { readIdempotencyKey } from "../middlewares/idempotency.middleware";
import { AuthenticatedSession } from "../middlewares/adminSession.middleware";
import { validatePayload } from "../utils/validation";

export class LeaveRequestController {
    private readonly leaveService: LeaveRequestService;

    constructor(notifier: NotificationService = new NotificationService()) {
        this.leaveService = new LeaveRequestService(
            AppDataSource,
            new EmployeeRepository(AppDataSource.getRepository(Employee)),
            new LeaveRequestRepository(AppDataSource.getRepository(LeaveRequest)),
            notifier,
        );
    }

    /** POST /leave-requests — 201 with the request and whether the admin was emailed. */
    async createLeaveRequest(req: Request, res: Response) {
        const idempotencyKey = readIdempotencyKey(req);
        const payload = validatePayload(leaveRequestInsertSchema, req.body);
        res.status(201).json(await this.leaveService.createLeaveRequest(payload, idempotencyKey));
    }

    async listLeaveRequests(req: Request, res: Response) {
        const filter = validatePayload(leaveRequestFilterSchema, req.query);
        res.json(await this.leaveService.listLeaveRequests(filter));
    }

    async countPending(_req: Request, res: Response) {
        res.json({ pending: await this.leaveService.countPending() });
    }

    async decideLeaveRequest(req: Request, res: Response, session: AuthenticatedSession) {
        const id = validatePayload(idSchema, req.params.id);
        const { status } = validatePayload(leaveDecisionSchema, req.body);

        const updated = await this.leaveService.updateStatus(id, status);
        console.log(`Leave request ${id} ${status.toLowerCase()} by ${session.email}`);
        res.json(updated);
    }

    async deleteLeaveRequest(req: Request, res: Response) {
        const id = validatePayload(idSchema, req.params.id);
        await this.leaveService.deleteLeaveRequest(id);
        res.status(204).send();
    }
}
