import { DataSource } from "typeorm";
import { differenceInCalendarDays } from "date-fns";
import redisClient from "../config/redis";
import Settings from "../config/settings";
import { LeaveRequestRepository } from "../repositories/leaveRequest.repository";
import { EmployeeRepository } from "../repositories/employee.repository";
import { LeaveRequest } from "../entities/leaveRequest.entity";
import {
    ILeaveRequest,
    LeaveDecision,
    LeaveRequestFilter,
    LeaveRequestInsert,
    LeaveRequestView,
    LeaveSummary,
} from "../interfaces/leaveRequest.interface";
import { NotificationOutcome, NotificationService } from "./notification.service";
import { BadRequestError, ConflictError, NotFoundError } from "../utils/errors";
import { parseDate } from "../utils/timeMetrics";

export interface CreatedLeaveRequest {
    leaveRequest: ILeaveRequest;
    notification: NotificationOutcome;
}

/** Inclusive day count; 0 when either date cannot be read. */
export function leaveDurationDays(startDate: string, endDate: string): number {
    const start = parseDate(startDate);
    const end = parseDate(endDate);
    if (!start || !end) return 0;
    return differenceInCalendarDays(end, start) + 1;
}

function countBy<T>(items: readonly T[], keyOf: (item: T) => string): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const item of items) {
        const key = keyOf(item);
        counts[key] = (counts[key] ?? 0) + 1;
    }
    return counts;
}

export class LeaveRequestService {
    constructor(
        private dataSource: DataSource,
        private employeeRepo: EmployeeRepository,
        private leaveRepo: LeaveRequestRepository,
        private notifier: NotificationService,
    ) {}

    /**
     * Records a pending leave request, then emails the admin. A failed email
     * is reported in the result; the request stays recorded.
     */
    async createLeaveRequest(payload: LeaveRequestInsert, idempotencyKey: string): Promise<CreatedLeaveRequest> {
        const idempotencyRedisKey = `idempotency:leaverequest:create:${idempotencyKey}`;

        const existing = await redisClient.get(idempotencyRedisKey);
        if (existing) {
            throw new ConflictError("Duplicate request: operation already performed with this idempotency key");
        }

        const employee = await this.employeeRepo.getEmployeeById(payload.employeeId);
        if (!employee) {
            throw new NotFoundError(`Employee with ID ${payload.employeeId} not found`);
        }

        if (leaveDurationDays(payload.startDate, payload.endDate) < 1) {
            throw new BadRequestError("End date must be on or after start date");
        }

        const created = await this.dataSource.transaction(async (manager) => {
            const transactionalLeaveRepo = new LeaveRequestRepository(manager.getRepository(LeaveRequest));
            return await transactionalLeaveRepo.createRequest(payload);
        });

        await redisClient.setEx(
            idempotencyRedisKey,
            Settings.IDEMPOTENCY_TTL,
            JSON.stringify({ leaveRequestId: created.id, createdAt: new Date() }),
        );

        const notification = await this.notifier.notifyLeaveRequest({
            name: employee.name,
            startDate: created.startDate,
            endDate: created.endDate,
            type: created.type,
            reason: created.reason,
        });
        if (!notification.delivered) {
            console.warn(`Leave request ${created.id} recorded but admin was not notified: ${notification.reason}`);
        }

        return { leaveRequest: created, notification };
    }

    async listLeaveRequests(filter: LeaveRequestFilter = {}): Promise<{ requests: LeaveRequestView[]; summary: LeaveSummary }> {
        const rows = await this.leaveRepo.find(filter);
        const employees = await this.employeeRepo.getEmployeesByIds([...new Set(rows.map((row) => row.employeeId))]);
        const names = new Map(employees.map((employee) => [employee.id, employee.name]));

        const requests = rows.map((row) => ({
            ...row,
            name: names.get(row.employeeId) ?? "Unknown",
            durationDays: leaveDurationDays(row.startDate, row.endDate),
        }));

        return {
            requests,
            summary: {
                totalRequests: requests.length,
                pendingRequests: requests.filter((request) => request.status === "Pending").length,
                approvedRequests: requests.filter((request) => request.status === "Approved").length,
                totalLeaveDays: requests.reduce((total, request) => total + request.durationDays, 0),
                byType: countBy(requests, (request) => request.type),
                byStatus: countBy(requests, (request) => request.status),
            },
        };
    }

    async countPending(): Promise<number> {
        return this.leaveRepo.countPending();
    }

    /** Approves or rejects a request. Only pending requests can be decided. */
    async updateStatus(id: number, status: LeaveDecision): Promise<ILeaveRequest> {
        const existingRequest = await this.leaveRepo.findById(id);
        if (!existingRequest) {
            throw new NotFoundError(`Leave request with ID ${id} not found`);
        }

        if (existingRequest.status !== "Pending") {
            throw new BadRequestError(
                `Cannot update leave request status from ${existingRequest.status} to ${status}. Only Pending requests can be updated.`,
            );
        }

        const updated = await this.dataSource.transaction(async (manager) => {
            const transactionalLeaveRepo = new LeaveRequestRepository(manager.getRepository(LeaveRequest));
            return await transactionalLeaveRepo.updateStatus(id, status);
        });
        if (!updated) {
            throw new NotFoundError(`Leave request with ID ${id} not found`);
        }
        return updated;
    }

    async deleteLeaveRequest(id: number): Promise<void> {
        const existingRequest = await this.leaveRepo.findById(id);
        if (!existingRequest) {
            throw new NotFoundError(`Leave request with ID ${id} not found`);
        }
        await this.leaveRepo.deleteRequest(id);
    }
}
