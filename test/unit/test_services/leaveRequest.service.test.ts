import { DataSource, EntityManager } from "typeorm";
import { LeaveRequestService, leaveDurationDays } from "../../../src/services/leaveRequest.service";
import { NotificationService } from "../../../src/services/notification.service";
import redisClient from "../../../src/config/redis";
import { EmployeeRepository } from "../../../src/repositories/employee.repository";
import { LeaveRequestRepository } from "../../../src/repositories/leaveRequest.repository";
import { Employee } from "../../../src/entities/employee.entity";
import { LeaveRequest } from "../../../src/entities/leaveRequest.entity";
import { LeaveRequestInsert } from "../../../src/interfaces/leaveRequest.interface";
import { BadRequestError, ConflictError, NotFoundError } from "../../../src/utils/errors";

// Mock Redis
jest.mock("../../../src/config/redis", () => ({
    get: jest.fn(),
    setEx: jest.fn(),
    del: jest.fn(),
}));

function leave(overrides: Partial<LeaveRequest>): LeaveRequest {
    return Object.assign(new LeaveRequest(), {
        id: 1,
        employeeId: 7,
        startDate: "2025-01-01",
        endDate: "2025-01-05",
        type: "Annual",
        status: "Pending",
        reason: "Family trip",
        ...overrides,
    });
}

const employee = Object.assign(new Employee(), { id: 7, name: "Ada", status: "Active" });

describe("LeaveRequestService", () => {
    let service: LeaveRequestService;
    let dataSource: jest.Mocked<DataSource>;
    let employeeRepo: jest.Mocked<EmployeeRepository>;
    let leaveRepo: jest.Mocked<LeaveRequestRepository>;
    let notifier: jest.Mocked<NotificationService>;
    let txLeaveRepo: { create: jest.Mock; save: jest.Mock; update: jest.Mock; findOne: jest.Mock };

    beforeEach(() => {
        jest.clearAllMocks();

        txLeaveRepo = { create: jest.fn(), save: jest.fn(), update: jest.fn(), findOne: jest.fn() };
        const manager = { getRepository: jest.fn().mockReturnValue(txLeaveRepo) } as unknown as EntityManager;

        dataSource = {
            transaction: jest.fn(async (work: (manager: EntityManager) => Promise<unknown>) => work(manager)),
        } as unknown as jest.Mocked<DataSource>;

        employeeRepo = {
            getEmployeeById: jest.fn(),
            getEmployeesByIds: jest.fn(),
        } as unknown as jest.Mocked<EmployeeRepository>;

        leaveRepo = {
            find: jest.fn(),
            findById: jest.fn(),
            countPending: jest.fn(),
            deleteRequest: jest.fn(),
        } as unknown as jest.Mocked<LeaveRequestRepository>;

        notifier = {
            notifyLeaveRequest: jest.fn(),
        } as unknown as jest.Mocked<NotificationService>;

        service = new LeaveRequestService(dataSource, employeeRepo, leaveRepo, notifier);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe("createLeaveRequest", () => {
        const payload: LeaveRequestInsert = {
            employeeId: 7,
            startDate: "2025-01-01",
            endDate: "2025-01-05",
            type: "Annual",
            reason: "Family trip",
        };

        it("records the request, stores the idempotency key and emails the admin", async () => {
            const created = leave({});
            (redisClient.get as jest.Mock).mockResolvedValue(null);
            employeeRepo.getEmployeeById.mockResolvedValue(employee);
            txLeaveRepo.create.mockReturnValue(created);
            txLeaveRepo.save.mockResolvedValue(created);
            notifier.notifyLeaveRequest.mockResolvedValue({ delivered: true });

            const result = await service.createLeaveRequest(payload, "leave-key-001");

            expect(result).toEqual({ leaveRequest: created, notification: { delivered: true } });
            expect(dataSource.transaction).toHaveBeenCalledTimes(1);
            expect(redisClient.setEx).toHaveBeenCalledWith(
                "idempotency:leaverequest:create:leave-key-001",
                86400,
                expect.any(String),
            );
            expect(notifier.notifyLeaveRequest).toHaveBeenCalledWith({
                name: "Ada",
                startDate: "2025-01-01",
                endDate: "2025-01-05",
                type: "Annual",
                reason: "Family trip",
            });
        });

        it("keeps the request when the email cannot be sent", async () => {
            jest.spyOn(console, "warn").mockImplementation(() => undefined);
            const created = leave({});
            (redisClient.get as jest.Mock).mockResolvedValue(null);
            employeeRepo.getEmployeeById.mockResolvedValue(employee);
            txLeaveRepo.create.mockReturnValue(created);
            txLeaveRepo.save.mockResolvedValue(created);
            notifier.notifyLeaveRequest.mockResolvedValue({ delivered: false, reason: "smtp down" });

            const result = await service.createLeaveRequest(payload, "leave-key-002");

            expect(result.leaveRequest).toBe(created);
            expect(result.notification).toEqual({ delivered: false, reason: "smtp down" });
        });

        it("accepts a single-day leave", async () => {
            const created = leave({ endDate: "2025-01-01" });
            (redisClient.get as jest.Mock).mockResolvedValue(null);
            employeeRepo.getEmployeeById.mockResolvedValue(employee);
            txLeaveRepo.create.mockReturnValue(created);
            txLeaveRepo.save.mockResolvedValue(created);
            notifier.notifyLeaveRequest.mockResolvedValue({ delivered: true });

            await expect(
                service.createLeaveRequest({ ...payload, endDate: "2025-01-01" }, "leave-key-003"),
            ).resolves.toMatchObject({ leaveRequest: { endDate: "2025-01-01" } });
        });

        it("rejects an end date before the start date", async () => {
            (redisClient.get as jest.Mock).mockResolvedValue(null);
            employeeRepo.getEmployeeById.mockResolvedValue(employee);

            await expect(
                service.createLeaveRequest({ ...payload, endDate: "2024-12-31" }, "leave-key-004"),
            ).rejects.toBeInstanceOf(BadRequestError);
            expect(dataSource.transaction).not.toHaveBeenCalled();
            expect(notifier.notifyLeaveRequest).not.toHaveBeenCalled();
        });

        it("rejects an unknown employee", async () => {
            (redisClient.get as jest.Mock).mockResolvedValue(null);
            employeeRepo.getEmployeeById.mockResolvedValue(null);

            await expect(service.createLeaveRequest(payload, "leave-key-005")).rejects.toBeInstanceOf(NotFoundError);
        });

        it("rejects a repeated idempotency key", async () => {
            (redisClient.get as jest.Mock).mockResolvedValue(JSON.stringify({ leaveRequestId: 1 }));

            await expect(service.createLeaveRequest(payload, "leave-key-006")).rejects.toBeInstanceOf(ConflictError);
            expect(employeeRepo.getEmployeeById).not.toHaveBeenCalled();
        });
    });

    describe("listLeaveRequests", () => {
        it("adds names, inclusive durations and a summary", async () => {
            leaveRepo.find.mockResolvedValue([
                leave({ id: 1, startDate: "2025-01-01", endDate: "2025-01-05", status: "Approved", type: "Annual" }),
                leave({ id: 2, startDate: "2025-02-10", endDate: "2025-02-10", status: "Pending", type: "Sick" }),
            ]);
            employeeRepo.getEmployeesByIds.mockResolvedValue([employee]);

            const { requests, summary } = await service.listLeaveRequests({});

            expect(requests.map((request) => [request.name, request.durationDays])).toEqual([
                ["Ada", 5],
                ["Ada", 1],
            ]);
            expect(summary).toEqual({
                totalRequests: 2,
                pendingRequests: 1,
                approvedRequests: 1,
                totalLeaveDays: 6,
                byType: { Annual: 1, Sick: 1 },
                byStatus: { Approved: 1, Pending: 1 },
            });
        });
    });

    describe("updateStatus", () => {
        it("approves a pending request", async () => {
            const approved = leave({ status: "Approved" });
            leaveRepo.findById.mockResolvedValue(leave({}));
            txLeaveRepo.update.mockResolvedValue({ affected: 1 });
            txLeaveRepo.findOne.mockResolvedValue(approved);

            await expect(service.updateStatus(1, "Approved")).resolves.toBe(approved);
            expect(txLeaveRepo.update).toHaveBeenCalledWith({ id: 1 }, { status: "Approved" });
        });

        it("refuses to change a request that was already decided", async () => {
            leaveRepo.findById.mockResolvedValue(leave({ status: "Rejected" }));

            await expect(service.updateStatus(1, "Approved")).rejects.toThrow(
                "Cannot update leave request status from Rejected to Approved. Only Pending requests can be updated.",
            );
            expect(dataSource.transaction).not.toHaveBeenCalled();
        });

        it("throws NotFoundError for an unknown request", async () => {
            leaveRepo.findById.mockResolvedValue(null);

            await expect(service.updateStatus(42, "Rejected")).rejects.toBeInstanceOf(NotFoundError);
        });
    });
});

describe("leaveDurationDays", () => {
    it("counts both ends of the range", () => {
        expect(leaveDurationDays("2025-03-30", "2025-04-02")).toBe(4);
    });

    it("is zero for unreadable dates", () => {
        expect(leaveDurationDays("soon", "2025-04-02")).toBe(0);
    });
});
