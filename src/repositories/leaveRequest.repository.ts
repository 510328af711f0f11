import { Repository } from "typeorm";
import { ILeaveRequest, LeaveRequestFilter, LeaveRequestInsert, LeaveStatus } from "../interfaces/leaveRequest.interface";
import { LeaveRequest } from "../entities/leaveRequest.entity";

export class LeaveRequestRepository {
    private readonly repo: Repository<LeaveRequest>;

    constructor(repo: Repository<LeaveRequest>) {
        this.repo = repo;
    }

    async createRequest(leaveInfo: LeaveRequestInsert): Promise<ILeaveRequest> {
        const request = this.repo.create({
            ...leaveInfo,
            reason: leaveInfo.reason ?? null,
            status: "Pending",
        });
        return await this.repo.save(request);
    }

    async findById(id: number): Promise<ILeaveRequest | null> {
        return await this.repo.findOne({ where: { id } });
    }

    async findByEmployee(employeeId: number): Promise<ILeaveRequest[]> {
        return await this.repo.find({ where: { employeeId } });
    }

    async find(filter: LeaveRequestFilter): Promise<ILeaveRequest[]> {
        return await this.repo.find({
            where: {
                ...(filter.employeeId !== undefined ? { employeeId: filter.employeeId } : {}),
                ...(filter.status !== undefined ? { status: filter.status } : {}),
            },
            order: { startDate: "DESC" },
        });
    }

    async countPending(): Promise<number> {
        return await this.repo.count({ where: { status: "Pending" } });
    }

    async updateStatus(id: number, status: LeaveStatus): Promise<ILeaveRequest | null> {
        await this.repo.update({ id }, { status });
        return await this.findById(id);
    }

    async deleteRequest(id: number): Promise<void> {
        await this.repo.delete({ id });
    }
}
