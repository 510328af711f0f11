export const LEAVE_TYPES = ["Sick", "Casual", "Annual", "Maternity", "Paternity"] as const;
export type LeaveType = (typeof LEAVE_TYPES)[number];

export const LEAVE_STATUSES = ["Pending", "Approved", "Rejected"] as const;
export type LeaveStatus = (typeof LEAVE_STATUSES)[number];
export type LeaveDecision = Exclude<LeaveStatus, "Pending">;

export interface ILeaveRequest {
    id: number;
    employeeId: number;
    startDate: string;
    endDate: string;
    type: LeaveType;
    status: LeaveStatus;
    reason: string | null;
}

export interface LeaveRequestInsert {
    employeeId: number;
    startDate: string;
    endDate: string;
    type: LeaveType;
    reason?: string | null;
}

export interface LeaveRequestFilter {
    employeeId?: number;
    status?: LeaveStatus;
}

export interface LeaveRequestView extends ILeaveRequest {
    name: string;
    durationDays: number;
}

export interface LeaveSummary {
    totalRequests: number;
    pendingRequests: number;
    approvedRequests: number;
    totalLeaveDays: number;
    byType: Record<string, number>;
    byStatus: Record<string, number>;
}
