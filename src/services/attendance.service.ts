import { AttendanceRepository } from "../repositories/attendance.repository";
import { EmployeeRepository } from "../repositories/employee.repository";
import { Attendance } from "../entities/attendance.entity";
import { Employee } from "../entities/employee.entity";
import {
    AttendanceFilter,
    AttendanceInsert,
    AttendanceSummary,
    AttendanceView,
} from "../interfaces/attendance.interface";
import { BadRequestError, NotFoundError } from "../utils/errors";
import { lateEarly, parseTimestamp, workingHours } from "../utils/timeMetrics";

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

// A missing logout is allowed (still clocked in); a present one must follow login.
function assertLogoutAfterLogin(record: Pick<AttendanceInsert, "loginTime" | "logoutTime">) {
    const login = parseTimestamp(record.loginTime);
    if (!login) {
        throw new BadRequestError(`Invalid login time: ${record.loginTime}`);
    }
    if (!record.logoutTime) return;

    const logout = parseTimestamp(record.logoutTime);
    if (!logout) {
        throw new BadRequestError(`Invalid logout time: ${record.logoutTime}`);
    }
    if (logout <= login) {
        throw new BadRequestError("Logout time must be after login time");
    }
}

export function toAttendanceView(record: Attendance, employee: Employee | undefined): AttendanceView {
    const punctuality = lateEarly(
        record.loginTime,
        employee?.expectedLogin,
        record.logoutTime,
        employee?.expectedLogout,
    );
    return {
        ...record,
        name: employee?.name ?? "Unknown",
        workingHours: workingHours(record.loginTime, record.logoutTime, record.breakDuration),
        lateMinutes: punctuality.lateMinutes,
        earlyMinutes: punctuality.earlyMinutes,
    };
}

export function summarizeAttendance(views: readonly AttendanceView[]): AttendanceSummary {
    const byDay = new Map<string, number>();
    const byEmployee = new Map<string, number>();
    for (const view of views) {
        const day = view.loginTime.slice(0, 10);
        byDay.set(day, (byDay.get(day) ?? 0) + view.workingHours);
        byEmployee.set(view.name, (byEmployee.get(view.name) ?? 0) + view.workingHours);
    }

    const totalHours = views.reduce((total, view) => total + view.workingHours, 0);
    return {
        totalHours: round2(totalHours),
        averageHours: views.length > 0 ? round2(totalHours / views.length) : 0,
        lateArrivals: views.filter((view) => view.lateMinutes > 0).length,
        earlyDepartures: views.filter((view) => view.earlyMinutes > 0).length,
        hoursByDay: [...byDay.entries()]
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([date, hours]) => ({ date, hours: round2(hours) })),
        hoursByEmployee: [...byEmployee.entries()]
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([name, hours]) => ({ name, hours: round2(hours) })),
    };
}

export class AttendanceService {
    constructor(
        private attendanceRepo: AttendanceRepository,
        private employeeRepo: EmployeeRepository,
    ) {}

    async recordAttendance(record: AttendanceInsert): Promise<Attendance> {
        assertLogoutAfterLogin(record);

        const employee = await this.employeeRepo.getEmployeeById(record.employeeId);
        if (!employee) {
            throw new NotFoundError(`Employee with ID ${record.employeeId} not found`);
        }
        return this.attendanceRepo.createAttendance(record);
    }

    async listAttendance(filter: AttendanceFilter): Promise<{ records: AttendanceView[]; summary: AttendanceSummary }> {
        const rows = await this.attendanceRepo.findInRange(filter);
        const employees = await this.employeeRepo.getEmployeesByIds([...new Set(rows.map((row) => row.employeeId))]);
        const byId = new Map(employees.map((employee) => [employee.id, employee]));

        const records = rows.map((row) => toAttendanceView(row, byId.get(row.employeeId)));
        return { records, summary: summarizeAttendance(records) };
    }

    async updateAttendance(id: number, changes: AttendanceInsert): Promise<Attendance> {
        assertLogoutAfterLogin(changes);

        const updated = await this.attendanceRepo.updateAttendance(id, {
            ...changes,
            logoutTime: changes.logoutTime ?? null,
            notes: changes.notes ?? null,
        });
        if (!updated) {
            throw new NotFoundError(`Attendance record with ID ${id} not found`);
        }
        return updated;
    }

    async deleteAttendance(id: number): Promise<void> {
        const deleted = await this.attendanceRepo.deleteAttendance(id);
        if (!deleted) {
            throw new NotFoundError(`Attendance record with ID ${id} not found`);
        }
    }
}
