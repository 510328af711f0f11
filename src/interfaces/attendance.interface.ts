export interface AttendanceInsert {
    employeeId: number;
    loginTime: string; // YYYY-MM-DD HH:mm:ss
    logoutTime?: string | null;
    breakDuration: number; // minutes
    notes?: string | null;
}

export interface AttendanceUpdate extends AttendanceInsert {
    id: number;
}

export interface IAttendance {
    id: number;
    employeeId: number;
    loginTime: string;
    logoutTime: string | null;
    breakDuration: number;
    notes: string | null;
}

export interface AttendanceFilter {
    from: string; // YYYY-MM-DD, inclusive
    to: string; // YYYY-MM-DD, inclusive
    employeeId?: number;
}

export interface AttendanceView extends IAttendance {
    name: string;
    workingHours: number;
    lateMinutes: number;
    earlyMinutes: number;
}

export interface AttendanceSummary {
    totalHours: number;
    averageHours: number;
    lateArrivals: number;
    earlyDepartures: number;
    hoursByDay: { date: string; hours: number }[];
    hoursByEmployee: { name: string; hours: number }[];
}
