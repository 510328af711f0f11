import { Between, Repository } from "typeorm";
import { Attendance } from "../entities/attendance.entity";
import { AttendanceFilter, AttendanceInsert } from "../interfaces/attendance.interface";

export class AttendanceRepository {
    private readonly db: Repository<Attendance>;

    constructor(repository: Repository<Attendance>) {
        this.db = repository;
    }

    async createAttendance(record: AttendanceInsert): Promise<Attendance> {
        const entity = this.db.create({
            ...record,
            logoutTime: record.logoutTime ?? null,
            notes: record.notes ?? null,
        });
        return this.db.save(entity);
    }

    async findById(id: number): Promise<Attendance | null> {
        return this.db.findOne({ where: { id } });
    }

    // login_time is stored as "YYYY-MM-DD HH:mm:ss", so string bounds order correctly
    async findInRange(filter: AttendanceFilter): Promise<Attendance[]> {
        return this.db.find({
            where: {
                loginTime: Between(`${filter.from} 00:00:00`, `${filter.to} 23:59:59`),
                ...(filter.employeeId !== undefined ? { employeeId: filter.employeeId } : {}),
            },
            order: { loginTime: "ASC" },
        });
    }

    async updateAttendance(id: number, changes: Partial<AttendanceInsert>): Promise<Attendance | null> {
        await this.db.update({ id }, changes);
        return this.findById(id);
    }

    async deleteAttendance(id: number): Promise<boolean> {
        const result = await this.db.delete({ id });
        return result.affected !== 0;
    }
}
