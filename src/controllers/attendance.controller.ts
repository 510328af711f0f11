import { Request, Response } from "express";
import { AttendanceService } from "../services/attendance.service";
import { AppDataSource } from "../config/datasource";
import { AttendanceRepository } from "../repositories/attendance.repository";
import { EmployeeRepository } from "../repositories/employee.repository";
import { Attendance } from "../entities/attendance.entity";
import { Employee } from "../entities/employee.entity";
import { attendanceInsertSchema } from "../validators/attendance.validator";
import { dateRangeSchema, idSchema } from "../validators/common.validator";
import { validatePayload } from "../utils/validation";

export class AttendanceController {
    private readonly attendanceService: AttendanceService;

    constructor() {
        this.attendanceService = new AttendanceService(
            new AttendanceRepository(AppDataSource.getRepository(Attendance)),
            new EmployeeRepository(AppDataSource.getRepository(Employee)),
        );
    }

    async recordAttendance(req: Request, res: Response) {
        const record = validatePayload(attendanceInsertSchema, req.body);
        res.status(201).json(await this.attendanceService.recordAttendance(record));
    }

    /** GET /attendance?from&to[&employeeId] — rows with hours and punctuality, plus a summary. */
    async listAttendance(req: Request, res: Response) {
        const filter = validatePayload(dateRangeSchema, req.query);
        res.json(await this.attendanceService.listAttendance(filter));
    }

    async updateAttendance(req: Request, res: Response) {
        const id = validatePayload(idSchema, req.params.id);
        const changes = validatePayload(attendanceInsertSchema, req.body);
        res.json(await this.attendanceService.updateAttendance(id, changes));
    }

    async deleteAttendance(req: Request, res: Response) {
        const id = validatePayload(idSchema, req.params.id);
        await this.attendanceService.deleteAttendance(id);
        res.status(204).send();
    }
}
