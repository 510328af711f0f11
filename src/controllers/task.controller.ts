import { Request, Response } from "express";
import { TaskService } from "../services/task.service";
import { AppDataSource } from "../config/datasource";
import { TaskRepository } from "../repositories/task.repository";
import { EmployeeRepository } from "../repositories/employee.repository";
import { Task } from "../entities/task.entity";
import { Employee } from "../entities/employee.entity";
import { taskInsertSchema } from "../validators/task.validator";
import { dateRangeSchema, idSchema } from "../validators/common.validator";
import { validatePayload } from "../utils/validation";

export class TaskController {
    private readonly taskService: TaskService;

    constructor() {
        this.taskService = new TaskService(
            new TaskRepository(AppDataSource.getRepository(Task)),
            new EmployeeRepository(AppDataSource.getRepository(Employee)),
        );
    }

    async assignTask(req: Request, res: Response) {
        const task = validatePayload(taskInsertSchema, req.body);
        res.status(201).json(await this.taskService.assignTask(task));
    }

    /** GET /tasks?from&to[&employeeId] — tasks plus the productivity summary. */
    async listTasks(req: Request, res: Response) {
        const filter = validatePayload(dateRangeSchema, req.query);
        res.json(await this.taskService.listTasks(filter));
    }

    async updateTask(req: Request, res: Response) {
        const id = validatePayload(idSchema, req.params.id);
        const changes = validatePayload(taskInsertSchema, req.body);
        res.json(await this.taskService.updateTask(id, changes));
    }

    async deleteTask(req: Request, res: Response) {
        const id = validatePayload(idSchema, req.params.id);
        await this.taskService.deleteTask(id);
        res.status(204).send();
    }
}
