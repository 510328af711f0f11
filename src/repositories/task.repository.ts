import { Between, Repository } from "typeorm";
import { Task } from "../entities/task.entity";
import { TaskFilter, TaskInsert } from "../interfaces/task.interface";

export class TaskRepository {
    private readonly db: Repository<Task>;

    constructor(repository: Repository<Task>) {
        this.db = repository;
    }

    async createTask(task: TaskInsert): Promise<Task> {
        const entity = this.db.create({
            ...task,
            description: task.description ?? null,
            dueDate: task.dueDate ?? null,
            submissionDate: task.submissionDate ?? null,
        });
        return this.db.save(entity);
    }

    async findById(id: number): Promise<Task | null> {
        return this.db.findOne({ where: { id } });
    }

    async findInRange(filter: TaskFilter): Promise<Task[]> {
        return this.db.find({
            where: {
                assignedDate: Between(filter.from, filter.to),
                ...(filter.employeeId !== undefined ? { employeeId: filter.employeeId } : {}),
            },
            order: { assignedDate: "DESC" },
        });
    }

    async updateTask(id: number, changes: Partial<TaskInsert>): Promise<Task | null> {
        await this.db.update({ id }, changes);
        return this.findById(id);
    }

    async deleteTask(id: number): Promise<boolean> {
        const result = await this.db.delete({ id });
        return result.affected !== 0;
    }
}
