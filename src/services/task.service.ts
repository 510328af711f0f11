import { TaskRepository } from "../repositories/task.repository";
import { EmployeeRepository } from "../repositories/employee.repository";
import { Task } from "../entities/task.entity";
import { ProductivitySummary, TaskFilter, TaskInsert, TaskView } from "../interfaces/task.interface";
import { NotFoundError } from "../utils/errors";

const ON_TIME_STATUS = "Completed On-Time";

function percentage(part: number, whole: number): number {
    return whole > 0 ? Math.round((part / whole) * 10000) / 100 : 0;
}

function tally(values: readonly string[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const value of values) counts[value] = (counts[value] ?? 0) + 1;
    return counts;
}

/**
 * Completed means any status containing "Completed"; only
 * "Completed On-Time" counts towards productivity.
 */
export function summarizeProductivity(tasks: readonly TaskView[]): ProductivitySummary {
    const perEmployee = new Map<string, { totalTasks: number; onTimeTasks: number }>();
    for (const task of tasks) {
        const entry = perEmployee.get(task.employeeName) ?? { totalTasks: 0, onTimeTasks: 0 };
        entry.totalTasks += 1;
        if (task.status === ON_TIME_STATUS) entry.onTimeTasks += 1;
        perEmployee.set(task.employeeName, entry);
    }

    const onTimeTasks = tasks.filter((task) => task.status === ON_TIME_STATUS).length;
    return {
        totalTasks: tasks.length,
        completedTasks: tasks.filter((task) => task.status.includes("Completed")).length,
        onTimeTasks,
        productivityScore: percentage(onTimeTasks, tasks.length),
        byStatus: tally(tasks.map((task) => task.status)),
        byPriority: tally(tasks.map((task) => task.priority)),
        byEmployee: [...perEmployee.entries()]
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([name, counts]) => ({
                name,
                ...counts,
                productivity: percentage(counts.onTimeTasks, counts.totalTasks),
            })),
    };
}

export class TaskService {
    constructor(
        private taskRepo: TaskRepository,
        private employeeRepo: EmployeeRepository,
    ) {}

    async assignTask(task: TaskInsert): Promise<Task> {
        const employee = await this.employeeRepo.getEmployeeById(task.employeeId);
        if (!employee) {
            throw new NotFoundError(`Employee with ID ${task.employeeId} not found`);
        }
        return this.taskRepo.createTask(task);
    }

    async listTasks(filter: TaskFilter): Promise<{ tasks: TaskView[]; summary: ProductivitySummary }> {
        const rows = await this.taskRepo.findInRange(filter);
        const employees = await this.employeeRepo.getEmployeesByIds([...new Set(rows.map((row) => row.employeeId))]);
        const names = new Map(employees.map((employee) => [employee.id, employee.name]));

        const tasks = rows.map((row) => ({ ...row, employeeName: names.get(row.employeeId) ?? "Unknown" }));
        return { tasks, summary: summarizeProductivity(tasks) };
    }

    async updateTask(id: number, changes: TaskInsert): Promise<Task> {
        const updated = await this.taskRepo.updateTask(id, {
            ...changes,
            description: changes.description ?? null,
            dueDate: changes.dueDate ?? null,
            submissionDate: changes.submissionDate ?? null,
        });
        if (!updated) {
            throw new NotFoundError(`Task with ID ${id} not found`);
        }
        return updated;
    }

    async deleteTask(id: number): Promise<void> {
        const deleted = await this.taskRepo.deleteTask(id);
        if (!deleted) {
            throw new NotFoundError(`Task with ID ${id} not found`);
        }
    }
}
