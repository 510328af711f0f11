export const TASK_STATUSES = [
    "Pending",
    "In Progress",
    "Completed On-Time",
    "Completed Late",
    "Cancelled",
] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TASK_PRIORITIES = ["Low", "Medium", "High"] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export interface TaskInsert {
    employeeId: number;
    name: string;
    description?: string | null;
    assignedDate: string;
    dueDate?: string | null;
    submissionDate?: string | null;
    status: TaskStatus;
    priority: TaskPriority;
}

export interface TaskUpdate extends TaskInsert {
    id: number;
}

export interface ITask {
    id: number;
    employeeId: number;
    name: string;
    description: string | null;
    assignedDate: string;
    dueDate: string | null;
    submissionDate: string | null;
    status: TaskStatus;
    priority: TaskPriority;
}

export interface TaskFilter {
    from: string;
    to: string;
    employeeId?: number;
}

export interface TaskView extends ITask {
    employeeName: string;
}

export interface ProductivitySummary {
    totalTasks: number;
    completedTasks: number;
    onTimeTasks: number;
    productivityScore: number;
    byStatus: Record<string, number>;
    byPriority: Record<string, number>;
    byEmployee: { name: string; totalTasks: number; onTimeTasks: number; productivity: number }[];
}
