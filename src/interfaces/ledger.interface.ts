export const EXPENSE_CATEGORIES = [
    "Salary",
    "Rent",
    "Utilities",
    "Software",
    "Hardware",
    "Marketing",
    "Travel",
    "Miscellaneous",
] as const;
export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

export const REVENUE_SOURCES = ["Sales", "Services", "Subscriptions", "Investments", "Other"] as const;
export type RevenueSource = (typeof REVENUE_SOURCES)[number];

export interface ExpenseInsert {
    category: ExpenseCategory;
    amount: number;
    month: string;
    description?: string | null;
    employeeId?: number | null;
}

export interface ExpenseUpdate extends ExpenseInsert {
    id: number;
}

export interface IExpense {
    id: number;
    category: ExpenseCategory;
    amount: number;
    month: string;
    description: string | null;
    employeeId: number | null;
}

export interface ExpenseView extends IExpense {
    employeeName: string | null;
}

export interface RevenueInsert {
    source: RevenueSource;
    amount: number;
    month: string;
    description?: string | null;
}

export interface RevenueUpdate extends RevenueInsert {
    id: number;
}

export interface IRevenue {
    id: number;
    source: RevenueSource;
    amount: number;
    month: string;
    description: string | null;
}
