export const DEPARTMENTS = ["HR", "Engineering", "Sales", "Marketing", "Operations", "Finance"] as const;
export type Department = (typeof DEPARTMENTS)[number];

// back-filled by the department migration on rows that predate the column
export const LEGACY_DEPARTMENT = "Unknown";

export const EMPLOYEE_STATUSES = ["Active", "Inactive"] as const;
export type EmployeeStatus = (typeof EMPLOYEE_STATUSES)[number];

export interface EmployeeInsert {
    name: string;
    role: string;
    department: Department;
    salary: number;
    expectedLogin: string; // HH:mm:ss
    expectedLogout: string; // HH:mm:ss
    hireDate: string; // YYYY-MM-DD
    status: EmployeeStatus;
}

export interface EmployeeUpdate extends Omit<EmployeeInsert, "department"> {
    id: number;
    department: Department | typeof LEGACY_DEPARTMENT;
}

export interface IEmployee {
    id: number;
    name: string;
    role: string;
    // legacy rows carry "Unknown"
    department: string;
    salary: number;
    expectedLogin: string | null;
    expectedLogout: string | null;
    hireDate: string | null;
    status: EmployeeStatus;
}

export interface EmployeeWithTenure extends IEmployee {
    tenure: string;
}
