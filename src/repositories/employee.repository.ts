import { In, Repository } from "typeorm";
import { Employee } from "../entities/employee.entity";
import { EmployeeInsert, EmployeeUpdate } from "../interfaces/employee.interface";

export class EmployeeRepository {
    private readonly db: Repository<Employee>;

    constructor(repository: Repository<Employee>) {
        this.db = repository;
    }

    async createEmployee(employeeInfo: EmployeeInsert): Promise<Employee> {
        const employee = this.db.create(employeeInfo);
        return this.db.save(employee);
    }

    async getEmployeeById(id: number): Promise<Employee | null> {
        return this.db.findOne({ where: { id } });
    }

    async getEmployeesByIds(ids: number[]): Promise<Employee[]> {
        if (ids.length === 0) return [];
        return this.db.find({ where: { id: In(ids) } });
    }

    async getAllEmployees(): Promise<Employee[]> {
        return this.db.find({ order: { id: "ASC" } });
    }

    async getActiveEmployees(): Promise<Employee[]> {
        return this.db.find({ where: { status: "Active" }, order: { id: "ASC" } });
    }

    async updateEmployee(id: number, employeeInfo: Partial<Omit<EmployeeUpdate, "id">>): Promise<Employee | null> {
        await this.db.update({ id }, employeeInfo);
        return this.getEmployeeById(id);
    }

    async deleteEmployee(id: number): Promise<boolean> {
        const result = await this.db.delete({ id });
        return result.affected !== 0;
    }
}
