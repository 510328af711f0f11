import { summarizeAttendance, toAttendanceView } from "../../../src/services/attendance.service";
import { summarizeProductivity } from "../../../src/services/task.service";
import { summarizeReviews } from "../../../src/services/review.service";
import { Attendance } from "../../../src/entities/attendance.entity";
import { Employee } from "../../../src/entities/employee.entity";
import { TaskView } from "../../../src/interfaces/task.interface";
import { ReviewView } from "../../../src/interfaces/review.interface";

const ada = Object.assign(new Employee(), {
    id: 1,
    name: "Ada",
    expectedLogin: "09:00:00",
    expectedLogout: "18:00:00",
});

function attendance(id: number, loginTime: string, logoutTime: string | null, breakDuration = 60): Attendance {
    return Object.assign(new Attendance(), { id, employeeId: 1, loginTime, logoutTime, breakDuration, notes: null });
}

describe("attendance views", () => {
    it("derives hours and punctuality from the employee's schedule", () => {
        const view = toAttendanceView(attendance(1, "2024-01-01 09:15:00", "2024-01-01 17:45:00"), ada);

        expect(view).toMatchObject({ name: "Ada", workingHours: 7.5, lateMinutes: 15, earlyMinutes: 15 });
    });

    it("falls back to zero minutes when the employee is unknown", () => {
        const view = toAttendanceView(attendance(2, "2024-01-01 09:15:00", "2024-01-01 17:45:00"), undefined);

        expect(view).toMatchObject({ name: "Unknown", lateMinutes: 0, earlyMinutes: 0 });
    });

    it("summarizes hours per day and per employee", () => {
        const views = [
            toAttendanceView(attendance(1, "2024-01-01 09:00:00", "2024-01-01 18:00:00"), ada),
            toAttendanceView(attendance(2, "2024-01-02 09:30:00", "2024-01-02 18:00:00"), ada),
            toAttendanceView(attendance(3, "2024-01-03 09:00:00", null), ada),
        ];

        expect(summarizeAttendance(views)).toEqual({
            totalHours: 15.5,
            averageHours: 5.17,
            lateArrivals: 1,
            earlyDepartures: 0,
            hoursByDay: [
                { date: "2024-01-01", hours: 8 },
                { date: "2024-01-02", hours: 7.5 },
                { date: "2024-01-03", hours: 0 },
            ],
            hoursByEmployee: [{ name: "Ada", hours: 15.5 }],
        });
    });
});

describe("summarizeProductivity", () => {
    function task(id: number, employeeName: string, status: TaskView["status"], priority: TaskView["priority"]): TaskView {
        return {
            id,
            employeeId: id,
            employeeName,
            name: `Task ${id}`,
            description: null,
            assignedDate: "2024-01-01",
            dueDate: null,
            submissionDate: null,
            status,
            priority,
        };
    }

    it("counts on-time completions towards productivity", () => {
        const summary = summarizeProductivity([
            task(1, "Ada", "Completed On-Time", "High"),
            task(2, "Ada", "Completed Late", "Low"),
            task(3, "Bob", "Pending", "High"),
            task(4, "Bob", "Completed On-Time", "Medium"),
        ]);

        expect(summary).toEqual({
            totalTasks: 4,
            completedTasks: 3,
            onTimeTasks: 2,
            productivityScore: 50,
            byStatus: { "Completed On-Time": 2, "Completed Late": 1, Pending: 1 },
            byPriority: { High: 2, Low: 1, Medium: 1 },
            byEmployee: [
                { name: "Ada", totalTasks: 2, onTimeTasks: 1, productivity: 50 },
                { name: "Bob", totalTasks: 2, onTimeTasks: 1, productivity: 50 },
            ],
        });
    });

    it("scores an empty list as zero", () => {
        expect(summarizeProductivity([]).productivityScore).toBe(0);
    });
});

describe("summarizeReviews", () => {
    function review(id: number, rating: number): ReviewView {
        return { id, employeeId: 1, name: "Ada", reviewDate: "2024-05-01", rating, comments: null, reviewer: "Grace" };
    }

    it("averages ratings and counts the high ones", () => {
        expect(summarizeReviews([review(1, 5), review(2, 3), review(3, 4), review(4, 5)])).toEqual({
            averageRating: 4.25,
            totalReviews: 4,
            highRatings: 3,
            ratingDistribution: [
                { rating: 3, count: 1 },
                { rating: 4, count: 1 },
                { rating: 5, count: 2 },
            ],
        });
    });
});
