import { Router } from "express";
import { asyncHandler } from "./middlewares/asyncHandler.middleware";
import { adminRoute } from "./middlewares/adminSession.middleware";
import { idempotencyMiddleware } from "./middlewares/idempotency.middleware";
import { HealthCheck } from "./controllers/healthCheck.controller";
import { AdminSessionController } from "./controllers/adminSession.controller";
import { DashboardController } from "./controllers/dashboard.controller";
import { EmployeeController } from "./controllers/employee.controller";
import { AttendanceController } from "./controllers/attendance.controller";
import { TaskController } from "./controllers/task.controller";
import { LedgerController } from "./controllers/ledger.controller";
import { PayrollController } from "./controllers/payroll.controller";
import { FinanceController } from "./controllers/finance.controller";
import { ReviewController } from "./controllers/review.controller";
import { LeaveRequestController } from "./controllers/leaveRequest.controller";

// Controllers are built per request: repositories can only be taken from an initialized data source.
const router = Router();

router.get("/health", asyncHandler((req, res) => new HealthCheck().getFullSystemHealth(req, res)));
router.get("/health/system", asyncHandler((req, res) => new HealthCheck().getSystemHealth(req, res)));

router.post("/admin/login", asyncHandler((req, res) => new AdminSessionController().login(req, res)));
router.post("/admin/logout", asyncHandler((req, res) => new AdminSessionController().logout(req, res)));
router.post("/admin/navigate", asyncHandler((req, res) => new AdminSessionController().navigate(req, res)));
router.get("/admin/session", asyncHandler((req, res) => new AdminSessionController().current(req, res)));

router.get("/dashboard", asyncHandler((req, res) => new DashboardController().overview(req, res)));

router.post(
    "/employees",
    idempotencyMiddleware,
    adminRoute((req, res, session) => new EmployeeController().createEmployee(req, res, session)),
);
router.get("/employees", asyncHandler((req, res) => new EmployeeController().getEmployees(req, res)));
router.get("/employees/:id", asyncHandler((req, res) => new EmployeeController().getEmployee(req, res)));
router.patch("/employees", adminRoute((req, res, session) => new EmployeeController().updateEmployees(req, res, session)));
router.delete("/employees/:id", adminRoute((req, res, session) => new EmployeeController().deleteEmployee(req, res, session)));

router.post("/attendance", adminRoute((req, res) => new AttendanceController().recordAttendance(req, res)));
router.get("/attendance", asyncHandler((req, res) => new AttendanceController().listAttendance(req, res)));
router.put("/attendance/:id", adminRoute((req, res) => new AttendanceController().updateAttendance(req, res)));
router.delete("/attendance/:id", adminRoute((req, res) => new AttendanceController().deleteAttendance(req, res)));

router.post("/tasks", adminRoute((req, res) => new TaskController().assignTask(req, res)));
router.get("/tasks", asyncHandler((req, res) => new TaskController().listTasks(req, res)));
router.put("/tasks/:id", adminRoute((req, res) => new TaskController().updateTask(req, res)));
router.delete("/tasks/:id", adminRoute((req, res) => new TaskController().deleteTask(req, res)));

router.post("/expenses", adminRoute((req, res) => new LedgerController().addExpense(req, res)));
router.get("/expenses", asyncHandler((req, res) => new LedgerController().listExpenses(req, res)));
router.put("/expenses/:id", adminRoute((req, res) => new LedgerController().updateExpense(req, res)));
router.delete("/expenses/:id", adminRoute((req, res) => new LedgerController().deleteExpense(req, res)));

router.post("/revenues", adminRoute((req, res) => new LedgerController().addRevenue(req, res)));
router.get("/revenues", asyncHandler((req, res) => new LedgerController().listRevenues(req, res)));
router.put("/revenues/:id", adminRoute((req, res) => new LedgerController().updateRevenue(req, res)));
router.delete("/revenues/:id", adminRoute((req, res) => new LedgerController().deleteRevenue(req, res)));

router.get("/payroll", asyncHandler((req, res) => new PayrollController().payrollSummary(req, res)));
router.post("/payroll/reconcile", adminRoute((req, res) => new PayrollController().reconcile(req, res)));

router.get("/finance/summary", asyncHandler((req, res) => new FinanceController().monthlySummary(req, res)));
router.get("/finance/trends", asyncHandler((req, res) => new FinanceController().trends(req, res)));
router.get("/finance/averages", asyncHandler((req, res) => new FinanceController().averageRevenue(req, res)));
router.get("/finance/forecast", asyncHandler((req, res) => new FinanceController().forecast(req, res)));
router.get("/finance/insights", asyncHandler((req, res) => new FinanceController().revenueInsights(req, res)));

router.post("/reviews", asyncHandler((req, res) => new ReviewController().submitReview(req, res)));
router.get("/reviews", asyncHandler((req, res) => new ReviewController().listReviews(req, res)));

router.post(
    "/leave-requests",
    idempotencyMiddleware,
    asyncHandler((req, res) => new LeaveRequestController().createLeaveRequest(req, res)),
);
router.get("/leave-requests", asyncHandler((req, res) => new LeaveRequestController().listLeaveRequests(req, res)));
router.get("/leave-requests/pending/count", asyncHandler((req, res) => new LeaveRequestController().countPending(req, res)));
router.patch(
    "/leave-requests/:id/status",
    adminRoute((req, res, session) => new LeaveRequestController().decideLeaveRequest(req, res, session)),
);
router.delete("/leave-requests/:id", adminRoute((req, res) => new LeaveRequestController().deleteLeaveRequest(req, res)));

export default router;
