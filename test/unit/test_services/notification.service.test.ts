import nodemailer from "nodemailer";
import { NotificationService, leaveNoticeBody } from "../../../src/services/notification.service";

jest.mock("nodemailer", () => ({
    __esModule: true,
    default: { createTransport: jest.fn() },
}));

const config = {
    host: "smtp.test",
    port: 465,
    user: "hr@example.com",
    password: "test-secret",
    recipient: "admin@example.com",
};

const notice = {
    name: "Ada",
    startDate: "2025-01-01",
    endDate: "2025-01-05",
    type: "Annual",
    reason: "Family trip",
};

describe("NotificationService", () => {
    const sendMail = jest.fn();

    beforeEach(() => {
        jest.clearAllMocks();
        (nodemailer.createTransport as jest.Mock).mockReturnValue({ sendMail });
    });

    it("sends the leave notice over a secure connection", async () => {
        sendMail.mockResolvedValue({ messageId: "1" });
        const service = new NotificationService(config);

        const outcome = await service.notifyLeaveRequest(notice);

        expect(outcome).toEqual({ delivered: true });
        expect(nodemailer.createTransport).toHaveBeenCalledWith({
            host: "smtp.test",
            port: 465,
            secure: true,
            auth: { user: "hr@example.com", pass: "test-secret" },
        });
        expect(sendMail).toHaveBeenCalledWith({
            from: "hr@example.com",
            to: "admin@example.com",
            subject: "New Leave Request",
            text: "New leave request from Ada: Annual from 2025-01-01 to 2025-01-05. Reason: Family trip",
        });
    });

    it("reports a delivery failure instead of throwing", async () => {
        sendMail.mockRejectedValue(new Error("Invalid login"));
        const service = new NotificationService(config);

        await expect(service.notifyLeaveRequest(notice)).resolves.toEqual({ delivered: false, reason: "Invalid login" });
    });

    it("does not try to send without credentials", async () => {
        const service = new NotificationService({ ...config, password: "" });

        const outcome = await service.notifyLeaveRequest(notice);

        expect(outcome).toEqual({ delivered: false, reason: "mail credentials not configured" });
        expect(nodemailer.createTransport).not.toHaveBeenCalled();
    });
});

describe("leaveNoticeBody", () => {
    it("leaves the reason blank when none was given", () => {
        expect(leaveNoticeBody({ ...notice, reason: null })).toBe(
            "New leave request from Ada: Annual from 2025-01-01 to 2025-01-05. Reason: ",
        );
    });
});
