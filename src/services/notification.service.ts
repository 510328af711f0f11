import nodemailer, { Transporter } from "nodemailer";
import Settings from "../config/settings";
import { describeError } from "../utils/errors";

export interface LeaveNotice {
    name: string;
    startDate: string;
    endDate: string;
    type: string;
    reason: string | null;
}

export type NotificationOutcome = { delivered: true } | { delivered: false; reason: string };

export interface MailConfig {
    host: string;
    port: number;
    user: string;
    password: string;
    recipient: string;
}

const defaultMailConfig: MailConfig = {
    host: Settings.SMTP_HOST,
    port: Settings.SMTP_PORT,
    user: Settings.SMTP_USER,
    password: Settings.SMTP_PASSWORD,
    recipient: Settings.LEAVE_NOTIFY_TO,
};

export function leaveNoticeBody(notice: LeaveNotice): string {
    return `New leave request from ${notice.name}: ${notice.type} from ${notice.startDate} to ${notice.endDate}. Reason: ${notice.reason ?? ""}`;
}

/**
 * Emails the fixed admin recipient about new leave requests. Delivery
 * problems are returned as an outcome and never thrown: a leave request is
 * recorded whether or not the mail goes out.
 */
export class NotificationService {
    private transporter: Transporter | null = null;

    constructor(private readonly config: MailConfig = defaultMailConfig) {}

    private getTransporter(): Transporter {
        if (!this.transporter) {
            this.transporter = nodemailer.createTransport({
                host: this.config.host,
                port: this.config.port,
                secure: true,
                auth: { user: this.config.user, pass: this.config.password },
            });
        }
        return this.transporter;
    }

    async notifyLeaveRequest(notice: LeaveNotice): Promise<NotificationOutcome> {
        if (!this.config.user || !this.config.password || !this.config.recipient) {
            return { delivered: false, reason: "mail credentials not configured" };
        }

        try {
            await this.getTransporter().sendMail({
                from: this.config.user,
                to: this.config.recipient,
                subject: "New Leave Request",
                text: leaveNoticeBody(notice),
            });
            return { delivered: true };
        } catch (error) {
            return { delivered: false, reason: describeError(error) };
        }
    }
}
