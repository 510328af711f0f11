import { Request, Response } from "express";
import { ADMIN_SESSION_HEADER, AdminSessionService } from "../services/adminSession.service";
import { adminLoginSchema, adminNavigateSchema } from "../validators/adminSession.validator";
import { validatePayload } from "../utils/validation";

export class AdminSessionController {
    private readonly sessions = new AdminSessionService();

    /** POST /admin/login — returns the session; its token goes in X-Admin-Session. */
    async login(req: Request, res: Response) {
        const { email, password } = validatePayload(adminLoginSchema, req.body);
        res.status(201).json(await this.sessions.login(email, password));
    }

    async logout(req: Request, res: Response) {
        res.json(await this.sessions.logout(req.header(ADMIN_SESSION_HEADER)));
    }

    /** POST /admin/navigate — leaving the admin area ends the session. */
    async navigate(req: Request, res: Response) {
        const { page } = validatePayload(adminNavigateSchema, req.body);
        res.json(await this.sessions.navigate(req.header(ADMIN_SESSION_HEADER), page));
    }

    async current(req: Request, res: Response) {
        res.json(await this.sessions.resolve(req.header(ADMIN_SESSION_HEADER)));
    }
}
